import { InvariantError } from "../utils/errorHandling";
import { findCompoundOperator, lowerReassignments, replaceNotEquals } from "./codeRewrite";

jest.spyOn(console, "error").mockImplementation(() => {});

describe("replaceNotEquals", () => {
  it("should replace the ! at each offset", () => {
    expect(replaceNotEquals("a!=b and c != d", [1, 11])).toBe("a~=b and c ~= d");
  });

  it("should return the code unchanged without offsets", () => {
    expect(replaceNotEquals("a!=b", [])).toBe("a!=b");
  });

  it("should fail on an offset that doesn't hold a !", () => {
    expect(() => replaceNotEquals("a!=b", [0])).toThrow(InvariantError);
  });
});

describe("findCompoundOperator", () => {
  it("should find the = of the first compound operator", () => {
    expect(findCompoundOperator("a += 1", 0, 6)).toBe(3);
    expect(findCompoundOperator("t[i] %= 2", 0, 9)).toBe(6);
  });

  it("should return -1 when there is none", () => {
    expect(findCompoundOperator("a = 1", 0, 5)).toBe(-1);
    expect(findCompoundOperator("a += 1", 0, 3)).toBe(-1);
  });
});

describe("lowerReassignments", () => {
  it("should lower a single occurrence", () => {
    expect(lowerReassignments("a+=1", [{ line: 1, byteInLine: 0, length: 4, offset: 0 }])).toBe("a=a+(1)");
  });

  it("should keep spacing around the operator", () => {
    expect(lowerReassignments("a += 1", [{ line: 1, byteInLine: 0, length: 6, offset: 0 }])).toBe("a =a +( 1)");
  });

  it("should find the occurrence by line and byte in line", () => {
    const code = "a = 1\nb *= 2\nc = 3";

    expect(lowerReassignments(code, [{ line: 2, byteInLine: 0, length: 6, offset: 6 }])).toBe("a = 1\nb =b *( 2)\nc = 3");
  });

  it("should keep a multi-line right-hand side on its lines", () => {
    const code = "x += 1 +\n  2\ny = 3";

    expect(lowerReassignments(code, [{ line: 1, byteInLine: 0, length: 12, offset: 0 }])).toBe(
      "x =x +( 1 +\n  2)\ny = 3",
    );
  });

  it("should apply several occurrences on one line", () => {
    const occurrences = [
      { line: 1, byteInLine: 0, length: 4, offset: 0 },
      { line: 1, byteInLine: 5, length: 4, offset: 5 },
    ];

    expect(lowerReassignments("a+=1 b-=2", occurrences)).toBe("a=a+(1) b=b-(2)");
  });

  it("should fail when the span holds no compound operator", () => {
    expect(() => lowerReassignments("a = 1", [{ line: 1, byteInLine: 0, length: 5, offset: 0 }])).toThrow(
      "lowerReassignments: no compound operator in span at line 1",
    );
  });
});
