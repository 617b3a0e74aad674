import { PegMatch, PegSyntaxError, PegTraceEvent, parsePeg } from "./peg_parser";
import {
  PegGrammar,
  PegRule,
  at,
  digit,
  disable,
  eof,
  eol,
  identifierFirst,
  longBracket,
  must,
  notAt,
  one,
  plus,
  ref,
  seq,
  sor,
  star,
} from "./peg_rules";

function makeGrammar(start: PegRule, extra: Array<[string, PegRule]> = []): PegGrammar {
  const rules = new Map<string, PegRule>([
    ["start", start],
    ["list", seq(ref("item"), star(ref("ws"), one(","), ref("ws"), ref("item")), ref("ws"))],
    ["item", sor(ref("number"), ref("word"))],
    ["number", plus(digit)],
    ["word", plus(identifierFirst)],
    ["ws", star(one(" "))],
    ...extra,
  ]);
  return new PegGrammar(rules, { start: "start", padding: ["ws"] });
}

type Recorder = { matches: PegMatch[] };

function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

function recordRules(...names: string[]) {
  const actions: Record<string, (match: PegMatch, context: Recorder) => void> = {};
  for (const name of names) {
    actions[name] = (match, context) => context.matches.push(match);
  }
  return actions;
}

describe("PEG parser", () => {
  describe("actions", () => {
    it("should fire for each named rule in input order", () => {
      const grammar = makeGrammar(must(ref("list"), eof));
      const context: Recorder = { matches: [] };

      const result = parsePeg(grammar, "12, ab, 3", context, { actions: recordRules("number", "word") });

      expect(result.end).toBe(9);
      expect(context.matches.map((m) => `${m.rule}:${m.text}`)).toEqual(["number:12", "word:ab", "number:3"]);
      expect(context.matches[1].begin).toBe(4);
      expect(context.matches[1].end).toBe(6);
    });

    it("should exclude trailing padding from contentEnd", () => {
      const grammar = makeGrammar(must(ref("list"), eof));
      const context: Recorder = { matches: [] };

      parsePeg(grammar, "1 , 2  ", context, { actions: recordRules("list") });

      expect(context.matches).toHaveLength(1);
      expect(context.matches[0].begin).toBe(0);
      expect(context.matches[0].end).toBe(7);
      expect(context.matches[0].contentEnd).toBe(5);
      expect(context.matches[0].text).toBe("1 , 2  ");
    });

    it("should report line and byte in line of the match start", () => {
      const grammar = makeGrammar(seq(ref("number"), star(eol, ref("number")), eof));
      const context: Recorder = { matches: [] };

      parsePeg(grammar, "1\n22\n333", context, { actions: recordRules("number") });

      expect(context.matches.map((m) => [m.line, m.byteInLine])).toEqual([
        [1, 0],
        [2, 0],
        [3, 0],
      ]);
    });

    it("should not fire inside lookahead", () => {
      const grammar = makeGrammar(seq(at(ref("number")), notAt(ref("word")), ref("number"), eof));
      const context: Recorder = { matches: [] };

      parsePeg(grammar, "42", context, { actions: recordRules("number", "word") });

      expect(context.matches).toHaveLength(1);
      expect(context.matches[0].text).toBe("42");
    });

    it("should not fire inside disable", () => {
      const grammar = makeGrammar(seq(disable(ref("number")), eof));
      const context: Recorder = { matches: [] };

      parsePeg(grammar, "42", context, { actions: recordRules("number") });

      expect(context.matches).toHaveLength(0);
    });

    it("should fire on alternatives that are later abandoned", () => {
      const grammar = makeGrammar(sor(seq(ref("number"), one("x")), seq(ref("number"), one("y"))));
      const context: Recorder = { matches: [] };

      parsePeg(grammar, "1y", context, { actions: recordRules("number") });

      expect(context.matches.map((m) => m.begin)).toEqual([0, 0]);
    });
  });

  describe("errors", () => {
    it("should raise at a failed must with the position and expectation", () => {
      const grammar = makeGrammar(must(ref("number"), eof));

      const error = catchError(() => parsePeg(grammar, "12a", {}, { sourceName: "test.txt" }));

      expect(error).toBeInstanceOf(PegSyntaxError);
      if (error instanceof PegSyntaxError) {
        expect(error.message).toBe("test.txt:1:3: parse error matching end of input near 'a'");
        expect(error.sourceName).toBe("test.txt");
        expect(error.line).toBe(1);
        expect(error.column).toBe(3);
        expect(error.offset).toBe(2);
        expect(error.expected).toBe("end of input");
        expect(error.fragment).toBe("a");
      }
    });

    it("should locate the error at the farthest failure", () => {
      const grammar = makeGrammar(must(seq(ref("number"), star(eol, ref("number"))), eof));

      expect(() => parsePeg(grammar, "1\n2\nx", {})).toThrow("input:3:1: parse error matching end of input near 'x'");
    });

    it("should say when the error is at end of input", () => {
      const grammar = makeGrammar(must(ref("number"), one(";")));

      expect(() => parsePeg(grammar, "12", {})).toThrow('input:1:3: parse error matching ";" at end of input');
    });

    it("should raise naming the start rule when it fails without a must", () => {
      const grammar = makeGrammar(ref("number"));

      expect(() => parsePeg(grammar, "x", {})).toThrow("input:1:1: parse error matching start near 'x'");
    });

    it("should raise on an unterminated long bracket", () => {
      const grammar = makeGrammar(seq(longBracket("[", "=", "]"), eof));

      expect(() => parsePeg(grammar, "[==[abc", {})).toThrow(
        'input:1:8: parse error matching "]==]" closing long bracket at end of input',
      );
      expect(() => parsePeg(grammar, "[=[x]==]", {})).toThrow(PegSyntaxError);
    });

    it("should throw on a reference to an undefined rule", () => {
      const grammar = makeGrammar(ref("nope"));

      expect(() => parsePeg(grammar, "", {})).toThrow("Undefined grammar rule: nope");
    });
  });

  describe("memoized rules", () => {
    function memoGrammar(start: PegRule): PegGrammar {
      const rules = new Map<string, PegRule>([
        ["start", start],
        ["inner", seq(ref("number"), one(";"))],
        ["number", plus(digit)],
      ]);
      return new PegGrammar(rules, { start: "start", memoize: ["inner"] });
    }

    it("should parse a rule once per position and replay its actions", () => {
      const grammar = memoGrammar(must(sor(seq(ref("inner"), one("a")), seq(ref("inner"), one("b"))), eof));
      const context: Recorder = { matches: [] };
      const events: PegTraceEvent[] = [];

      const result = parsePeg(grammar, "12;b", context, {
        actions: recordRules("number"),
        trace: (event) => events.push(event),
      });

      expect(result.end).toBe(4);
      expect(context.matches.map((m) => m.text)).toEqual(["12", "12"]);
      expect(events.filter((e) => e.type === "start").map((e) => e.rule)).toEqual(["start", "inner", "number", "inner"]);
    });

    it("should fire actions for a match first seen inside lookahead", () => {
      const grammar = memoGrammar(must(at(ref("inner")), ref("inner"), one("b"), eof));
      const context: Recorder = { matches: [] };

      parsePeg(grammar, "12;b", context, { actions: recordRules("number") });

      expect(context.matches.map((m) => m.text)).toEqual(["12"]);
    });
  });

  it("should match long brackets of the same level only", () => {
    const grammar = makeGrammar(seq(longBracket("[", "=", "]"), eof));

    expect(parsePeg(grammar, "[==[a]]==]", {}).end).toBe(10);
  });

  it("should emit nested trace events", () => {
    const grammar = makeGrammar(seq(ref("number"), eof));
    const events: PegTraceEvent[] = [];

    parsePeg(grammar, "7", {}, { trace: (event) => events.push(event) });

    expect(events).toEqual([
      { type: "start", rule: "start", offset: 0, depth: 0 },
      { type: "start", rule: "number", offset: 0, depth: 1 },
      { type: "success", rule: "number", offset: 0, depth: 1 },
      { type: "success", rule: "start", offset: 0, depth: 0 },
    ]);
  });
});
