import { getLua53Grammar } from "../lua/lua53_grammar";
import { GrammarDefectError, analyzeGrammar, assertGrammarWellFormed } from "./peg_analyze";
import { PegGrammar, PegRule, one, opt, ref, seq, sor, star, until } from "./peg_rules";

function grammarOf(rules: Array<[string, PegRule]>, start: string = "start"): PegGrammar {
  return new PegGrammar(new Map(rules), { start });
}

describe("Grammar analysis", () => {
  it("should find no issues in the Lua grammar", () => {
    const analysis = analyzeGrammar(getLua53Grammar());

    expect(analysis.issues).toEqual([]);
    expect(analysis.ruleCount).toBe(getLua53Grammar().ruleCount);
    expect(analysis.nullableRules).toContain("seps");
    expect(analysis.nullableRules).toContain("chunkBlock");
    expect(analysis.nullableRules).not.toContain("expression");
    expect(() => assertGrammarWellFormed(getLua53Grammar())).not.toThrow();
  });

  it("should report left recursion through another rule", () => {
    const grammar = grammarOf([
      ["start", seq(ref("b"), one("x"))],
      ["b", sor(ref("start"), one("y"))],
    ]);

    const messages = analyzeGrammar(grammar).issues.map((issue) => `${issue.kind} ${issue.message}`);

    expect(messages).toEqual([
      "left-recursion left recursion: start -> b -> start",
      "left-recursion left recursion: b -> start -> b",
    ]);
  });

  it("should report left recursion behind a prefix that can match empty", () => {
    const grammar = grammarOf([["start", seq(opt(one("-")), ref("start"), one("x"))]]);

    const issues = analyzeGrammar(grammar).issues;

    expect(issues).toHaveLength(1);
    expect(issues[0].message).toBe("left recursion: start -> start");
  });

  it("should not report recursion after consumed input", () => {
    const grammar = grammarOf([["start", seq(one("("), opt(ref("start")), one(")"))]]);

    expect(analyzeGrammar(grammar).issues).toEqual([]);
  });

  it("should report loops over rules that can match empty", () => {
    const grammar = grammarOf([
      ["start", seq(star(opt(one("x"))), ref("blank"))],
      ["blank", until(one(";"), star(one(" ")))],
    ]);

    const issues = analyzeGrammar(grammar).issues;

    expect(issues).toEqual([
      {
        kind: "empty-loop",
        rule: "start",
        message: `rule 'start' repeats '("x")?', which can match empty`,
      },
      {
        kind: "empty-loop",
        rule: "blank",
        message: `rule 'blank' has an until body '(" ")*' that can match empty`,
      },
    ]);
  });

  it("should report undefined rules", () => {
    const grammar = grammarOf([["start", ref("missing")]], "begin");

    const messages = analyzeGrammar(grammar).issues.map((issue) => issue.message);

    expect(messages).toEqual(["start rule 'begin' is not defined", "rule 'start' references undefined rule 'missing'"]);
  });

  it("should throw a GrammarDefectError listing every issue", () => {
    const grammar = grammarOf([["start", seq(ref("start"), ref("missing"))]]);

    try {
      assertGrammarWellFormed(grammar);
    } catch (error) {
      expect(error).toBeInstanceOf(GrammarDefectError);
      if (error instanceof GrammarDefectError) {
        expect(error.issues.map((issue) => issue.kind)).toEqual(["undefined-rule", "left-recursion"]);
        expect(error.message).toBe(
          "Grammar has 2 structural issue(s):\n" +
            "  rule 'start' references undefined rule 'missing'\n" +
            "  left recursion: start -> start",
        );
      }
      return;
    }
    throw new Error("expected a GrammarDefectError");
  });
});
