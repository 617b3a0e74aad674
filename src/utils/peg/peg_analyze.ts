import { PegGrammar, PegRule, describeRule } from "./peg_rules";

// Structural checks over a grammar, independent of any input.
// Finds the constructions that would make a parse loop forever or recurse without consuming input.

export type GrammarIssueKind = "undefined-rule" | "left-recursion" | "empty-loop";

export type GrammarIssue = {
  kind: GrammarIssueKind;
  rule: string;
  message: string;
};

export type GrammarAnalysis = {
  ruleCount: number;
  nullableRules: string[];
  issues: GrammarIssue[];
};

export class GrammarDefectError extends Error {
  constructor(
    message: string,
    public issues: GrammarIssue[],
  ) {
    super(message);
    this.name = "GrammarDefectError";
  }
}

function canMatchEmpty(rule: PegRule, nullable: ReadonlyMap<string, boolean>): boolean {
  switch (rule.kind) {
    case "string":
      return rule.text.length === 0;
    case "one":
    case "class":
    case "any":
    case "eol":
    case "longBracket":
      return false;
    case "eof":
    case "star":
    case "opt":
    case "repOpt":
    case "at":
    case "notAt":
      return true;
    case "seq":
      return rule.rules.every((item) => canMatchEmpty(item, nullable));
    case "sor":
      return rule.rules.some((item) => canMatchEmpty(item, nullable));
    case "plus":
    case "must":
    case "disable":
      return canMatchEmpty(rule.rule, nullable);
    case "until":
      return canMatchEmpty(rule.cond, nullable);
    case "ref":
      return nullable.get(rule.name) ?? false;
  }
}

function computeNullable(grammar: PegGrammar): Map<string, boolean> {
  const nullable = new Map<string, boolean>();
  for (const name of grammar.rules.keys()) {
    nullable.set(name, false);
  }

  let changed = true;
  while (changed) {
    changed = false;
    for (const [name, rule] of grammar.rules) {
      if (!nullable.get(name) && canMatchEmpty(rule, nullable)) {
        nullable.set(name, true);
        changed = true;
      }
    }
  }
  return nullable;
}

// rules that may be entered at the same input position as `rule` itself.
function collectLeadingRefs(rule: PegRule, nullable: ReadonlyMap<string, boolean>, out: Set<string>): void {
  switch (rule.kind) {
    case "seq":
      for (const item of rule.rules) {
        collectLeadingRefs(item, nullable, out);
        if (!canMatchEmpty(item, nullable)) {
          break;
        }
      }
      return;
    case "sor":
      for (const item of rule.rules) {
        collectLeadingRefs(item, nullable, out);
      }
      return;
    case "star":
    case "plus":
    case "opt":
    case "repOpt":
    case "at":
    case "notAt":
    case "must":
    case "disable":
      collectLeadingRefs(rule.rule, nullable, out);
      return;
    case "until":
      collectLeadingRefs(rule.cond, nullable, out);
      if (rule.body) {
        collectLeadingRefs(rule.body, nullable, out);
      }
      return;
    case "ref":
      out.add(rule.name);
      return;
    default:
      return;
  }
}

function visitRules(rule: PegRule, visitor: (rule: PegRule) => void): void {
  visitor(rule);
  switch (rule.kind) {
    case "seq":
    case "sor":
      rule.rules.forEach((item) => visitRules(item, visitor));
      return;
    case "star":
    case "plus":
    case "opt":
    case "repOpt":
    case "at":
    case "notAt":
    case "must":
    case "disable":
      visitRules(rule.rule, visitor);
      return;
    case "until":
      visitRules(rule.cond, visitor);
      if (rule.body) {
        visitRules(rule.body, visitor);
      }
      return;
    default:
      return;
  }
}

function findLeftRecursion(start: string, graph: ReadonlyMap<string, Set<string>>): string[] | null {
  // depth-first search for a path back to `start`
  const visited = new Set<string>();
  const path: string[] = [start];

  const search = (name: string): boolean => {
    for (const next of graph.get(name) ?? []) {
      if (next === start) {
        path.push(next);
        return true;
      }
      if (visited.has(next)) {
        continue;
      }
      visited.add(next);
      path.push(next);
      if (search(next)) {
        return true;
      }
      path.pop();
    }
    return false;
  };

  return search(start) ? path : null;
}

export function analyzeGrammar(grammar: PegGrammar): GrammarAnalysis {
  const issues: GrammarIssue[] = [];
  const nullable = computeNullable(grammar);

  if (!grammar.rules.has(grammar.start)) {
    issues.push({
      kind: "undefined-rule",
      rule: grammar.start,
      message: `start rule '${grammar.start}' is not defined`,
    });
  }

  const graph = new Map<string, Set<string>>();
  for (const [name, rule] of grammar.rules) {
    const leading = new Set<string>();
    collectLeadingRefs(rule, nullable, leading);
    graph.set(name, leading);

    visitRules(rule, (node) => {
      switch (node.kind) {
        case "ref":
          if (!grammar.rules.has(node.name)) {
            issues.push({
              kind: "undefined-rule",
              rule: name,
              message: `rule '${name}' references undefined rule '${node.name}'`,
            });
          }
          break;
        case "star":
        case "plus":
        case "repOpt":
          if (canMatchEmpty(node.rule, nullable)) {
            issues.push({
              kind: "empty-loop",
              rule: name,
              message: `rule '${name}' repeats '${describeRule(node.rule)}', which can match empty`,
            });
          }
          break;
        case "until":
          if (node.body && canMatchEmpty(node.body, nullable)) {
            issues.push({
              kind: "empty-loop",
              rule: name,
              message: `rule '${name}' has an until body '${describeRule(node.body)}' that can match empty`,
            });
          }
          break;
      }
    });
  }

  for (const name of grammar.rules.keys()) {
    const cycle = findLeftRecursion(name, graph);
    if (cycle) {
      issues.push({
        kind: "left-recursion",
        rule: name,
        message: `left recursion: ${cycle.join(" -> ")}`,
      });
    }
  }

  const nullableRules = [...nullable.entries()].filter(([, isNullable]) => isNullable).map(([name]) => name);
  return { ruleCount: grammar.ruleCount, nullableRules, issues };
}

const checkedGrammars = new WeakSet<PegGrammar>();

// Throws GrammarDefectError if the grammar has any structural issue. Each grammar is checked once.
export function assertGrammarWellFormed(grammar: PegGrammar): void {
  if (checkedGrammars.has(grammar)) {
    return;
  }
  const analysis = analyzeGrammar(grammar);
  if (analysis.issues.length > 0) {
    const details = analysis.issues.map((issue) => `  ${issue.message}`).join("\n");
    throw new GrammarDefectError(`Grammar has ${analysis.issues.length} structural issue(s):\n${details}`, analysis.issues);
  }
  checkedGrammars.add(grammar);
}
