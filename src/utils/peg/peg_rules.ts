// Rule model for the PEG engine.
// A grammar is a table of named rules; each rule is a tree of these productions.
// Recursion always goes through a `ref` so the table can describe itself.

export type CharPredicate = (ch: string) => boolean;

export type PegRule =
  | { kind: "string"; text: string; ignoreCase: boolean }
  | { kind: "one"; chars: string; negate: boolean }
  | { kind: "class"; label: string; test: CharPredicate }
  | { kind: "any" }
  | { kind: "eof" }
  | { kind: "eol" }
  | { kind: "seq"; rules: PegRule[] }
  | { kind: "sor"; rules: PegRule[] }
  | { kind: "star"; rule: PegRule }
  | { kind: "plus"; rule: PegRule }
  | { kind: "opt"; rule: PegRule }
  | { kind: "repOpt"; max: number; rule: PegRule }
  | { kind: "at"; rule: PegRule }
  | { kind: "notAt"; rule: PegRule }
  | { kind: "must"; rule: PegRule }
  | { kind: "until"; cond: PegRule; body: PegRule | null }
  | { kind: "longBracket"; open: string; level: string; close: string }
  | { kind: "disable"; rule: PegRule }
  | { kind: "ref"; name: string };

export type PegRuleTable = ReadonlyMap<string, PegRule>;

export type PegGrammarOptions = {
  start: string;
  // names of rules whose matches count as padding (whitespace, comments).
  // a match's `contentEnd` excludes trailing padding.
  padding?: string[];
  // names of rules whose result is cached per input position. The actions a cached match
  // fired are replayed on a cache hit, so they must tolerate firing again for the same match.
  memoize?: string[];
};

export class PegGrammar {
  readonly start: string;
  readonly padding: ReadonlySet<string>;
  readonly memoized: ReadonlySet<string>;

  constructor(
    readonly rules: PegRuleTable,
    options: PegGrammarOptions,
  ) {
    this.start = options.start;
    this.padding = new Set(options.padding ?? []);
    this.memoized = new Set(options.memoize ?? []);
  }

  getRule(name: string): PegRule | undefined {
    return this.rules.get(name);
  }

  get ruleCount(): number {
    return this.rules.size;
  }
}

////////////////////////////////////////////////////////////////////////////////////////////////////////////////
// terminals

export function str(text: string): PegRule {
  return { kind: "string", text, ignoreCase: false };
}

export function istr(text: string): PegRule {
  return { kind: "string", text: text.toLowerCase(), ignoreCase: true };
}

export function two(ch: string): PegRule {
  return str(ch + ch);
}

export function one(chars: string): PegRule {
  return { kind: "one", chars, negate: false };
}

export function notOne(chars: string): PegRule {
  return { kind: "one", chars, negate: true };
}

export function charClass(label: string, test: CharPredicate): PegRule {
  return { kind: "class", label, test };
}

export const any: PegRule = { kind: "any" };
export const eof: PegRule = { kind: "eof" };
// "\n" or "\r\n"
export const eol: PegRule = { kind: "eol" };
export const eolf: PegRule = { kind: "sor", rules: [eol, eof] };

export const digit = charClass("digit", (c) => c >= "0" && c <= "9");
export const xdigit = charClass("xdigit", (c) => (c >= "0" && c <= "9") || (c >= "a" && c <= "f") || (c >= "A" && c <= "F"));
export const space = charClass("space", (c) => c === " " || c === "\t" || c === "\n" || c === "\r" || c === "\v" || c === "\f");
export const identifierFirst = charClass("identifier", (c) => (c >= "a" && c <= "z") || (c >= "A" && c <= "Z") || c === "_");
export const identifierOther = charClass("identifier character", (c) => (c >= "a" && c <= "z") || (c >= "A" && c <= "Z") || (c >= "0" && c <= "9") || c === "_");

// `open` `level`* `open` ... `close` `level`* `close`, with the same level count on both sides.
// the opening commits: a missing close bracket is a parse error.
export function longBracket(open: string, level: string, close: string): PegRule {
  return { kind: "longBracket", open, level, close };
}

////////////////////////////////////////////////////////////////////////////////////////////////////////////////
// combinators

function wrap(rules: PegRule[]): PegRule {
  return rules.length === 1 ? rules[0] : { kind: "seq", rules };
}

export function ref(name: string): PegRule {
  return { kind: "ref", name };
}

export function seq(...rules: PegRule[]): PegRule {
  return { kind: "seq", rules };
}

export function sor(...rules: PegRule[]): PegRule {
  return { kind: "sor", rules };
}

export function star(...rules: PegRule[]): PegRule {
  return { kind: "star", rule: wrap(rules) };
}

export function plus(...rules: PegRule[]): PegRule {
  return { kind: "plus", rule: wrap(rules) };
}

export function opt(...rules: PegRule[]): PegRule {
  return { kind: "opt", rule: wrap(rules) };
}

export function repOpt(max: number, ...rules: PegRule[]): PegRule {
  return { kind: "repOpt", max, rule: wrap(rules) };
}

export function at(...rules: PegRule[]): PegRule {
  return { kind: "at", rule: wrap(rules) };
}

export function notAt(...rules: PegRule[]): PegRule {
  return { kind: "notAt", rule: wrap(rules) };
}

// every rule must match; the first that doesn't raises a syntax error naming it.
export function must(...rules: PegRule[]): PegRule {
  const musts: PegRule[] = rules.map((rule) => ({ kind: "must", rule }));
  return wrap(musts);
}

// commit point: once `cond` matched, the rest must match.
export function ifMust(cond: PegRule, ...rules: PegRule[]): PegRule {
  return seq(cond, ...rules.map((rule): PegRule => ({ kind: "must", rule })));
}

// repeats `body` (any single char when omitted) until `cond` matches; consumes `cond`.
export function until(cond: PegRule, ...body: PegRule[]): PegRule {
  return { kind: "until", cond, body: body.length === 0 ? null : wrap(body) };
}

// matches like seq, but no actions fire inside.
export function disable(...rules: PegRule[]): PegRule {
  return { kind: "disable", rule: wrap(rules) };
}

export function pad(rule: PegRule, padding: PegRule): PegRule {
  return seq(star(padding), rule, star(padding));
}

export function padOpt(rule: PegRule, padding: PegRule): PegRule {
  return seq(star(padding), opt(rule, star(padding)));
}

// rule (sep rule)*, separators padded
export function list(rule: PegRule, separator: PegRule, padding: PegRule): PegRule {
  return seq(rule, star(pad(separator, padding), rule));
}

// like list, but a separator commits to another element.
export function listMust(rule: PegRule, separator: PegRule, padding: PegRule): PegRule {
  return seq(rule, star(ifMust(pad(separator, padding), rule)));
}

// like list, with an optional trailing separator.
export function listTail(rule: PegRule, separator: PegRule, padding: PegRule): PegRule {
  return seq(list(rule, separator, padding), opt(star(padding), separator));
}

////////////////////////////////////////////////////////////////////////////////////////////////////////////////

function quoteChar(ch: string): string {
  return JSON.stringify(ch);
}

// Short human readable description, used in syntax errors and analysis reports.
export function describeRule(rule: PegRule): string {
  switch (rule.kind) {
    case "ref":
      return rule.name;
    case "string":
      return quoteChar(rule.text);
    case "one":
      if (rule.chars.length === 1 && !rule.negate) {
        return quoteChar(rule.chars);
      }
      return `${rule.negate ? "none of" : "one of"} ${quoteChar(rule.chars)}`;
    case "class":
      return rule.label;
    case "any":
      return "any character";
    case "eof":
      return "end of input";
    case "eol":
      return "end of line";
    case "longBracket":
      return "long bracket";
    case "seq":
    case "sor":
      return rule.rules.map(describeRule).join(rule.kind === "seq" ? " " : " | ");
    case "star":
      return `(${describeRule(rule.rule)})*`;
    case "plus":
      return `(${describeRule(rule.rule)})+`;
    case "opt":
      return `(${describeRule(rule.rule)})?`;
    case "repOpt":
      return `(${describeRule(rule.rule)}){0,${rule.max}}`;
    case "at":
      return `&(${describeRule(rule.rule)})`;
    case "notAt":
      return `!(${describeRule(rule.rule)})`;
    case "must":
    case "disable":
      return describeRule(rule.rule);
    case "until":
      return `${rule.body ? describeRule(rule.body) : "any character"} until ${describeRule(rule.cond)}`;
  }
}
