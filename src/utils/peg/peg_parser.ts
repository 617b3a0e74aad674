import { LineIndex } from "../textPosition";
import { PegGrammar, PegRule, any, describeRule } from "./peg_rules";

// Backtracking interpreter for PegGrammar.
// Actions fire as soon as a named rule succeeds, even if an enclosing choice later
// abandons that path; callers that record positions must reconcile them themselves.
// A later firing for the same rule and start offset must supersede an earlier one: memoized
// rules replay only the last firing of each match they saw.

export type PegMatch = {
  rule: string;
  begin: number;
  end: number;
  // end of the last non-padding character consumed by the match
  contentEnd: number;
  text: string;
  line: number; // 1-based
  byteInLine: number; // 0-based
};

export type PegAction<TContext> = (match: PegMatch, context: TContext) => void;
export type PegActions<TContext> = Readonly<Record<string, PegAction<TContext> | undefined>>;

export type PegTraceEvent = {
  type: "start" | "success" | "failure";
  rule: string;
  offset: number;
  depth: number;
};

export type PegParseOptions<TContext> = {
  sourceName?: string;
  actions?: PegActions<TContext>;
  trace?: (event: PegTraceEvent) => void;
};

export type PegParseResult = {
  end: number;
};

const kMaxFragmentLength = 32;
const kMaxExpectedLength = 60;

export class PegSyntaxError extends Error {
  constructor(
    message: string,
    readonly sourceName: string,
    readonly line: number,
    readonly column: number,
    readonly offset: number,
    readonly expected: string,
    readonly fragment: string,
  ) {
    super(message);
    this.name = "PegSyntaxError";
  }
}

type ParserMark = {
  pos: number;
  contentEnd: number;
};

type FiredAction<TContext> = {
  action: PegAction<TContext>;
  match: PegMatch;
};

type MemoEntry<TContext> = {
  matched: boolean;
  end: number;
  contentEnd: number | null; // null when the match consumed only padding
  fired: FiredAction<TContext>[];
};

// last firing of each (rule, begin) pair, in firing order.
function latestPerMatch<TContext>(fired: FiredAction<TContext>[]): FiredAction<TContext>[] {
  const seen = new Set<string>();
  const kept: FiredAction<TContext>[] = [];
  for (let i = fired.length - 1; i >= 0; i--) {
    const key = `${fired[i].match.rule}@${fired[i].match.begin}`;
    if (!seen.has(key)) {
      seen.add(key);
      kept.push(fired[i]);
    }
  }
  return kept.reverse();
}

class PegParser<TContext> {
  private pos = 0;
  private contentEnd = 0;
  private lookaheadDepth = 0;
  private disabledDepth = 0;
  private paddingDepth = 0;
  private traceDepth = 0;
  private farthestFailure = -1;
  private readonly fired: FiredAction<TContext>[] = [];
  private readonly memo = new Map<string, MemoEntry<TContext>>();
  private readonly lines: LineIndex;
  private readonly sourceName: string;
  private readonly actions: PegActions<TContext>;

  constructor(
    private readonly grammar: PegGrammar,
    private readonly input: string,
    private readonly context: TContext,
    private readonly options: PegParseOptions<TContext>,
  ) {
    this.lines = new LineIndex(input);
    this.sourceName = options.sourceName ?? "input";
    this.actions = options.actions ?? {};
  }

  run(): PegParseResult {
    if (!this.matchNamed(this.grammar.start)) {
      this.raise(this.grammar.start);
    }
    return { end: this.pos };
  }

  private mark(): ParserMark {
    return { pos: this.pos, contentEnd: this.contentEnd };
  }

  private reset(mark: ParserMark): void {
    this.pos = mark.pos;
    this.contentEnd = mark.contentEnd;
  }

  private advance(count: number): true {
    this.pos += count;
    if (this.paddingDepth === 0) {
      this.contentEnd = this.pos;
    }
    return true;
  }

  private fail(): false {
    if (this.lookaheadDepth === 0 && this.pos > this.farthestFailure) {
      this.farthestFailure = this.pos;
    }
    return false;
  }

  private raise(expected: string): never {
    const offset = Math.max(this.pos, this.farthestFailure);
    const { line, byteInLine } = this.lines.positionOf(offset);
    const fragment = this.lines.restOfLine(offset).slice(0, kMaxFragmentLength);
    const shortExpected =
      expected.length > kMaxExpectedLength ? `${expected.slice(0, kMaxExpectedLength - 3)}...` : expected;
    const near = offset >= this.input.length ? "at end of input" : `near '${fragment}'`;
    throw new PegSyntaxError(
      `${this.sourceName}:${line}:${byteInLine + 1}: parse error matching ${shortExpected} ${near}`,
      this.sourceName,
      line,
      byteInLine + 1,
      offset,
      shortExpected,
      fragment,
    );
  }

  private trace(type: PegTraceEvent["type"], rule: string, offset: number): void {
    this.options.trace?.({ type, rule, offset, depth: this.traceDepth });
  }

  // null when the rule isn't memoized here. Lookahead and disabled matches fire no actions and
  // lookahead failures aren't error candidates, so each state has its own entry.
  private memoKey(name: string, begin: number): string | null {
    if (this.paddingDepth > 0 || !this.grammar.memoized.has(name)) {
      return null;
    }
    const state = this.lookaheadDepth > 0 ? 2 : this.disabledDepth > 0 ? 1 : 0;
    return `${name}@${begin}/${state}`;
  }

  private fire(action: PegAction<TContext>, match: PegMatch): void {
    this.fired.push({ action, match });
    action(match, this.context);
  }

  private replay(name: string, begin: number, entry: MemoEntry<TContext>): boolean {
    if (entry.matched) {
      this.pos = entry.end;
      if (entry.contentEnd !== null) {
        this.contentEnd = entry.contentEnd;
      }
    }
    for (const fired of entry.fired) {
      this.fire(fired.action, fired.match);
    }
    this.trace(entry.matched ? "success" : "failure", name, begin);
    return entry.matched;
  }

  private matchNamed(name: string): boolean {
    const rule = this.grammar.getRule(name);
    if (!rule) {
      throw new Error(`Undefined grammar rule: ${name}`);
    }

    const begin = this.pos;
    const isPadding = this.grammar.padding.has(name);
    this.trace("start", name, begin);

    const memoKey = this.memoKey(name, begin);
    const cached = memoKey === null ? undefined : this.memo.get(memoKey);
    if (cached) {
      return this.replay(name, begin, cached);
    }
    const firedBefore = this.fired.length;
    const contentEndBefore = this.contentEnd;

    this.traceDepth++;
    if (isPadding) {
      this.paddingDepth++;
    }

    let matched: boolean;
    try {
      matched = this.match(rule);
    } finally {
      if (isPadding) {
        this.paddingDepth--;
      }
      this.traceDepth--;
    }

    if (matched) {
      this.trace("success", name, begin);
      const action = this.actions[name];
      if (action && this.disabledDepth === 0) {
        const { line, byteInLine } = this.lines.positionOf(begin);
        this.fire(action, {
          rule: name,
          begin,
          end: this.pos,
          contentEnd: Math.max(begin, this.contentEnd),
          text: this.input.slice(begin, this.pos),
          line,
          byteInLine,
        });
      }
    } else {
      this.trace("failure", name, begin);
    }

    if (memoKey !== null) {
      this.memo.set(memoKey, {
        matched,
        end: this.pos,
        contentEnd: this.contentEnd === contentEndBefore ? null : this.contentEnd,
        fired: latestPerMatch(this.fired.slice(firedBefore)),
      });
    }
    return matched;
  }

  private lookahead(rule: PegRule): boolean {
    const mark = this.mark();
    this.lookaheadDepth++;
    this.disabledDepth++;
    try {
      return this.match(rule);
    } finally {
      this.disabledDepth--;
      this.lookaheadDepth--;
      this.reset(mark);
    }
  }

  private match(rule: PegRule): boolean {
    const input = this.input;
    switch (rule.kind) {
      case "string": {
        if (!rule.ignoreCase) {
          return input.startsWith(rule.text, this.pos) ? this.advance(rule.text.length) : this.fail();
        }
        const candidate = input.slice(this.pos, this.pos + rule.text.length).toLowerCase();
        return candidate === rule.text ? this.advance(rule.text.length) : this.fail();
      }

      case "one": {
        if (this.pos >= input.length) {
          return this.fail();
        }
        const found = rule.chars.includes(input[this.pos]);
        return found !== rule.negate ? this.advance(1) : this.fail();
      }

      case "class":
        if (this.pos >= input.length) {
          return this.fail();
        }
        return rule.test(input[this.pos]) ? this.advance(1) : this.fail();

      case "any":
        return this.pos < input.length ? this.advance(1) : this.fail();

      case "eof":
        return this.pos >= input.length ? true : this.fail();

      case "eol":
        if (input[this.pos] === "\n") {
          return this.advance(1);
        }
        if (input[this.pos] === "\r" && input[this.pos + 1] === "\n") {
          return this.advance(2);
        }
        return this.fail();

      case "seq": {
        const mark = this.mark();
        for (const item of rule.rules) {
          if (!this.match(item)) {
            this.reset(mark);
            return false;
          }
        }
        return true;
      }

      case "sor":
        for (const item of rule.rules) {
          if (this.match(item)) {
            return true;
          }
        }
        return false;

      case "star":
        this.repeat(rule.rule, Number.POSITIVE_INFINITY);
        return true;

      case "plus":
        if (!this.match(rule.rule)) {
          return false;
        }
        this.repeat(rule.rule, Number.POSITIVE_INFINITY);
        return true;

      case "opt":
        this.match(rule.rule);
        return true;

      case "repOpt":
        this.repeat(rule.rule, rule.max);
        return true;

      case "at":
        return this.lookahead(rule.rule);

      case "notAt":
        return this.lookahead(rule.rule) ? this.fail() : true;

      case "must":
        if (!this.match(rule.rule)) {
          this.raise(describeRule(rule.rule));
        }
        return true;

      case "until":
        return this.matchUntil(rule.cond, rule.body);

      case "longBracket":
        return this.matchLongBracket(rule.open, rule.level, rule.close);

      case "disable":
        this.disabledDepth++;
        try {
          return this.match(rule.rule);
        } finally {
          this.disabledDepth--;
        }

      case "ref":
        return this.matchNamed(rule.name);
    }
  }

  private repeat(rule: PegRule, max: number): void {
    for (let count = 0; count < max; count++) {
      const before = this.pos;
      if (!this.match(rule) || this.pos === before) {
        return;
      }
    }
  }

  private matchUntil(cond: PegRule, body: PegRule | null): boolean {
    const mark = this.mark();
    while (!this.match(cond)) {
      const before = this.pos;
      const progressed = body ? this.match(body) : this.match(any);
      if (!progressed || this.pos === before) {
        this.reset(mark);
        return false;
      }
    }
    return true;
  }

  private matchLongBracket(open: string, level: string, close: string): boolean {
    const input = this.input;
    const mark = this.mark();
    if (input[this.pos] !== open) {
      return this.fail();
    }
    let p = this.pos + 1;
    let levels = 0;
    while (input[p] === level) {
      levels++;
      p++;
    }
    if (input[p] !== open) {
      this.reset(mark);
      return this.fail();
    }

    const closing = close + level.repeat(levels) + close;
    const closeAt = input.indexOf(closing, p + 1);
    if (closeAt < 0) {
      this.pos = p + 1;
      this.farthestFailure = Math.max(this.farthestFailure, input.length);
      this.raise(`${JSON.stringify(closing)} closing long bracket`);
    }
    return this.advance(closeAt + closing.length - this.pos);
  }
}

export function parsePeg<TContext>(
  grammar: PegGrammar,
  input: string,
  context: TContext,
  options: PegParseOptions<TContext> = {},
): PegParseResult {
  return new PegParser(grammar, input, context, options).run();
}
