import * as cons from "../utils/console";
import { Result, err, ok } from "../utils/errorHandling";
import { kLua53Rules, getLua53Grammar } from "../utils/lua/lua53_grammar";
import { assertGrammarWellFormed } from "../utils/peg/peg_analyze";
import { PegActions, PegSyntaxError, PegTraceEvent, parsePeg } from "../utils/peg/peg_parser";
import { applyBootShim } from "./bootShim";
import { lowerReassignments, replaceNotEquals } from "./codeRewrite";
import { OutputVerificationError, verifyLuaSyntax } from "./luaVerify";
import {
  NotEqualOccurrences,
  OccurrencesByOffset,
  ReassignmentOccurrence,
  UnsupportedConstruct,
} from "./occurrences";

export type CodeFixerOptions = {
  // rewrite the `if(_update60)_update=function()` line some exporters append (default true)
  bootShim?: boolean;
  // re-parse the fixed code as plain Lua 5.3 before returning it
  verifyOutput?: boolean;
  sourceName?: string;
  trace?: (event: PegTraceEvent) => void;
};

export type CodeAnalysis = {
  notEquals: number[];
  reassignments: ReassignmentOccurrence[];
  unsupported: UnsupportedConstruct[];
};

// written only by the analysis actions, reset at the start of every analysis.
type AnalysisContext = {
  notEquals: NotEqualOccurrences;
  reassignments: OccurrencesByOffset<ReassignmentOccurrence>;
  compoundOperators: Set<number>;
  unsupported: OccurrencesByOffset<UnsupportedConstruct>;
};

// Operator of the compound assignment spanning [begin, end). Compound assignments nested in a
// function literal on either side complete first, so every other operator in the span lies
// inside one of their recorded spans.
function findOwnOperator(context: AnalysisContext, begin: number, end: number): number | undefined {
  const nested = context.reassignments.values().filter((o) => o.offset > begin && o.offset < end);
  return [...context.compoundOperators]
    .filter((offset) => offset >= begin && offset < end)
    .sort((a, b) => a - b)
    .find((offset) => !nested.some((o) => offset >= o.offset && offset < o.offset + o.length));
}

const kAnalysisActions: PegActions<AnalysisContext> = {
  [kLua53Rules.shortIf]: (match, context) => {
    const isNew = context.unsupported.record({
      kind: "short-if",
      line: match.line,
      column: match.byteInLine + 1,
      text: match.text,
      offset: match.begin,
    });
    if (isNew) {
      cons.warning(`unsupported short if statement at line ${match.line}:${match.byteInLine + 1}: ${match.text}`);
    }
  },

  [kLua53Rules.compoundAssignment]: (match, context) => {
    const length = match.contentEnd - match.begin;
    cons.dim(
      `reassignment operator ${match.line}:${match.byteInLine} byte ${match.begin}: ${match.text.slice(0, length)}`,
    );
    context.reassignments.record({
      line: match.line,
      byteInLine: match.byteInLine,
      length,
      offset: match.begin,
      operatorOffset: findOwnOperator(context, match.begin, match.contentEnd),
    });
  },

  [kLua53Rules.compoundOperator]: (match, context) => {
    context.compoundOperators.add(match.begin);
  },

  [kLua53Rules.notEqual]: (match, context) => {
    cons.dim(`not equal operator ${match.line}:${match.byteInLine} byte ${match.begin}`);
    context.notEquals.record(match.begin);
  },
};

// Lowers the cartridge dialect (`!=`, compound assignment) to plain Lua 5.3.
// One instance per source; not meant to be shared between concurrent callers.
export class CodeFixer {
  readonly code: string;
  readonly bootShimApplied: boolean;
  private readonly context: AnalysisContext = {
    notEquals: new NotEqualOccurrences(),
    reassignments: new OccurrencesByOffset<ReassignmentOccurrence>(),
    compoundOperators: new Set<number>(),
    unsupported: new OccurrencesByOffset<UnsupportedConstruct>(),
  };

  constructor(
    code: string,
    private readonly options: CodeFixerOptions = {},
  ) {
    if (options.bootShim ?? true) {
      const shim = applyBootShim(code);
      this.code = shim.code;
      this.bootShimApplied = shim.applied;
    } else {
      this.code = code;
      this.bootShimApplied = false;
    }
  }

  get sourceName(): string {
    return this.options.sourceName ?? "code";
  }

  // Read-only parse of the (patched) code. Throws PegSyntaxError if the code doesn't parse.
  analyze(): CodeAnalysis {
    this.context.notEquals.clear();
    this.context.reassignments.clear();
    this.context.compoundOperators.clear();
    this.context.unsupported.clear();

    cons.dim("Checking grammar");
    assertGrammarWellFormed(getLua53Grammar());

    cons.dim("Checking code");
    parsePeg(getLua53Grammar(), this.code, this.context, {
      sourceName: this.sourceName,
      actions: kAnalysisActions,
      trace: this.options.trace,
    });
    cons.dim("Code seems valid");

    return {
      notEquals: this.context.notEquals.values(),
      reassignments: this.context.reassignments.values(),
      unsupported: this.context.unsupported.values(),
    };
  }

  fix(): string {
    const analysis = this.analyze();

    let fixed = replaceNotEquals(this.code, analysis.notEquals);
    fixed = lowerReassignments(fixed, analysis.reassignments);

    if (this.options.verifyOutput) {
      verifyLuaSyntax(fixed, this.sourceName);
    }
    return fixed;
  }
}

export function fixCartridgeCode(code: string, options?: CodeFixerOptions): string {
  return new CodeFixer(code, options).fix();
}

// Like fixCartridgeCode, but errors caused by the input (syntax error, failed verification)
// are returned instead of thrown. Grammar defects and internal inconsistencies still throw.
export function tryFixCartridgeCode(code: string, options?: CodeFixerOptions): Result<string> {
  try {
    return ok(fixCartridgeCode(code, options));
  } catch (error) {
    if (error instanceof PegSyntaxError || error instanceof OutputVerificationError) {
      return err(error.message);
    }
    throw error;
  }
}
