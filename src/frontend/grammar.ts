import * as cons from "../utils/console";
import { getLua53Grammar } from "../utils/lua/lua53_grammar";
import { analyzeGrammar } from "../utils/peg/peg_analyze";

export async function grammarCommand(): Promise<void> {
  const analysis = analyzeGrammar(getLua53Grammar());

  cons.h1("Grammar self-check");
  cons.info(`  ${analysis.ruleCount} rules, ${analysis.nullableRules.length} can match empty input`);
  cons.dim(`  nullable: ${analysis.nullableRules.join(", ")}`);

  if (analysis.issues.length === 0) {
    cons.success("No structural issues found.");
    return;
  }
  for (const issue of analysis.issues) {
    cons.error(`  ${issue.kind}: ${issue.message}`);
  }
  process.exitCode = 1;
}
