import { CodeAnalysis } from "../backend/codeFixer";
import * as cons from "../utils/console";
import { PegSyntaxError } from "../utils/peg/peg_parser";
import { createFixer, loadSource } from "./core";
import { CommandLineOptions } from "./parseOptions";

// Analysis only: reports what `fix` would change, writes nothing.
export async function checkCommand(inputPath: string, options?: CommandLineOptions): Promise<void> {
  const source = await loadSource(inputPath, options);
  const fixer = createFixer(source);

  cons.h1(`Checking ${inputPath}`);
  let analysis: CodeAnalysis;
  try {
    analysis = fixer.analyze();
  } catch (error) {
    if (error instanceof PegSyntaxError) {
      cons.error(error.message);
      process.exitCode = 1;
      return;
    }
    throw error;
  }

  for (const offset of analysis.notEquals) {
    cons.info(`  != at byte ${offset}`);
  }
  for (const occurrence of analysis.reassignments) {
    const text = fixer.code.slice(occurrence.offset, occurrence.offset + occurrence.length);
    cons.info(`  compound assignment at ${occurrence.line}:${occurrence.byteInLine + 1}: ${text}`);
  }

  const summary =
    `${analysis.notEquals.length} not-equal operator(s), ` +
    `${analysis.reassignments.length} compound assignment(s), ` +
    `${analysis.unsupported.length} unsupported short if(s)`;
  if (analysis.unsupported.length > 0) {
    cons.warning(summary);
  } else {
    cons.success(summary);
  }
}
