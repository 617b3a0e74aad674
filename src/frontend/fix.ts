import { OutputVerificationError } from "../backend/luaVerify";
import * as cons from "../utils/console";
import { writeTextFile } from "../utils/fileSystem";
import { PegSyntaxError } from "../utils/peg/peg_parser";
import { createFixer, loadSource } from "./core";
import { CommandLineOptions } from "./parseOptions";

export async function fixCommand(inputPath: string, options?: CommandLineOptions): Promise<void> {
  const startTime = Date.now();
  const source = await loadSource(inputPath, options);
  const fixer = createFixer(source);

  cons.h1(`Fixing ${inputPath}`);
  let fixed: string;
  try {
    fixed = fixer.fix();
  } catch (error) {
    if (error instanceof PegSyntaxError || error instanceof OutputVerificationError) {
      cons.error(error.message);
      process.exitCode = 1;
      return;
    }
    throw error;
  }

  if (options?.output) {
    await writeTextFile(options.output, fixed);
    cons.success(`Fixed code written to ${options.output} (${Date.now() - startTime}ms)`);
  } else {
    // one char per input byte; see readTextFileAsync
    process.stdout.write(fixed, "latin1");
  }
}
