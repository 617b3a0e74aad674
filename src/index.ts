#!/usr/bin/env node

import { Command } from "commander";
import { checkCommand } from "./frontend/check";
import { fixCommand } from "./frontend/fix";
import { grammarCommand } from "./frontend/grammar";
import { keywordsCommand } from "./frontend/keywords";
import { CommandLineOptions } from "./frontend/parseOptions";
import * as console from "./utils/console";
import { errorMessage } from "./utils/errorHandling";
import { printHelp, resolveHelpTopic } from "./utils/help";
import { getPackageVersion } from "./utils/versionString";

function addLoggingOptions(command: Command): Command {
  return command
    .option("-c, --config <path>", "Config file, or a directory holding cartfix.jsonc")
    .option("--trace", "Print every grammar rule attempt")
    .option("--no-trace", "Disable tracing set in the config file")
    .option("--verbose", "Print every recognized dialect construct")
    .option("-q, --quiet", "Only print warnings and errors")
    .option("--log-file <file>", "Also write log lines to this file");
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  // Intercept help flags early before Commander processes them
  if (args.length === 0 || (args.length === 1 && (args[0] === "-h" || args[0] === "--help"))) {
    printHelp("main");
    return;
  }
  if (args.length >= 2 && (args.includes("-h") || args.includes("--help"))) {
    const topic = resolveHelpTopic(args[0]);
    if (topic) {
      printHelp(topic);
      return;
    }
  }

  const program = new Command();

  // Disable default help
  program.helpOption(false);
  program.addHelpCommand(false);

  program
    .name("cartfix")
    .description("Lowers fantasy console cartridge Lua to plain Lua 5.3")
    .version(getPackageVersion(), "-v, --version", "Output version information");

  program.option("-h, --help", "Display help information");

  addLoggingOptions(
    program
      .command("fix <input>")
      .alias("f")
      .description("Rewrite != and compound assignments to plain Lua")
      .option("-o, --output <file>", "Output file (default: stdout)")
      .option("--boot-shim", "Patch the if(_update60) boot line")
      .option("--no-boot-shim", "Leave the if(_update60) boot line alone")
      .option("--verify", "Check the result with a plain Lua 5.3 parser")
      .option("--no-verify", "Skip the plain Lua 5.3 check"),
  ).action(async (input: string, options: CommandLineOptions) => {
    await fixCommand(input, options);
  });

  addLoggingOptions(
    program
      .command("check <input>")
      .alias("c")
      .description("Report dialect constructs without rewriting")
      .option("--boot-shim", "Patch the if(_update60) boot line before parsing")
      .option("--no-boot-shim", "Parse the if(_update60) boot line as is"),
  ).action(async (input: string, options: CommandLineOptions) => {
    await checkCommand(input, options);
  });

  program
    .command("grammar")
    .alias("g")
    .description("Run the grammar self-check")
    .option("--verbose", "List rules that can match empty input")
    .action(async (options: CommandLineOptions) => {
      if (options.verbose) {
        console.setVerbosity("verbose");
      }
      await grammarCommand();
    });

  program
    .command("keywords")
    .alias("k")
    .description("List keywords and built-in identifiers")
    .action(async () => {
      await keywordsCommand();
    });

  program
    .command("help [command]")
    .description("Show help information")
    .action((command?: string) => {
      if (!command) {
        printHelp("main");
        return;
      }
      const topic = resolveHelpTopic(command);
      if (!topic) {
        console.error(`Unknown command: ${command}`);
        process.stdout.write("\n");
        printHelp("main");
        process.exitCode = 1;
        return;
      }
      printHelp(topic);
    });

  await program.parseAsync(args, { from: "user" });
}

main().catch((error: unknown) => {
  console.error(errorMessage(error));
  process.exit(1);
});
