import { writeFileSync } from "node:fs";
import { CodeFixer } from "../backend/codeFixer";
import { resolveAndLoadConfig } from "../backend/configLoader";
import * as cons from "../utils/console";
import { readTextFileAsync } from "../utils/fileSystem";
import { PegTraceEvent } from "../utils/peg/peg_parser";
import { LineIndex } from "../utils/textPosition";
import { CommandLineOptions, FixSettings, resolveFixSettings } from "./parseOptions";

export type LoadedSource = {
  inputPath: string;
  code: string;
  settings: FixSettings;
};

export function formatTraceEvent(event: PegTraceEvent, lines: LineIndex): string {
  const { line, byteInLine } = lines.positionOf(event.offset);
  return `${"  ".repeat(event.depth)}${event.type} ${event.rule} @${line}:${byteInLine + 1}`;
}

// Loads config + input, and applies the logging settings. Everything the fix and check commands share.
export async function loadSource(inputPath: string, options?: CommandLineOptions): Promise<LoadedSource> {
  const loadedConfig = resolveAndLoadConfig(options?.config);
  const settings = resolveFixSettings(loadedConfig, options);

  cons.setVerbosity(settings.verbosity);
  if (settings.logFile) {
    // start from scratch; the log only describes the latest run.
    writeFileSync(settings.logFile, "", "utf-8");
  }
  cons.setLogFile(settings.logFile);

  if (loadedConfig) {
    cons.dim(`Config loaded from ${loadedConfig.filePath}`);
  }

  const code = await readTextFileAsync(inputPath);
  return { inputPath, code, settings };
}

export function createFixer(source: LoadedSource): CodeFixer {
  let lines: LineIndex | undefined;
  const trace = (event: PegTraceEvent) => {
    // positions refer to the patched code the parser actually sees
    if (!lines) {
      lines = new LineIndex(fixer.code);
    }
    cons.info(formatTraceEvent(event, lines));
  };
  const fixer = new CodeFixer(source.code, {
    bootShim: source.settings.bootShim,
    verifyOutput: source.settings.verifyOutput,
    sourceName: source.inputPath,
    trace: source.settings.trace ? trace : undefined,
  });
  if (fixer.bootShimApplied) {
    cons.info("Boot shim patched");
  }
  return fixer;
}
