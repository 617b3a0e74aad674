import * as path from "node:path";
import { LoadedConfig } from "../backend/configLoader";
import { Verbosity } from "../utils/console";

// as commander hands them over; absent flags are undefined so the config file can fill them in.
export interface CommandLineOptions {
  config?: string;
  output?: string;
  bootShim?: boolean;
  verify?: boolean;
  trace?: boolean;
  verbose?: boolean;
  quiet?: boolean;
  logFile?: string;
}

export type FixSettings = {
  bootShim: boolean;
  verifyOutput: boolean;
  trace: boolean;
  verbosity: Verbosity;
  logFile: string | null;
};

// command line > config file > defaults
export function resolveFixSettings(loaded: LoadedConfig | undefined, cmd: CommandLineOptions = {}): FixSettings {
  const config = loaded?.config ?? {};

  let logFile: string | null = null;
  if (cmd.logFile) {
    logFile = path.resolve(cmd.logFile);
  } else if (loaded && config.logFile) {
    logFile = path.resolve(loaded.configDir, config.logFile);
  }

  let verbosity: Verbosity = "normal";
  if (cmd.quiet) {
    verbosity = "quiet";
  } else if (cmd.verbose ?? config.verbose) {
    verbosity = "verbose";
  }

  return {
    bootShim: cmd.bootShim ?? config.bootShim ?? true,
    verifyOutput: cmd.verify ?? config.verifyOutput ?? false,
    trace: cmd.trace ?? config.trace ?? false,
    verbosity,
    logFile,
  };
}
