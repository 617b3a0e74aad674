import chalk from "chalk";
import { appendFileSync } from "node:fs";

export type Verbosity = "quiet" | "normal" | "verbose";

let logFilePath: string | null = null;
let verbosity: Verbosity = "normal";

function isTestEnv(): boolean {
  return process.env.NODE_ENV === "test" || process.env.JEST_WORKER_ID !== undefined;
}

// diagnostics go to stderr so `cartfix fix` can write the fixed code to stdout.
function consoleLogExceptInTestEnv(message: string): void {
  if (!isTestEnv()) {
    process.stderr.write(`${message}\n`);
  }
}

export function setLogFile(filePath: string | null): void {
  logFilePath = filePath;
}

export function setVerbosity(level: Verbosity): void {
  verbosity = level;
}

function writeToLog(level: string, message: string): void {
  if (!logFilePath) {
    return;
  }

  const timestamp = new Date().toISOString();
  const logLine = `[${timestamp}] [${level}] ${message}\n`;
  appendFileSync(logFilePath, logLine, "utf-8");
}

export function success(message: string): void {
  if (verbosity !== "quiet") {
    consoleLogExceptInTestEnv(chalk.green(message));
  }
  writeToLog("SUCCESS", message);
}

export function error(message: string): void {
  consoleLogExceptInTestEnv(chalk.red(message));
  writeToLog("ERROR", message);
}

export function warning(message: string): void {
  consoleLogExceptInTestEnv(chalk.bgHex(`#FFA500`).black(`WARNING: ${message}`));
  writeToLog("WARNING", message);
}

export function info(message: string): void {
  if (verbosity !== "quiet") {
    consoleLogExceptInTestEnv(chalk.blue(message));
  }
  writeToLog("INFO", message);
}

// per-occurrence detail; only shown when verbose, always written to the log file.
export function dim(message: string): void {
  if (verbosity === "verbose") {
    consoleLogExceptInTestEnv(chalk.gray(message));
  }
  writeToLog("DEBUG", message);
}

export function h1(message: string): void {
  if (verbosity !== "quiet") {
    consoleLogExceptInTestEnv(chalk.cyanBright(message));
  }
  writeToLog("INFO", message);
}
