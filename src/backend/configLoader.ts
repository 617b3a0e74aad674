import Ajv from "ajv";
import * as fs from "fs";
import { parse as parseJsonc, ParseError, printParseErrorCode } from "jsonc-parser";
import * as path from "path";

import configSchema from "../../cartfix.schema.json";

import { canonicalizePath, isDirectory } from "../utils/fileSystem";

export const kConfigFileName = "cartfix.jsonc";

export type CartfixConfig = {
  bootShim?: boolean;
  verifyOutput?: boolean;
  trace?: boolean;
  verbose?: boolean;
  logFile?: string;
};

export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public errors: unknown[],
  ) {
    super(message);
    this.name = "ConfigValidationError";
  }
}

export class ConfigLoadError extends Error {
  constructor(
    message: string,
    public cause?: Error,
  ) {
    super(message);
    this.name = "ConfigLoadError";
  }
}

export interface LoadedConfig {
  config: CartfixConfig;
  filePath: string;
  configDir: string;
}

const ajv = new Ajv({ allErrors: true });
const validateConfig = ajv.compile<CartfixConfig>(configSchema);

export function findConfigInDirectory(directory: string): string | undefined {
  const candidate = path.join(directory, kConfigFileName);
  return fs.existsSync(candidate) ? candidate : undefined;
}

export function parseConfig(text: string, filePath: string): CartfixConfig {
  const parseErrors: ParseError[] = [];
  const parsed: unknown = parseJsonc(text, parseErrors, { allowTrailingComma: true });
  if (parseErrors.length > 0) {
    const first = parseErrors[0];
    throw new ConfigLoadError(
      `Failed to parse config file: ${filePath} (${printParseErrorCode(first.error)} at offset ${first.offset})`,
    );
  }

  if (!validateConfig(parsed)) {
    const errorMessages = validateConfig.errors?.map((err) => `${err.instancePath || "/"} ${err.message}`) || [];
    throw new ConfigValidationError(
      `Config validation failed: ${filePath}\n${errorMessages.join("\n")}`,
      validateConfig.errors || [],
    );
  }
  return parsed;
}

export function loadConfig(filePath: string): LoadedConfig {
  let fileContent: string;
  try {
    fileContent = fs.readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new ConfigLoadError(`Failed to read config file: ${filePath}`, error instanceof Error ? error : undefined);
  }

  const config = parseConfig(fileContent, filePath);
  const absolutePath = path.resolve(filePath);
  return { config, filePath: absolutePath, configDir: path.dirname(absolutePath) };
}

// configPath - config file or a directory holding cartfix.jsonc; relative to cwd.
// Without it, cartfix.jsonc in the cwd is used if present. An explicit path must exist.
export function resolveAndLoadConfig(configPath?: string | undefined): LoadedConfig | undefined {
  if (configPath) {
    const absolutePath = path.resolve(configPath);
    if (!isDirectory(absolutePath)) {
      return loadConfig(canonicalizePath(absolutePath));
    }
    const foundPath = findConfigInDirectory(absolutePath);
    if (!foundPath) {
      throw new ConfigLoadError(`No ${kConfigFileName} found in directory: ${absolutePath}`);
    }
    return loadConfig(canonicalizePath(foundPath));
  }

  const foundPath = findConfigInDirectory(process.cwd());
  return foundPath ? loadConfig(canonicalizePath(foundPath)) : undefined;
}
