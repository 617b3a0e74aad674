import * as fs from "node:fs";
import * as path from "node:path";
import { findPackageRoot } from "./fileSystem";

let cachedVersion: string | undefined;

function readVersionField(packageJsonText: string): string {
  const parsed: unknown = JSON.parse(packageJsonText);
  if (typeof parsed === "object" && parsed !== null && "version" in parsed && typeof parsed.version === "string") {
    return parsed.version;
  }
  return "unknown";
}

// Version tag is like:
// - v0.1.0
// - unknown
export function getPackageVersion(): string {
  if (cachedVersion === undefined) {
    try {
      const text = fs.readFileSync(path.join(findPackageRoot(), "package.json"), "utf-8");
      const version = readVersionField(text);
      cachedVersion = version === "unknown" ? version : `v${version}`;
    } catch {
      cachedVersion = "unknown";
    }
  }
  return cachedVersion;
}
