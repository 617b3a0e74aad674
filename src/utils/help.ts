import * as fs from "node:fs";
import * as path from "node:path";
import { findPackageRoot } from "./fileSystem";
import { getPackageVersion } from "./versionString";
import { applyTemplateVariables } from "./templates";

export type HelpTopic = "main" | "fix" | "check" | "grammar" | "keywords";

const kCommandAliases: Record<string, HelpTopic> = {
  fix: "fix",
  f: "fix",
  check: "check",
  c: "check",
  grammar: "grammar",
  g: "grammar",
  keywords: "keywords",
  k: "keywords",
};

// command name or alias -> help topic
export function resolveHelpTopic(command: string): HelpTopic | undefined {
  return kCommandAliases[command];
}

function loadHelpTemplate(templateName: HelpTopic): string {
  const templatePath = path.join(findPackageRoot(), "templates", "help", `${templateName}.txt`);
  if (!fs.existsSync(templatePath)) {
    throw new Error(`Help template not found: ${templatePath}`);
  }
  return fs.readFileSync(templatePath, "utf-8");
}

export function renderHelpTemplate(templateName: HelpTopic): string {
  const template = loadHelpTemplate(templateName);
  return applyTemplateVariables(template, {
    VERSION: getPackageVersion(),
  });
}

export function printHelp(topic: HelpTopic = "main"): void {
  console.log(renderHelpTemplate(topic));
}
