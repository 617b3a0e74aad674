import builtins from "./lua_builtins.json";

// Reserved words, in the order Lua's own lexer lists them.
export const kLuaKeywords = [
  "and",
  "break",
  "do",
  "else",
  "elseif",
  "end",
  "false",
  "for",
  "function",
  "goto",
  "if",
  "in",
  "local",
  "nil",
  "not",
  "or",
  "repeat",
  "return",
  "then",
  "true",
  "until",
  "while",
] as const;

export type LuaKeyword = (typeof kLuaKeywords)[number];

// Order for an ordered choice: a keyword that is a prefix of another comes after it ("else" / "elseif").
export function keywordsInMatchOrder(): LuaKeyword[] {
  return [...kLuaKeywords].sort((a, b) => b.length - a.length || a.localeCompare(b));
}

export type BuiltinGroup = keyof typeof builtins;

export const kBuiltinGroups: Record<BuiltinGroup, string> = {
  library: "math and bitwise library",
  vm: "console API",
  bios: "BIOS helpers",
  planned: "not implemented yet",
};

export const kBuiltinGroupOrder: readonly BuiltinGroup[] = ["library", "vm", "bios", "planned"];

// Built-in function names of the console, for display (editor highlighting, CLI listing).
export function getBuiltinIdentifiers(group?: BuiltinGroup): string[] {
  if (group) {
    return [...builtins[group]];
  }
  return kBuiltinGroupOrder.flatMap((name) => builtins[name]);
}
