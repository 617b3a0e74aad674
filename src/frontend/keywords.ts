import * as cons from "../utils/console";
import { getBuiltinIdentifiers, kBuiltinGroupOrder, kBuiltinGroups, kLuaKeywords } from "../utils/lua/lua_keywords";

// plain lists on stdout, for editor integrations
export async function keywordsCommand(): Promise<void> {
  cons.h1("Keywords:");
  process.stdout.write(`${kLuaKeywords.join(" ")}\n`);

  for (const group of kBuiltinGroupOrder) {
    cons.h1(`Built-ins (${kBuiltinGroups[group]}):`);
    process.stdout.write(`${getBuiltinIdentifiers(group).join(" ")}\n`);
  }
}
