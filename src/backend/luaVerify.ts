import * as luaparse from "luaparse";

export class OutputVerificationError extends Error {
  constructor(
    message: string,
    public line: number | null,
    public column: number | null,
  ) {
    super(message);
    this.name = "OutputVerificationError";
  }
}

// Checks that code is plain Lua 5.3, i.e. that nothing of the dialect is left for the interpreter.
export function verifyLuaSyntax(code: string, sourceName: string = "output"): void {
  try {
    luaparse.parse(code, {
      luaVersion: "5.3",
      comments: false,
      scope: false,
      locations: false,
    });
  } catch (error) {
    if (!(error instanceof Error)) {
      throw error;
    }
    const line = "line" in error && typeof error.line === "number" ? error.line : null;
    const column = "column" in error && typeof error.column === "number" ? error.column : null;
    throw new OutputVerificationError(`${sourceName}: fixed code is not valid Lua 5.3: ${error.message}`, line, column);
  }
}
