////////////////////////////////////////////////////////////////////////////////////////////////////////////////
// error handling / assert / result stuff
export type Ok<T> = {
  ok: true;
  value: T;
};
export type Err = {
  ok: false;
  error: string;
};
export type Result<T> = Ok<T> | Err;

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<T = never>(error: string): Result<T> {
  return { ok: false, error };
}

// an analysis / rewrite inconsistency; always a bug, never bad input.
export class InvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvariantError";
  }
}

export function assert(condition: boolean = true, message: string = "Assertion failed"): asserts condition {
  if (!condition) {
    console.error("Assertion failed:", message);
    throw new InvariantError(message);
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
