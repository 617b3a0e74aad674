import { assert } from "../utils/errorHandling";
import { LineIndex } from "../utils/textPosition";
import { ReassignmentOccurrence } from "./occurrences";

const kCompoundOperators = "+-*/%";

// `!=` -> `~=`, in place. Fixed width, so every offset stays valid whatever the order.
export function replaceNotEquals(code: string, offsets: readonly number[]): string {
  if (offsets.length === 0) {
    return code;
  }
  const chars = code.split("");
  for (const offset of offsets) {
    assert(chars[offset] === "!", `replaceNotEquals: expected '!' at offset ${offset}, found '${chars[offset]}'`);
    chars[offset] = "~";
  }
  return chars.join("");
}

// index of the `=` of the first compound operator in [start, end), or -1.
// Used when an occurrence carries no operator offset.
export function findCompoundOperator(code: string, start: number, end: number): number {
  for (let i = start + 1; i < end; i++) {
    if (code[i] === "=" && kCompoundOperators.includes(code[i - 1])) {
      return i;
    }
  }
  return -1;
}

type PendingSpan = {
  start: number;
  end: number;
  operatorAt: number | null;
  line: number;
};

// `lhs op= rhs` -> `lhs=lhs op(rhs)`.
//
// Spans are resolved against the line structure of `code`, then rewritten from the last one
// to the first so no edit moves a start that is still pending. An edit inside a pending span
// (a compound assignment nested in a function literal on either side) grows that span's end,
// and its operator position when the edit lies before it, by the same amount. Only
// non-newline characters are inserted, so the line count is preserved; lines without an
// occurrence are untouched.
export function lowerReassignments(code: string, occurrences: readonly ReassignmentOccurrence[]): string {
  if (occurrences.length === 0) {
    return code;
  }

  const lines = new LineIndex(code);
  const spans: PendingSpan[] = occurrences
    .map((occurrence) => {
      const start = lines.toOffset(occurrence.line, occurrence.byteInLine);
      const operatorAt =
        occurrence.operatorOffset === undefined ? null : start + occurrence.operatorOffset - occurrence.offset;
      return { start, end: start + occurrence.length, operatorAt, line: occurrence.line };
    })
    .sort((a, b) => b.start - a.start);

  let out = code;
  for (let i = 0; i < spans.length; i++) {
    const span = spans[i];
    let operatorAt: number;
    if (span.operatorAt === null) {
      const scanned = findCompoundOperator(out, span.start, span.end);
      assert(scanned >= 0, `lowerReassignments: no compound operator in span at line ${span.line}`);
      operatorAt = scanned - 1;
    } else {
      operatorAt = span.operatorAt;
    }
    const equalsAt = operatorAt + 1;
    const isOperator = kCompoundOperators.includes(out[operatorAt]) && out[equalsAt] === "=";
    assert(
      isOperator && operatorAt >= span.start && equalsAt < span.end,
      `lowerReassignments: no compound operator at offset ${operatorAt} in span at line ${span.line}`,
    );

    // the target is repeated; a line break inside it would add a line.
    const target = out.slice(span.start, operatorAt).replace(/\r?\n/g, " ");
    const value = out.slice(equalsAt + 1, span.end);
    const replacement = `=${target}${out[operatorAt]}(${value})`;

    out = out.slice(0, operatorAt) + replacement + out.slice(span.end);

    const growth = replacement.length - (span.end - operatorAt);
    for (let j = i + 1; j < spans.length; j++) {
      const pending = spans[j];
      if (pending.end > span.start) {
        pending.end += growth;
      }
      if (pending.operatorAt !== null && pending.operatorAt > span.start) {
        pending.operatorAt += growth;
      }
    }
  }

  return out;
}
