// offset <-> line/column lookups over a fixed text.
// lines are 1-based, byteInLine is 0-based (one character is one byte for latin1 text).

export type TextPosition = {
  line: number;
  byteInLine: number;
};

export class LineIndex {
  private readonly lineStarts: number[] = [0];

  constructor(readonly text: string) {
    for (let i = 0; i < text.length; i++) {
      if (text[i] === "\n") {
        this.lineStarts.push(i + 1);
      }
    }
  }

  get lineCount(): number {
    return this.lineStarts.length;
  }

  // start offset of a 1-based line
  lineStart(line: number): number {
    if (line < 1 || line > this.lineStarts.length) {
      throw new RangeError(`Line out of range: ${line} (text has ${this.lineStarts.length} lines)`);
    }
    return this.lineStarts[line - 1];
  }

  toOffset(line: number, byteInLine: number): number {
    return this.lineStart(line) + byteInLine;
  }

  positionOf(offset: number): TextPosition {
    let lo = 0;
    let hi = this.lineStarts.length - 1;
    while (lo < hi) {
      const mid = (lo + hi + 1) >> 1;
      if (this.lineStarts[mid] <= offset) {
        lo = mid;
      } else {
        hi = mid - 1;
      }
    }
    return { line: lo + 1, byteInLine: offset - this.lineStarts[lo] };
  }

  // text of the line containing offset, from offset to the end of line.
  restOfLine(offset: number): string {
    const eol = this.text.indexOf("\n", offset);
    const end = eol < 0 ? this.text.length : eol;
    return this.text.slice(offset, end).replace(/\r$/, "");
  }
}

export function countLines(text: string): number {
  let count = 1;
  for (let i = 0; i < text.length; i++) {
    if (text[i] === "\n") {
      count++;
    }
  }
  return count;
}
