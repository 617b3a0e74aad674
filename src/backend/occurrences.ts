// Positions of dialect constructs found during the analysis parse.
// The parser backtracks and fires actions on paths it later abandons, so both
// recorders reconcile new matches against what they already hold.

export type ReassignmentOccurrence = {
  line: number; // 1-based
  byteInLine: number; // 0-based
  length: number;
  offset: number; // absolute start, used for ordering
  // absolute offset of the operator's first character; when absent the rewrite scans for it
  operatorOffset?: number;
};

export type UnsupportedConstruct = {
  kind: "short-if";
  line: number;
  column: number; // 1-based
  text: string;
  offset: number;
};

// Offsets of `!=` tokens. Matches arrive in non-decreasing order along the committed
// parse; a match at or before an earlier recorded one means that one came from an abandoned
// path, so every entry at or past the new offset is dropped before recording it.
export class NotEqualOccurrences {
  private offsets: number[] = [];

  record(offset: number): void {
    while (this.offsets.length > 0 && this.offsets[this.offsets.length - 1] >= offset) {
      this.offsets.pop();
    }
    this.offsets.push(offset);
  }

  clear(): void {
    this.offsets = [];
  }

  values(): number[] {
    return [...this.offsets];
  }

  get count(): number {
    return this.offsets.length;
  }
}

// Statement-level occurrences, keyed by start offset. Nested statements (a function literal on
// the right-hand side) complete before their parent, so offsets are not monotonic here; a
// re-match of the same statement replaces the earlier record instead.
export class OccurrencesByOffset<T extends { offset: number }> {
  private byOffset = new Map<number, T>();

  // returns false when the offset was already recorded
  record(occurrence: T): boolean {
    const isNew = !this.byOffset.has(occurrence.offset);
    this.byOffset.set(occurrence.offset, occurrence);
    return isNew;
  }

  clear(): void {
    this.byOffset.clear();
  }

  // sorted by start offset
  values(): T[] {
    return [...this.byOffset.values()].sort((a, b) => a.offset - b.offset);
  }

  get count(): number {
    return this.byOffset.size;
  }
}
