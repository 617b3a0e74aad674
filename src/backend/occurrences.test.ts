import { NotEqualOccurrences, OccurrencesByOffset } from "./occurrences";

describe("NotEqualOccurrences", () => {
  it("should keep offsets recorded in increasing order", () => {
    const occurrences = new NotEqualOccurrences();
    occurrences.record(3);
    occurrences.record(10);
    occurrences.record(20);

    expect(occurrences.values()).toEqual([3, 10, 20]);
    expect(occurrences.count).toBe(3);
  });

  it("should drop every offset at or past a re-matched one", () => {
    const occurrences = new NotEqualOccurrences();
    occurrences.record(10);
    occurrences.record(20);
    occurrences.record(15);

    expect(occurrences.values()).toEqual([10, 15]);

    occurrences.record(10);
    expect(occurrences.values()).toEqual([10]);

    occurrences.record(5);
    expect(occurrences.values()).toEqual([5]);
  });

  it("should clear", () => {
    const occurrences = new NotEqualOccurrences();
    occurrences.record(1);
    occurrences.clear();

    expect(occurrences.values()).toEqual([]);
    expect(occurrences.count).toBe(0);
  });
});

describe("OccurrencesByOffset", () => {
  type Item = { offset: number; text: string };

  it("should keep one record per offset, sorted by offset", () => {
    const occurrences = new OccurrencesByOffset<Item>();

    expect(occurrences.record({ offset: 18, text: "inner" })).toBe(true);
    expect(occurrences.record({ offset: 0, text: "outer" })).toBe(true);
    expect(occurrences.record({ offset: 18, text: "inner again" })).toBe(false);

    expect(occurrences.count).toBe(2);
    expect(occurrences.values()).toEqual([
      { offset: 0, text: "outer" },
      { offset: 18, text: "inner again" },
    ]);
  });
});
