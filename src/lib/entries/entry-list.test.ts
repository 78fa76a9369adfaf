import { describe, expect, it } from "vitest";
import {
  getEntriesInDateRange,
  getEntryById,
  removeEntry,
  sortEntriesByDate,
  upsertEntry,
} from "./entry-list";
import { ReferenceNotFoundError } from "./errors";
import type { Weight } from "./types";

function makeWeight(id: number, day: number, hour = 7): Weight {
  return { id, dateTime: new Date(2026, 3, day, hour, 0), value: 70 + id / 10 };
}

describe("sortEntriesByDate", () => {
  it("orders ascending and keeps insertion order for equal times", () => {
    const entries = [makeWeight(1, 5), makeWeight(2, 3), makeWeight(3, 5), makeWeight(4, 1)];
    expect(sortEntriesByDate(entries).map((entry) => entry.id)).toEqual([4, 2, 1, 3]);
    expect(entries.map((entry) => entry.id)).toEqual([1, 2, 3, 4]);
  });
});

describe("upsertEntry", () => {
  const entries = [makeWeight(1, 1), makeWeight(2, 5), makeWeight(3, 9)];

  it("inserts a new entry at its date position", () => {
    expect(upsertEntry(entries, makeWeight(4, 6)).map((entry) => entry.id)).toEqual([1, 2, 4, 3]);
  });

  it("inserts after entries with the same time", () => {
    expect(upsertEntry(entries, makeWeight(4, 5)).map((entry) => entry.id)).toEqual([1, 2, 4, 3]);
  });

  it("replaces and moves an entry with the same id", () => {
    const result = upsertEntry(entries, makeWeight(1, 12));
    expect(result.map((entry) => entry.id)).toEqual([2, 3, 1]);
    expect(result).toHaveLength(3);
  });
});

describe("getEntryById / removeEntry", () => {
  const entries = [makeWeight(1, 1), makeWeight(2, 5)];

  it("finds entries by id", () => {
    expect(getEntryById(entries, 2)).toBe(entries[1]);
  });

  it("throws ReferenceNotFoundError for an unknown id", () => {
    expect(() => getEntryById(entries, 7)).toThrow(ReferenceNotFoundError);
  });

  it("removes by id", () => {
    expect(removeEntry(entries, 1).map((entry) => entry.id)).toEqual([2]);
    expect(removeEntry(entries, 7)).toHaveLength(2);
  });
});

describe("getEntriesInDateRange", () => {
  it("returns entries of every day in the inclusive range", () => {
    const entries = [makeWeight(1, 1, 23), makeWeight(2, 2, 0), makeWeight(3, 4, 23), makeWeight(4, 5, 0)];
    const result = getEntriesInDateRange(entries, new Date(2026, 3, 2, 12), new Date(2026, 3, 4));
    expect(result.map((entry) => entry.id)).toEqual([2, 3]);
  });
});
