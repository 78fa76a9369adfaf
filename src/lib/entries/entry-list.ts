import { isWithinDayRange } from "./dates";
import { ReferenceNotFoundError } from "./errors";
import type { Entry } from "./types";

// Entry lists are plain arrays kept in ascending dateTime order. Entries with
// the same dateTime keep their insertion order.

export function sortEntriesByDate<T extends Entry>(entries: readonly T[]): T[] {
  return [...entries].sort((a, b) => a.dateTime.getTime() - b.dateTime.getTime());
}

export function getEntryById<T extends Entry>(entries: readonly T[], id: number): T {
  const entry = entries.find((candidate) => candidate.id === id);
  if (!entry) {
    throw new ReferenceNotFoundError("entry", id);
  }
  return entry;
}

/**
 * Inserts the entry at its date position, replacing any entry with the same id.
 * Returns a new array.
 */
export function upsertEntry<T extends Entry>(entries: readonly T[], entry: T): T[] {
  const remaining = entries.filter((candidate) => candidate.id !== entry.id);
  const time = entry.dateTime.getTime();
  const index = remaining.findIndex((candidate) => candidate.dateTime.getTime() > time);
  if (index === -1) {
    return [...remaining, entry];
  }
  return [...remaining.slice(0, index), entry, ...remaining.slice(index)];
}

export function removeEntry<T extends Entry>(entries: readonly T[], id: number): T[] {
  return entries.filter((candidate) => candidate.id !== id);
}

/** Entries whose local calendar day lies in [start, end]. */
export function getEntriesInDateRange<T extends Entry>(
  entries: readonly T[],
  start: Date,
  end: Date
): T[] {
  return entries.filter((entry) => isWithinDayRange(entry.dateTime, start, end));
}
