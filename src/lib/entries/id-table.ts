import { ReferenceNotFoundError, type ReferenceKind } from "./errors";
import type { IdTable } from "./types";

export function buildIdTable<T extends { id: number }>(items: readonly T[]): IdTable<T> {
  const table = new Map<number, T>();
  for (const item of items) {
    if (table.has(item.id)) {
      throw new Error(`Duplicate id ${item.id} in id table`);
    }
    table.set(item.id, item);
  }
  return table;
}

export function getById<T extends { id: number }>(
  table: IdTable<T>,
  id: number,
  kind: ReferenceKind,
  context?: string
): T {
  const item = table.get(id);
  if (!item) {
    throw new ReferenceNotFoundError(kind, id, context);
  }
  return item;
}

/** Smallest positive id not used by any item. */
export function createUniqueId(items: Iterable<{ id: number }>): number {
  const used = new Set<number>();
  for (const item of items) {
    used.add(item.id);
  }
  let candidate = 1;
  while (used.has(candidate)) {
    candidate += 1;
  }
  return candidate;
}
