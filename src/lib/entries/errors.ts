export type ReferenceKind = "sportType" | "sportSubType" | "equipment" | "entry";

/**
 * Thrown when an id lookup misses. During a rebind this means the reloaded
 * reference data no longer contains an item that exercises still point to.
 */
export class ReferenceNotFoundError extends Error {
  readonly kind: ReferenceKind;
  readonly id: number;

  constructor(kind: ReferenceKind, id: number, context?: string) {
    super(`No ${kind} with id ${id}${context ? ` (${context})` : ""}`);
    this.name = "ReferenceNotFoundError";
    this.kind = kind;
    this.id = id;
  }
}

export class PatternSyntaxError extends Error {
  readonly pattern: string;

  constructor(pattern: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Invalid comment pattern "${pattern}": ${detail}`, { cause });
    this.name = "PatternSyntaxError";
    this.pattern = pattern;
  }
}
