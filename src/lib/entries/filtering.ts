import { isWithinDayRange } from "./dates";
import { PatternSyntaxError } from "./errors";
import type { CommentMatcher, Entry, EntryFilter, EntryType, Exercise, Note, Weight } from "./types";

const matchAnyComment: CommentMatcher = () => true;

/**
 * Builds the comment predicate for a filter. Substring mode ignores case,
 * regex mode is case-sensitive and matches anywhere in the comment. An entry
 * without a comment never matches an active comment criterion.
 */
export function compileCommentMatcher(filter: EntryFilter): CommentMatcher {
  const pattern = filter.commentSubString;
  if (!pattern) {
    return matchAnyComment;
  }

  if (filter.commentMatchMode === "regex") {
    let regex: RegExp;
    try {
      regex = new RegExp(pattern);
    } catch (error) {
      throw new PatternSyntaxError(pattern, error);
    }
    return (comment) => comment !== undefined && regex.test(comment);
  }

  const term = pattern.toLowerCase();
  return (comment) => comment !== undefined && comment.toLowerCase().includes(term);
}

/** Date range and comment checks shared by every entry type. */
export function matchesEntryFilter(
  entry: Entry,
  filter: EntryFilter,
  commentMatcher: CommentMatcher
): boolean {
  if (!isWithinDayRange(entry.dateTime, filter.dateStart, filter.dateEnd)) {
    return false;
  }
  return commentMatcher(entry.comment);
}

export function matchesExerciseFilter(
  exercise: Exercise,
  filter: EntryFilter,
  commentMatcher: CommentMatcher
): boolean {
  if (!matchesEntryFilter(exercise, filter, commentMatcher)) {
    return false;
  }

  // References are compared by id so filters built before a reference reload still match.
  if (filter.sportType && filter.sportType.id !== exercise.sportType.id) {
    return false;
  }

  if (filter.sportSubType && filter.sportSubType.id !== exercise.sportSubType.id) {
    return false;
  }

  if (filter.intensity && filter.intensity !== exercise.intensity) {
    return false;
  }

  if (filter.equipment) {
    if (!exercise.equipment || exercise.equipment.id !== filter.equipment.id) {
      return false;
    }
  }

  return true;
}

function filterEntriesOfType<T extends Entry>(
  entries: T[],
  filter: EntryFilter,
  entryType: EntryType,
  matches: (entry: T, filter: EntryFilter, commentMatcher: CommentMatcher) => boolean
): T[] {
  if (filter.entryType !== entryType) {
    return entries;
  }

  // Compiled before the scan so a bad pattern fails even for an empty list.
  const commentMatcher = compileCommentMatcher(filter);
  return entries.filter((entry) => matches(entry, filter, commentMatcher));
}

/**
 * Returns the exercises matching every criterion set on the filter, in their
 * original order. A filter for another entry type returns `exercises` itself.
 *
 * @throws PatternSyntaxError when the comment pattern is not a valid regular expression
 */
export function filterExercises(exercises: Exercise[], filter: EntryFilter): Exercise[] {
  return filterEntriesOfType(exercises, filter, "EXERCISE", matchesExerciseFilter);
}

export function filterNotes(notes: Note[], filter: EntryFilter): Note[] {
  return filterEntriesOfType(notes, filter, "NOTE", matchesEntryFilter);
}

export function filterWeights(weights: Weight[], filter: EntryFilter): Weight[] {
  return filterEntriesOfType(weights, filter, "WEIGHT", matchesEntryFilter);
}
