import { z } from "zod";
import {
  COMMENT_MATCH_MODE_VALUES,
  DEFAULT_FILTER_RANGE_DAYS,
  ENTRY_TYPE_VALUES,
  INTENSITY_VALUES,
} from "@/lib/entries/constants";
import { addDays, isCalendarDate, parseLocalDate } from "@/lib/entries/dates";
import { getById } from "@/lib/entries/id-table";
import type { EntryFilter, SportTypeTable } from "@/lib/entries/types";

const optionalNumber = (schema: z.ZodNumber) =>
  z.preprocess((value) => {
    if (value === null || value === "") {
      return undefined;
    }
    if (typeof value === "string" && /^\d+$/.test(value)) {
      return Number(value);
    }
    if (typeof value === "number" && Number.isNaN(value)) {
      return undefined;
    }
    return value;
  }, schema.optional());

const optionalString = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((value) => {
    if (typeof value === "string" && value.trim() === "") {
      return undefined;
    }
    return value;
  }, schema.optional());

const isoDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, "Expected a YYYY-MM-DD date")
  .refine(isCalendarDate, {
    message: "Invalid calendar date",
  });

const optionalId = optionalNumber(z.number().int().positive());

export const entryFilterInputSchema = z
  .object({
    entryType: z.enum(ENTRY_TYPE_VALUES).default("EXERCISE"),
    dateStart: optionalString(isoDateSchema),
    dateEnd: optionalString(isoDateSchema),
    sportTypeId: optionalId,
    sportSubTypeId: optionalId,
    equipmentId: optionalId,
    intensity: z.enum(INTENSITY_VALUES).optional(),
    commentSubString: optionalString(z.string().max(200)),
    commentMatchMode: z.enum(COMMENT_MATCH_MODE_VALUES).default("substring"),
  })
  .superRefine((value, ctx) => {
    if (value.dateStart && value.dateEnd && value.dateStart > value.dateEnd) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "dateStart must be on or before dateEnd",
        path: ["dateEnd"],
      });
    }
    if (value.sportTypeId === undefined) {
      if (value.sportSubTypeId !== undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: "sportSubTypeId requires sportTypeId",
          path: ["sportSubTypeId"],
        });
      }
      if (value.equipmentId !== undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: "equipmentId requires sportTypeId",
          path: ["equipmentId"],
        });
      }
    }
  });

export type EntryFilterInput = z.infer<typeof entryFilterInputSchema>;

/**
 * Turns a validated filter query into an `EntryFilter` whose references point
 * into `sportTypes`.
 *
 * @throws ReferenceNotFoundError for ids the table does not contain
 */
export function resolveEntryFilter(input: EntryFilterInput, sportTypes: SportTypeTable): EntryFilter {
  const sportType =
    input.sportTypeId !== undefined
      ? getById(sportTypes, input.sportTypeId, "sportType", "entry filter")
      : undefined;

  return {
    entryType: input.entryType,
    dateStart: input.dateStart ? parseLocalDate(input.dateStart) : undefined,
    dateEnd: input.dateEnd ? parseLocalDate(input.dateEnd) : undefined,
    sportType,
    sportSubType:
      sportType && input.sportSubTypeId !== undefined
        ? getById(sportType.sportSubTypes, input.sportSubTypeId, "sportSubType", "entry filter")
        : undefined,
    equipment:
      sportType && input.equipmentId !== undefined
        ? getById(sportType.equipment, input.equipmentId, "equipment", "entry filter")
        : undefined,
    intensity: input.intensity,
    commentSubString: input.commentSubString,
    commentMatchMode: input.commentMatchMode,
  };
}

/** Exercises of the last DEFAULT_FILTER_RANGE_DAYS days up to and including `today`. */
export function createDefaultFilter(today: Date = new Date()): EntryFilter {
  return {
    entryType: "EXERCISE",
    dateStart: addDays(today, -DEFAULT_FILTER_RANGE_DAYS),
    dateEnd: today,
    commentMatchMode: "substring",
  };
}
