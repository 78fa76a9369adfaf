import { z } from "zod";
import { SPEED_MODE_VALUES } from "./constants";
import { buildIdTable } from "./id-table";
import type { DanglingReference, Exercise, SportType, SportTypeTable } from "./types";

const idSchema = z.number().int().positive();

const namedItemSchema = z.object({
  id: idSchema,
  name: z.string().trim().min(1),
});

const uniqueIds = (items: { id: number }[]) => new Set(items.map((item) => item.id)).size === items.length;

export const sportTypeRecordSchema = z.object({
  id: idSchema,
  name: z.string().trim().min(1),
  recordDistance: z.boolean().default(true),
  speedMode: z.enum(SPEED_MODE_VALUES).default("SPEED"),
  color: z.string().optional(),
  icon: z.string().optional(),
  sportSubTypes: z
    .array(namedItemSchema)
    .min(1, "A sport type needs at least one subtype")
    .refine(uniqueIds, "Subtype ids must be unique within a sport type"),
  equipment: z
    .array(namedItemSchema.extend({ notInUse: z.boolean().optional() }))
    .default([])
    .refine(uniqueIds, "Equipment ids must be unique within a sport type"),
});

export const sportTypeDataSchema = z.object({
  sportTypes: z.array(sportTypeRecordSchema).refine(uniqueIds, "Sport type ids must be unique"),
});

export type SportTypeRecord = z.infer<typeof sportTypeRecordSchema>;

/** Id references of one stored exercise, as found in an export. */
export const exerciseReferenceSchema = z.object({
  id: idSchema,
  sportTypeId: idSchema,
  sportSubTypeId: idSchema,
  equipmentId: idSchema.optional(),
});

export type ExerciseReferenceIds = z.infer<typeof exerciseReferenceSchema>;

function toSportType(record: SportTypeRecord): SportType {
  return {
    id: record.id,
    name: record.name,
    recordDistance: record.recordDistance,
    speedMode: record.speedMode,
    color: record.color,
    icon: record.icon,
    sportSubTypes: buildIdTable(record.sportSubTypes.map((item) => ({ ...item }))),
    equipment: buildIdTable(record.equipment.map((item) => ({ ...item }))),
  };
}

/**
 * Validates raw reference data and builds a new object graph from it. Each
 * call returns fresh objects, so exercises bound to an earlier load must be
 * rebound with `updateSportTypes`.
 */
export function loadSportTypes(raw: unknown): SportTypeTable {
  const data = sportTypeDataSchema.parse(raw);
  const table = buildIdTable(data.sportTypes.map(toSportType));
  console.info(`[sport-types] Loaded ${table.size} sport types`);
  return table;
}

export function toReferenceIds(exercise: Exercise): ExerciseReferenceIds {
  return {
    id: exercise.id,
    sportTypeId: exercise.sportType.id,
    sportSubTypeId: exercise.sportSubType.id,
    equipmentId: exercise.equipment?.id,
  };
}

/** Every reference a rebind against `sportTypes` would fail on. */
export function findDanglingReferences(
  exercises: ExerciseReferenceIds[],
  sportTypes: SportTypeTable
): DanglingReference[] {
  const dangling: DanglingReference[] = [];

  for (const exercise of exercises) {
    const sportType = sportTypes.get(exercise.sportTypeId);
    if (!sportType) {
      dangling.push({ exerciseId: exercise.id, kind: "sportType", referenceId: exercise.sportTypeId });
      continue;
    }
    if (!sportType.sportSubTypes.has(exercise.sportSubTypeId)) {
      dangling.push({
        exerciseId: exercise.id,
        kind: "sportSubType",
        referenceId: exercise.sportSubTypeId,
      });
    }
    if (exercise.equipmentId !== undefined && !sportType.equipment.has(exercise.equipmentId)) {
      dangling.push({ exerciseId: exercise.id, kind: "equipment", referenceId: exercise.equipmentId });
    }
  }

  return dangling;
}
