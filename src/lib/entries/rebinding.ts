import { getById } from "./id-table";
import type {
  Equipment,
  Exercise,
  SportSubType,
  SportType,
  SportTypeTable,
  SportTypeUsage,
} from "./types";

type ResolvedReferences = {
  sportType: SportType;
  sportSubType: SportSubType;
  equipment?: Equipment;
};

function resolveReferences(exercise: Exercise, sportTypes: SportTypeTable): ResolvedReferences {
  const context = `exercise ${exercise.id}`;
  const sportType = getById(sportTypes, exercise.sportType.id, "sportType", context);
  const sportSubType = getById(
    sportType.sportSubTypes,
    exercise.sportSubType.id,
    "sportSubType",
    context
  );
  const equipment = exercise.equipment
    ? getById(sportType.equipment, exercise.equipment.id, "equipment", context)
    : undefined;
  return { sportType, sportSubType, equipment };
}

/**
 * Points every exercise at the sport type, subtype and equipment objects of a
 * reloaded table, matched by id. Exercises are updated in place.
 *
 * All lookups run before the first exercise is touched, so a missing id leaves
 * every exercise as it was.
 *
 * @throws ReferenceNotFoundError when the table lacks an id an exercise references
 */
export function updateSportTypes(exercises: Exercise[], sportTypes: SportTypeTable): void {
  const resolved = exercises.map((exercise) => {
    try {
      return resolveReferences(exercise, sportTypes);
    } catch (error) {
      console.warn(
        `[exercise-list] Cannot rebind exercise ${exercise.id} to reloaded sport types; no exercises were changed.`
      );
      throw error;
    }
  });

  exercises.forEach((exercise, index) => {
    const references = resolved[index];
    exercise.sportType = references.sportType;
    exercise.sportSubType = references.sportSubType;
    if (references.equipment) {
      exercise.equipment = references.equipment;
    }
  });
}

/**
 * Which parts of a sport type are referenced by exercises. Editors use this to
 * refuse deleting a sport type, subtype or equipment that is still in use.
 */
export function getSportTypeUsage(exercises: Exercise[], sportTypeId: number): SportTypeUsage {
  const subTypeIds = new Set<number>();
  const equipmentIds = new Set<number>();
  let exerciseCount = 0;

  for (const exercise of exercises) {
    if (exercise.sportType.id !== sportTypeId) {
      continue;
    }
    exerciseCount += 1;
    subTypeIds.add(exercise.sportSubType.id);
    if (exercise.equipment) {
      equipmentIds.add(exercise.equipment.id);
    }
  }

  return {
    sportTypeId,
    exerciseCount,
    sportSubTypeIds: [...subTypeIds].sort((a, b) => a - b),
    equipmentIds: [...equipmentIds].sort((a, b) => a - b),
  };
}
