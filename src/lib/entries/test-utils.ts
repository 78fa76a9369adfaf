/**
 * Shared fixtures for entry tests.
 */
import { buildIdTable } from "./id-table";
import type { Equipment, Exercise, SportSubType, SportType, SportTypeTable } from "./types";

type SportTypeOverrides = Partial<Omit<SportType, "sportSubTypes" | "equipment">> & {
  sportSubTypes?: SportSubType[];
  equipment?: Equipment[];
};

export function makeSportType(overrides: SportTypeOverrides = {}): SportType {
  const { sportSubTypes, equipment, ...rest } = overrides;
  return {
    id: 1,
    name: "Cycling",
    recordDistance: true,
    speedMode: "SPEED",
    ...rest,
    sportSubTypes: buildIdTable(sportSubTypes ?? [{ id: 1, name: "Road" }]),
    equipment: buildIdTable(equipment ?? []),
  };
}

/** Cycling (road/mtb, two bikes) and Running (trail/track, one pair of shoes). */
export function makeSportTypeTable(): SportTypeTable {
  return buildIdTable([
    makeSportType({
      id: 1,
      name: "Cycling",
      sportSubTypes: [
        { id: 1, name: "Road" },
        { id: 2, name: "MTB" },
      ],
      equipment: [
        { id: 1, name: "Road Bike" },
        { id: 2, name: "Mountain Bike" },
      ],
    }),
    makeSportType({
      id: 2,
      name: "Running",
      speedMode: "PACE",
      sportSubTypes: [
        { id: 1, name: "Trail" },
        { id: 2, name: "Track" },
      ],
      equipment: [{ id: 1, name: "Trail Shoes" }],
    }),
  ]);
}

export function getSportType(table: SportTypeTable, id: number): SportType {
  const sportType = table.get(id);
  if (!sportType) {
    throw new Error(`Fixture has no sport type ${id}`);
  }
  return sportType;
}

export function makeExercise(
  sportType: SportType,
  overrides: Partial<Exercise> & { sportSubTypeId?: number; equipmentId?: number } = {}
): Exercise {
  const { sportSubTypeId = 1, equipmentId, ...rest } = overrides;
  const sportSubType = sportType.sportSubTypes.get(sportSubTypeId);
  if (!sportSubType) {
    throw new Error(`Fixture sport type ${sportType.id} has no subtype ${sportSubTypeId}`);
  }
  const equipment = equipmentId !== undefined ? sportType.equipment.get(equipmentId) : undefined;
  if (equipmentId !== undefined && !equipment) {
    throw new Error(`Fixture sport type ${sportType.id} has no equipment ${equipmentId}`);
  }
  return {
    id: 1,
    dateTime: new Date(2026, 2, 10, 18, 0),
    sportType,
    sportSubType,
    equipment,
    intensity: "NORMAL",
    duration: 3600,
    distance: 30,
    avgSpeed: 30,
    ...rest,
  };
}
