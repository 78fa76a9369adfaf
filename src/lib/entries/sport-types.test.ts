import { beforeEach, afterEach, describe, expect, it, vi } from "vitest";
import { updateSportTypes } from "./rebinding";
import { findDanglingReferences, loadSportTypes, toReferenceIds } from "./sport-types";
import { getSportType, makeExercise } from "./test-utils";

const rawData = {
  sportTypes: [
    {
      id: 1,
      name: "Cycling",
      color: "#2266cc",
      sportSubTypes: [
        { id: 1, name: "Road" },
        { id: 2, name: "MTB" },
      ],
      equipment: [{ id: 1, name: "Road Bike" }],
    },
    {
      id: 2,
      name: "Strength",
      recordDistance: false,
      sportSubTypes: [{ id: 1, name: "Gym" }],
    },
  ],
};

describe("loadSportTypes", () => {
  beforeEach(() => {
    vi.spyOn(console, "info").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("builds id tables and applies defaults", () => {
    const table = loadSportTypes(rawData);
    const strength = getSportType(table, 2);

    expect(table.size).toBe(2);
    expect(strength.recordDistance).toBe(false);
    expect(strength.speedMode).toBe("SPEED");
    expect(strength.equipment.size).toBe(0);
    expect(getSportType(table, 1).sportSubTypes.get(2)).toEqual({ id: 2, name: "MTB" });
    expect(console.info).toHaveBeenCalledWith("[sport-types] Loaded 2 sport types");
  });

  it("returns new objects with the same ids on every load", () => {
    const first = getSportType(loadSportTypes(rawData), 1);
    const second = getSportType(loadSportTypes(rawData), 1);

    expect(second).not.toBe(first);
    expect(second.sportSubTypes.get(1)).not.toBe(first.sportSubTypes.get(1));
    expect(second.id).toBe(first.id);
  });

  it("supports rebinding exercises to a reload", () => {
    const exercise = makeExercise(getSportType(loadSportTypes(rawData), 1), { equipmentId: 1 });
    const reloaded = loadSportTypes(rawData);

    updateSportTypes([exercise], reloaded);

    expect(exercise.sportType).toBe(reloaded.get(1));
    expect(exercise.equipment).toBe(getSportType(reloaded, 1).equipment.get(1));
  });

  it("rejects a sport type without subtypes", () => {
    expect(() =>
      loadSportTypes({ sportTypes: [{ id: 1, name: "Cycling", sportSubTypes: [] }] })
    ).toThrow("A sport type needs at least one subtype");
  });

  it("rejects duplicate ids", () => {
    const duplicated = { sportTypes: [rawData.sportTypes[0], rawData.sportTypes[0]] };
    expect(() => loadSportTypes(duplicated)).toThrow("Sport type ids must be unique");
  });
});

describe("findDanglingReferences", () => {
  beforeEach(() => {
    vi.spyOn(console, "info").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("lists every reference missing from the table", () => {
    const table = loadSportTypes(rawData);
    const dangling = findDanglingReferences(
      [
        { id: 1, sportTypeId: 1, sportSubTypeId: 2, equipmentId: 1 },
        { id: 2, sportTypeId: 3, sportSubTypeId: 1 },
        { id: 3, sportTypeId: 1, sportSubTypeId: 4, equipmentId: 8 },
      ],
      table
    );

    expect(dangling).toEqual([
      { exerciseId: 2, kind: "sportType", referenceId: 3 },
      { exerciseId: 3, kind: "sportSubType", referenceId: 4 },
      { exerciseId: 3, kind: "equipment", referenceId: 8 },
    ]);
  });

  it("accepts exercises that are already bound", () => {
    const table = loadSportTypes(rawData);
    const exercise = makeExercise(getSportType(table, 1), { id: 5, sportSubTypeId: 2 });

    expect(toReferenceIds(exercise)).toEqual({
      id: 5,
      sportTypeId: 1,
      sportSubTypeId: 2,
      equipmentId: undefined,
    });
    expect(findDanglingReferences([toReferenceIds(exercise)], table)).toEqual([]);
  });
});
