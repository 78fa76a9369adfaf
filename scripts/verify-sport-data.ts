import "dotenv/config";
import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import {
  exerciseReferenceSchema,
  findDanglingReferences,
  loadSportTypes,
  type DanglingReference,
} from "@/lib/entries";

const exerciseExportSchema = z.object({
  exercises: z.array(exerciseReferenceSchema),
});

function readJson(filePath: string): unknown {
  return JSON.parse(fs.readFileSync(path.resolve(process.cwd(), filePath), "utf8"));
}

function verifySportData() {
  const sportTypesFile = process.env.SPORT_TYPES_FILE ?? "data/sport-types.json";
  const exercisesFile = process.env.EXERCISES_FILE ?? "data/exercises.json";

  const sportTypes = loadSportTypes(readJson(sportTypesFile));
  const { exercises } = exerciseExportSchema.parse(readJson(exercisesFile));
  const dangling = findDanglingReferences(exercises, sportTypes);

  return {
    sportTypeCount: sportTypes.size,
    exerciseCount: exercises.length,
    dangling,
    isClean: dangling.length === 0,
  };
}

function describeReference(reference: DanglingReference): string {
  return `exercise ${reference.exerciseId}: missing ${reference.kind} ${reference.referenceId}`;
}

async function main() {
  const result = verifySportData();
  console.log(`Sport types: ${result.sportTypeCount}`);
  console.log(`Exercises: ${result.exerciseCount}`);
  console.log(`Dangling references: ${result.dangling.length}`);

  if (result.dangling.length > 0) {
    console.log("\nDangling references:");
    for (const reference of result.dangling.slice(0, 200)) {
      console.log(`- ${describeReference(reference)}`);
    }
    if (result.dangling.length > 200) {
      console.log(`... and ${result.dangling.length - 200} more`);
    }
  }

  if (!result.isClean) {
    process.exitCode = 1;
  }
}

if (require.main === module) {
  main().catch((error) => {
    console.error("Failed to verify sport data", error);
    process.exit(1);
  });
}
