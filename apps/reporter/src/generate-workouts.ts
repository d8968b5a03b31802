import fs from "node:fs";
import {
  exercisePrsArtifactSchema,
  exerciseTemplateMapSchema,
  insightsArtifactSchema,
  muscleGroupsArtifactSchema,
  workoutSummaryArtifactSchema,
  workoutTrendsArtifactSchema,
  type ExerciseTemplateMap,
  type WorkoutRecord,
} from "@health-analytics/contracts";
import { buildWorkoutArtifacts, formatDay, type WorkoutArtifacts } from "@health-analytics/analytics-engine";
import { extractWorkoutMetrics } from "@health-analytics/importers";
import type { ZodTypeAny } from "zod";
import { ErrorCode, ReportError } from "./errors.js";
import { parseJsonFile } from "./export-loader.js";
import { emitArtifacts, failAll, type ReportContext, type RunResult } from "./report-run.js";

const WORKOUT_ARTIFACTS: ReadonlyArray<{ name: keyof WorkoutArtifacts; schema: ZodTypeAny }> = [
  { name: "workout_trends", schema: workoutTrendsArtifactSchema },
  { name: "workout_summary", schema: workoutSummaryArtifactSchema },
  { name: "muscle_groups", schema: muscleGroupsArtifactSchema },
  { name: "exercise_prs", schema: exercisePrsArtifactSchema },
  { name: "workout_insights", schema: insightsArtifactSchema },
];

/**
 * Cached exercise templates keyed by template id. Missing or malformed
 * caches fall back to keyword inference (an empty map).
 */
export function loadExerciseTemplates(filePath: string): ExerciseTemplateMap {
  if (!fs.existsSync(filePath)) {
    console.warn(`[workouts] No exercise template cache at ${filePath}, inferring muscle groups`);
    return {};
  }
  try {
    const parsed = exerciseTemplateMapSchema.safeParse(parseJsonFile(filePath));
    if (parsed.success) return parsed.data;
    console.warn(`[workouts] Ignoring malformed exercise template cache ${filePath}`);
  } catch (err) {
    if (!(err instanceof ReportError)) throw err;
    console.warn(`[workouts] ${err.message}, inferring muscle groups`);
  }
  return {};
}

/** Throws `ReportError` (WORKOUT_SOURCE_UNAVAILABLE) when the cache is absent or unreadable. */
export function loadWorkouts(
  filePath: string,
  templateMap: ExerciseTemplateMap,
  fallbackDate: string,
): WorkoutRecord[] {
  if (!fs.existsSync(filePath)) {
    throw new ReportError(ErrorCode.WORKOUT_SOURCE_UNAVAILABLE, `Workout cache not found: ${filePath}`);
  }
  const payload = parseJsonFile(filePath, ErrorCode.WORKOUT_SOURCE_UNAVAILABLE);
  return extractWorkoutMetrics(payload, { templateMap, fallbackDate });
}

export async function generateWorkoutDashboard(ctx: ReportContext): Promise<RunResult> {
  const today = formatDay(ctx.now);
  const templateMap = loadExerciseTemplates(ctx.config.exerciseTemplateCacheFile);
  console.log(`[workouts] ${Object.keys(templateMap).length} exercise templates`);

  let workouts: WorkoutRecord[];
  try {
    workouts = loadWorkouts(ctx.config.workoutCacheFile, templateMap, today);
  } catch (err) {
    const result = failAll(
      WORKOUT_ARTIFACTS.map((a) => a.name),
      err,
      ErrorCode.WORKOUT_SOURCE_UNAVAILABLE,
    );
    console.error(`[workouts] ${result.failed[0]?.error ?? "Workout source unavailable"}`);
    return result;
  }

  if (workouts.length === 0) {
    console.warn("[workouts] No workouts found in cache, writing empty documents");
  } else {
    console.log(`[workouts] ${workouts.length} workouts`);
  }

  const artifacts = buildWorkoutArtifacts(workouts, { today, generatedAt: ctx.now.toISOString() });
  return emitArtifacts(
    ctx.store,
    WORKOUT_ARTIFACTS.map(({ name, schema }) => ({ name, schema, build: () => artifacts[name] })),
    "workouts",
  );
}
