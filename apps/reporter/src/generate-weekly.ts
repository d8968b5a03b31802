import {
  weeklySummaryArtifactSchema,
  weeklyWorkoutsArtifactSchema,
  type WorkoutRecord,
} from "@health-analytics/contracts";
import {
  aggregateDays,
  buildWeeklySummaryArtifact,
  buildWeeklyWorkoutsArtifact,
  formatDay,
  shiftDay,
} from "@health-analytics/analytics-engine";
import { ErrorCode } from "./errors.js";
import { loadDateRange } from "./export-loader.js";
import { loadExerciseTemplates, loadWorkouts } from "./generate-workouts.js";
import {
  emitArtifacts,
  failAll,
  mergeRunResults,
  type ReportContext,
  type RunResult,
} from "./report-run.js";

export const WEEKLY_WINDOW_DAYS = 7;
export const WEEKLY_WORKOUT_WEEKS = 4;

/** The `days` days ending yesterday, inclusive. */
export function weeklyRange(today: string, days: number = WEEKLY_WINDOW_DAYS): { start: string; end: string } {
  const end = shiftDay(today, -1);
  return { start: shiftDay(end, -(days - 1)), end };
}

/**
 * Writes the weekly health summary and, when the workout cache is readable,
 * the weekly workout buckets. A missing cache fails only the workout document.
 */
export async function generateWeeklySummary(ctx: ReportContext): Promise<RunResult> {
  const today = formatDay(ctx.now);
  const generatedAt = ctx.now.toISOString();
  const range = weeklyRange(today);
  console.log(`[weekly] Week ${range.start} to ${range.end}`);

  const days = aggregateDays(loadDateRange(ctx.config.healthDataPath, range.start, range.end));
  console.log(`[weekly] ${days.length}/${WEEKLY_WINDOW_DAYS} days with data`);

  const health = await emitArtifacts(
    ctx.store,
    [
      {
        name: "weekly_summary",
        schema: weeklySummaryArtifactSchema,
        build: () => buildWeeklySummaryArtifact(days, { range, generatedAt }),
      },
    ],
    "weekly",
  );

  let workouts: WorkoutRecord[];
  try {
    const templateMap = loadExerciseTemplates(ctx.config.exerciseTemplateCacheFile);
    workouts = loadWorkouts(ctx.config.workoutCacheFile, templateMap, today);
  } catch (err) {
    const failed = failAll(["weekly_workouts"], err, ErrorCode.WORKOUT_SOURCE_UNAVAILABLE);
    console.error(`[weekly] ${failed.failed[0]?.error ?? "Workout source unavailable"}`);
    return mergeRunResults(health, failed);
  }

  const training = await emitArtifacts(
    ctx.store,
    [
      {
        name: "weekly_workouts",
        schema: weeklyWorkoutsArtifactSchema,
        build: () => buildWeeklyWorkoutsArtifact(workouts, { today, weeks: WEEKLY_WORKOUT_WEEKS, generatedAt }),
      },
    ],
    "weekly",
  );
  return mergeRunResults(health, training);
}
