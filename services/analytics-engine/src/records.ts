/**
 * Streaks and personal records.
 *
 * Streaks run over consecutive records in date order; a gap in the exports
 * does not break a run. Records are recomputed from the full history on every
 * call and report `{ value: 0, date: null }` for a metric never observed.
 */

import {
  GOALS,
  type AllPersonalRecordsArtifact,
  type DatedValue,
  type PersonalRecordsArtifact,
  type StreaksArtifact,
} from "@health-analytics/contracts";
import type { DailyAggregate, DailyStats, DailyStatsKey } from "./types.js";

export interface StreakResult {
  longest: number;
  /** Date of the last day in the longest run, null when there is none */
  longestEnd: string | null;
  /** Run length counted back from the most recent record */
  current: number;
}

/** Longest and current runs of records meeting `meets`. Input must be date-sorted. */
export function computeStreak<T extends { date: string }>(
  records: readonly T[],
  meets: (record: T) => boolean,
): StreakResult {
  let run = 0;
  let longest = 0;
  let longestEnd: string | null = null;

  for (const record of records) {
    if (meets(record)) {
      run += 1;
      if (run > longest) {
        longest = run;
        longestEnd = record.date;
      }
    } else {
      run = 0;
    }
  }

  let current = 0;
  for (let i = records.length - 1; i >= 0; i--) {
    const record = records[i];
    if (!record || !meets(record)) break;
    current += 1;
  }

  return { longest, longestEnd, current };
}

function byDate<T extends { date: string }>(records: readonly T[]): T[] {
  return [...records].sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
}

/** Step-goal streaks and exercise consistency over the full history. */
export function findStreaks(days: readonly DailyStats[], goalSteps: number = GOALS.steps): StreaksArtifact {
  const sorted = byDate(days);
  const steps = computeStreak(sorted, (d) => (d.steps ?? 0) >= goalSteps);
  const exerciseDays = sorted.filter((d) => (d.exerciseMin ?? 0) >= GOALS.exerciseMinutes).length;

  return {
    longest_step_streak: steps.longest,
    longest_streak_end: steps.longestEnd,
    current_streak: steps.current,
    exercise_days: exerciseDays,
    total_days: sorted.length,
    exercise_consistency: sorted.length > 0 ? exerciseDays / sorted.length : 0,
  };
}

type Direction = "max" | "min";

/**
 * Best value of `read` across records, first occurrence on ties.
 * Only values above zero are observations.
 */
export function bestRecord<T extends { date: string }>(
  records: readonly T[],
  read: (record: T) => number | undefined,
  direction: Direction,
): DatedValue {
  let best: DatedValue = { value: 0, date: null };

  for (const record of records) {
    const value = read(record);
    if (value === undefined || value <= 0) continue;
    const better = best.date === null
      || (direction === "max" ? value > best.value : value < best.value);
    if (better) best = { value, date: record.date };
  }

  return best;
}

/** Dashboard records over the loaded window. */
export function generatePersonalRecords(days: readonly DailyAggregate[]): PersonalRecordsArtifact {
  const sorted = byDate(days);
  return {
    max_steps: bestRecord(sorted, (d) => d.totals.steps, "max"),
    max_distance: bestRecord(sorted, (d) => d.totals.distanceKm, "max"),
    max_exercise: bestRecord(sorted, (d) => d.totals.exerciseMinutes, "max"),
    lowest_resting_hr: bestRecord(sorted, (d) => d.readings.restingHr, "min"),
    highest_hrv: bestRecord(sorted, (d) => d.readings.hrvAvg, "max"),
  };
}

const ALL_TIME_RECORDS: ReadonlyArray<[string, DailyStatsKey, Direction]> = [
  ["max_steps", "steps", "max"],
  ["max_distance", "distanceKm", "max"],
  ["max_exercise", "exerciseMin", "max"],
  ["max_flights", "flights", "max"],
  ["max_swim_distance", "swimDistance", "max"],
  ["highest_hrv", "hrvAvg", "max"],
  ["highest_hr", "hrMax", "max"],
  ["highest_vo2_max", "vo2Max", "max"],
  ["lowest_resting_hr", "restingHr", "min"],
  ["lowest_hr", "hrMin", "min"],
];

/** All-time records over the full deep-analysis history. */
export function findPersonalRecords(days: readonly DailyStats[]): AllPersonalRecordsArtifact {
  const sorted = byDate(days);
  const records: AllPersonalRecordsArtifact = {};
  for (const [name, field, direction] of ALL_TIME_RECORDS) {
    records[name] = bestRecord(sorted, (d) => d[field], direction);
  }
  return records;
}
