/**
 * Trend & Comparison Engine
 *
 * Windowed views over a date-sorted sequence of daily records:
 * - rolling daily arrays, ISO-week averages and goal flags (dashboard)
 * - weekday patterns, monthly progression, period-over-period deltas and
 *   fitness trajectory (deep analysis)
 *
 * Dashboard views read `DailyAggregate` and zero-fill absent metrics.
 * Deep-analysis views read `DailyStats` and average non-zero values only.
 * Pure math, no I/O.
 */

import {
  GOALS,
  weekdayLabels,
  type DailyTrendsArtifact,
  type FitnessTrajectoryArtifact,
  type GoalsProgressArtifact,
  type MetricSummary,
  type MonthlyProgressionArtifact,
  type PeriodComparisonArtifact,
  type SummaryStatsArtifact,
  type WeeklyComparisonArtifact,
  type WeeklyPatternsArtifact,
} from "@health-analytics/contracts";
import { isoWeekKey, monthKey, weekdayLabel } from "./dates.js";
import { roundTo, truncate } from "./rounding.js";
import { maxOf, mean, minOf, sum } from "./statistics.js";
import type { DailyAggregate, DailyReadings, DailyStats, DailyStatsKey, DailyTotals } from "./types.js";

export const DAILY_TREND_DAYS = 30;
export const WEEKLY_COMPARISON_WEEKS = 12;
export const GOAL_WINDOW_DAYS = 7;
export const PERIOD_COMPARISON_DAYS = 30;

function sortedByDate<T extends { date: string }>(days: readonly T[]): T[] {
  return [...days].sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
}

function lastDays<T extends { date: string }>(days: readonly T[], count: number): T[] {
  return count > 0 ? sortedByDate(days).slice(-count) : [];
}

const flag = (hit: boolean): 0 | 1 => (hit ? 1 : 0);

// ── Dashboard views ──────────────────────────────────────────────────

/** Parallel arrays over the most recent `window` records. Absent metrics read as 0. */
export function generateDailyTrends(
  days: readonly DailyAggregate[],
  window = DAILY_TREND_DAYS,
): DailyTrendsArtifact {
  const trends: DailyTrendsArtifact = {
    dates: [],
    steps: [],
    distance: [],
    active_energy: [],
    exercise_minutes: [],
    stand_hours: [],
    resting_hr: [],
    hrv: [],
  };

  for (const day of lastDays(days, window)) {
    const { totals, readings } = day;
    trends.dates.push(day.date);
    trends.steps.push(totals.steps ?? 0);
    trends.distance.push(totals.distanceKm ?? 0);
    trends.active_energy.push(totals.activeEnergyKcal ?? 0);
    trends.exercise_minutes.push(totals.exerciseMinutes ?? 0);
    trends.stand_hours.push(totals.standHours ?? 0);
    trends.resting_hr.push(readings.restingHr ?? 0);
    trends.hrv.push(readings.hrvAvg ?? 0);
  }

  return trends;
}

/** Per-ISO-week averages of the activity totals, most recent `weeks` buckets. */
export function generateWeeklyComparison(
  days: readonly DailyAggregate[],
  weeks = WEEKLY_COMPARISON_WEEKS,
): WeeklyComparisonArtifact {
  const buckets = new Map<string, DailyTotals[]>();
  for (const day of sortedByDate(days)) {
    const key = isoWeekKey(day.date);
    const bucket = buckets.get(key) ?? [];
    bucket.push(day.totals);
    buckets.set(key, bucket);
  }

  const result: WeeklyComparisonArtifact = {
    weeks: [],
    avg_steps: [],
    avg_distance: [],
    avg_energy: [],
    avg_exercise: [],
  };

  const keys = [...buckets.keys()].sort().slice(-weeks);
  for (const key of keys) {
    const totals = buckets.get(key) ?? [];
    result.weeks.push(key);
    result.avg_steps.push(truncate(mean(totals.map((t) => t.steps ?? 0))));
    result.avg_distance.push(roundTo(mean(totals.map((t) => t.distanceKm ?? 0)), 1));
    result.avg_energy.push(truncate(mean(totals.map((t) => t.activeEnergyKcal ?? 0))));
    result.avg_exercise.push(truncate(mean(totals.map((t) => t.exerciseMinutes ?? 0))));
  }

  return result;
}

/** 0/1 goal flags for the most recent `window` records. */
export function generateGoalsProgress(
  days: readonly DailyAggregate[],
  window = GOAL_WINDOW_DAYS,
): GoalsProgressArtifact {
  const goals: GoalsProgressArtifact = { dates: [], steps_goal: [], stand_goal: [], exercise_goal: [] };

  for (const day of lastDays(days, window)) {
    goals.dates.push(day.date);
    goals.steps_goal.push(flag((day.totals.steps ?? 0) >= GOALS.steps));
    goals.stand_goal.push(flag((day.totals.standHours ?? 0) >= GOALS.standHours));
    goals.exercise_goal.push(flag((day.totals.exerciseMinutes ?? 0) >= GOALS.exerciseMinutes));
  }

  return goals;
}

/**
 * Totals, averages and goal tallies over the most recent `window` records.
 * Resting HR and HRV average only the days that have a reading.
 */
export function generateSummaryStats(
  days: readonly DailyAggregate[],
  window = GOAL_WINDOW_DAYS,
): SummaryStatsArtifact {
  const recent = lastDays(days, window);
  const first = recent[0];
  const last = recent[recent.length - 1];

  const steps = recent.map((d) => d.totals.steps ?? 0);
  const distance = recent.map((d) => d.totals.distanceKm ?? 0);
  const energy = recent.map((d) => d.totals.activeEnergyKcal ?? 0);
  const exercise = recent.map((d) => d.totals.exerciseMinutes ?? 0);
  const stands = recent.map((d) => d.totals.standHours ?? 0);
  const restingHr = recent.flatMap((d) => (d.readings.restingHr ? [d.readings.restingHr] : []));
  const hrv = recent.flatMap((d) => (d.readings.hrvAvg ? [d.readings.hrvAvg] : []));

  const tally = (values: number[], goal: number) => ({
    achieved: values.filter((v) => v >= goal).length,
    total: values.length,
  });

  return {
    period: first && last ? `${first.date} to ${last.date}` : null,
    days_count: recent.length,
    totals: {
      steps: sum(steps),
      distance_km: roundTo(sum(distance), 1),
      active_energy_kcal: sum(energy),
      exercise_minutes: sum(exercise),
    },
    averages: {
      steps: truncate(mean(steps)),
      distance_km: roundTo(mean(distance), 1),
      active_energy_kcal: truncate(mean(energy)),
      exercise_minutes: truncate(mean(exercise)),
      stand_hours: roundTo(mean(stands), 1),
      resting_hr: truncate(mean(restingHr)),
      hrv: truncate(mean(hrv)),
    },
    goals: {
      steps_10k: tally(steps, GOALS.steps),
      stand_12h: tally(stands, GOALS.standHours),
      exercise_30m: tally(exercise, GOALS.exerciseMinutes),
    },
  };
}

export type WeeklyStats = Record<string, MetricSummary>;

/**
 * Per-metric values, average, extremes and total over a window of days.
 * Keys are the `DailyTotals` and `DailyReadings` field names. Null for an
 * empty window.
 */
export function calculateWeeklyStats(days: readonly DailyAggregate[]): WeeklyStats | null {
  if (days.length === 0) return null;

  const collected = new Map<string, number[]>();
  const collect = (fields: DailyTotals | DailyReadings) => {
    for (const [key, value] of Object.entries(fields)) {
      if (typeof value !== "number") continue;
      const values = collected.get(key) ?? [];
      values.push(value);
      collected.set(key, values);
    }
  };

  for (const day of sortedByDate(days)) {
    collect(day.totals);
    collect(day.readings);
  }

  const stats: WeeklyStats = {};
  for (const [key, values] of collected) {
    stats[key] = {
      values,
      avg: mean(values),
      min: minOf(values) ?? 0,
      max: maxOf(values) ?? 0,
      total: sum(values),
      count: values.length,
    };
  }
  return stats;
}

// ── Deep-analysis views ──────────────────────────────────────────────

/** Deep-analysis metrics reported by pattern and comparison views, keyed by output name. */
const TRACKED_METRICS = {
  steps: "steps",
  exercise_min: "exerciseMin",
  resting_hr: "restingHr",
  hrv_avg: "hrvAvg",
  vo2_max: "vo2Max",
} as const satisfies Record<string, DailyStatsKey>;

type TrackedMetric = keyof typeof TRACKED_METRICS;

const PATTERN_METRICS = ["steps", "exercise_min", "resting_hr", "hrv_avg"] as const satisfies readonly TrackedMetric[];
const PROGRESSION_METRICS = [...PATTERN_METRICS, "vo2_max"] as const satisfies readonly TrackedMetric[];

function positive(stats: DailyStats, metric: TrackedMetric): number | null {
  const value = stats[TRACKED_METRICS[metric]];
  return value !== undefined && value > 0 ? value : null;
}

function positiveValues(days: readonly DailyStats[], metric: TrackedMetric): number[] {
  return days.flatMap((d) => {
    const value = positive(d, metric);
    return value === null ? [] : [value];
  });
}

/** Mean of each metric per weekday across the whole history. */
export function analyzeWeeklyPatterns(days: readonly DailyStats[]): WeeklyPatternsArtifact {
  const result: WeeklyPatternsArtifact = {};

  for (const label of weekdayLabels) {
    const onDay = days.filter((d) => weekdayLabel(d.date) === label);
    const entry: Partial<Record<(typeof PATTERN_METRICS)[number], number>> = {};
    for (const metric of PATTERN_METRICS) {
      const values = positiveValues(onDay, metric);
      if (values.length > 0) entry[metric] = mean(values);
    }
    result[label] = entry;
  }

  return result;
}

/** Per `YYYY-MM` means of non-zero values, chronological. */
export function analyzeMonthlyProgression(days: readonly DailyStats[]): MonthlyProgressionArtifact {
  const months = new Map<string, DailyStats[]>();
  for (const day of sortedByDate(days)) {
    const key = monthKey(day.date);
    const bucket = months.get(key) ?? [];
    bucket.push(day);
    months.set(key, bucket);
  }

  return [...months.keys()].sort().map((month) => {
    const inMonth = months.get(month) ?? [];
    const entry: MonthlyProgressionArtifact[number] = { month };
    for (const metric of PROGRESSION_METRICS) {
      const values = positiveValues(inMonth, metric);
      if (values.length > 0) entry[metric] = mean(values);
    }
    return entry;
  });
}

/**
 * Most recent `days` records against the `days` records before them.
 * Needs at least `2 × days` records; otherwise empty.
 */
export function compareRecentToPrevious(
  days: readonly DailyStats[],
  period = PERIOD_COMPARISON_DAYS,
): PeriodComparisonArtifact {
  const sorted = sortedByDate(days);
  if (period <= 0 || sorted.length < period * 2) return {};

  const recent = sorted.slice(-period);
  const previous = sorted.slice(-period * 2, -period);
  const comparisons: PeriodComparisonArtifact = {};

  for (const metric of PROGRESSION_METRICS) {
    const recentValues = positiveValues(recent, metric);
    const previousValues = positiveValues(previous, metric);
    if (recentValues.length === 0 || previousValues.length === 0) continue;

    const recentAvg = mean(recentValues);
    const previousAvg = mean(previousValues);
    const change = recentAvg - previousAvg;
    comparisons[metric] = {
      recent_avg: recentAvg,
      previous_avg: previousAvg,
      change,
      pct_change: previousAvg ? (100 * change) / previousAvg : 0,
    };
  }

  return comparisons;
}

interface TrajectoryRule {
  output: keyof FitnessTrajectoryArtifact;
  field: DailyStatsKey;
  improving: (early: number, late: number) => boolean;
}

const TRAJECTORY_RULES: readonly TrajectoryRule[] = [
  { output: "vo2_max", field: "vo2Max", improving: (early, late) => late > early + 1 },
  { output: "resting_hr", field: "restingHr", improving: (early, late) => late < early - 2 },
  { output: "hrv", field: "hrvAvg", improving: (early, late) => late > early + 5 },
];

/**
 * Early third against late third of each fitness marker's history.
 * The early window is the first floor(n/3) observations, the late window
 * the last ceil(n/3). A marker with fewer than three observations is omitted.
 */
export function analyzeFitnessTrajectory(days: readonly DailyStats[]): FitnessTrajectoryArtifact {
  const result: FitnessTrajectoryArtifact = {};
  const sorted = sortedByDate(days);

  for (const rule of TRAJECTORY_RULES) {
    const values = sorted.flatMap((d) => {
      const value = d[rule.field];
      return value === undefined ? [] : [value];
    });
    const third = Math.floor(values.length / 3);
    if (third === 0) continue;

    const earlyAvg = mean(values.slice(0, third));
    const lateAvg = mean(values.slice(-Math.ceil(values.length / 3)));
    result[rule.output] = {
      early_avg: earlyAvg,
      late_avg: lateAvg,
      change: lateAvg - earlyAvg,
      improving: rule.improving(earlyAvg, lateAvg),
    };
  }

  return result;
}
