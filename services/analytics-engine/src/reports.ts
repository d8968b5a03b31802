/**
 * Report builders
 *
 * Assemble the artifact documents each dashboard report writes, from
 * already-aggregated records. Callers supply the clock.
 */

import {
  GOALS,
  type MetricSummary,
  type WeeklySummaryArtifact,
  type WeeklyWorkoutsArtifact,
} from "@health-analytics/contracts";
import type {
  DailyTrendsArtifact,
  DashboardMetadata,
  DeepAnalysisArtifact,
  ExercisePrsArtifact,
  GoalsProgressArtifact,
  HealthScoreArtifact,
  HrDistributionArtifact,
  Insight,
  InsightsArtifact,
  MuscleGroupsArtifact,
  PersonalRecordsArtifact,
  SummaryStatsArtifact,
  WeeklyComparisonArtifact,
  WorkoutRecord,
  WorkoutSummaryArtifact,
  WorkoutTrendsArtifact,
} from "@health-analytics/contracts";
import { detectAnomalies, findCorrelations } from "./correlation-engine.js";
import { dayRange } from "./dates.js";
import { calculateHealthScore, generateHeartRateDistribution } from "./health-score.js";
import { generateActionableInsights, generateInsights } from "./insights.js";
import { findPersonalRecords, findStreaks, generatePersonalRecords } from "./records.js";
import {
  analyzeFitnessTrajectory,
  analyzeMonthlyProgression,
  analyzeWeeklyPatterns,
  calculateWeeklyStats,
  compareRecentToPrevious,
  generateDailyTrends,
  generateGoalsProgress,
  generateSummaryStats,
  generateWeeklyComparison,
  type WeeklyStats,
} from "./trend-engine.js";
import type { DailyAggregate, DailyReadings, DailyStats, DailyTotals } from "./types.js";
import {
  generateExercisePrs,
  generateMuscleGroupData,
  generateWorkoutInsights,
  generateWorkoutSummary,
  generateWorkoutTrends,
  getWeeklyWorkoutSummary,
} from "./workout-aggregator.js";

export const DASHBOARD_VERSION = "2.0.0";

export const DASHBOARD_FEATURES = [
  "daily_trends",
  "weekly_comparison",
  "goals_progress",
  "summary_stats",
  "hr_distribution",
  "health_score",
  "insights",
  "personal_records",
] as const;

// ── Activity dashboard ──────────────────────────────────────────────

export interface DashboardOptions {
  /** Requested load window, inclusive */
  range: { start: string; end: string };
  /** ISO timestamp stamped into metadata */
  generatedAt: string;
  trendDays?: number;
  goalDays?: number;
}

export interface DashboardArtifacts {
  daily_trends: DailyTrendsArtifact;
  weekly_comparison: WeeklyComparisonArtifact;
  goals_progress: GoalsProgressArtifact;
  summary_stats: SummaryStatsArtifact;
  hr_distribution: HrDistributionArtifact;
  health_score: HealthScoreArtifact;
  insights: InsightsArtifact;
  personal_records: PersonalRecordsArtifact;
  metadata: DashboardMetadata;
}

export function buildDashboardArtifacts(
  days: readonly DailyAggregate[],
  options: DashboardOptions,
): DashboardArtifacts {
  const goalDays = options.goalDays ?? 7;
  const summary = generateSummaryStats(days, goalDays);
  const dates = days.map((d) => d.date).sort();

  return {
    daily_trends: generateDailyTrends(days, options.trendDays ?? 30),
    weekly_comparison: generateWeeklyComparison(days),
    goals_progress: generateGoalsProgress(days, goalDays),
    summary_stats: summary,
    hr_distribution: generateHeartRateDistribution(days, goalDays),
    health_score: calculateHealthScore(summary.averages),
    insights: { insights: generateInsights(days, summary) },
    personal_records: generatePersonalRecords(days),
    metadata: {
      generated_at: options.generatedAt,
      data_range: {
        start: options.range.start,
        end: options.range.end,
        days_loaded: days.length,
      },
      last_update: dates[dates.length - 1] ?? null,
      version: DASHBOARD_VERSION,
      features: [...DASHBOARD_FEATURES],
    },
  };
}

// ── Deep analysis ───────────────────────────────────────────────────

export function generateHealthReport(days: readonly DailyStats[]): DeepAnalysisArtifact {
  const dates = days.map((d) => d.date).sort();

  return {
    overview: {
      total_days: days.length,
      date_range: {
        start: dates[0] ?? null,
        end: dates[dates.length - 1] ?? null,
      },
    },
    fitness_trajectory: analyzeFitnessTrajectory(days),
    weekly_patterns: analyzeWeeklyPatterns(days),
    monthly_progression: analyzeMonthlyProgression(days),
    correlations: findCorrelations(days),
    streaks: findStreaks(days),
    personal_records: findPersonalRecords(days),
    anomalies: detectAnomalies(days),
    recent_vs_previous: compareRecentToPrevious(days),
  };
}

export interface DeepAnalysisArtifacts {
  report: DeepAnalysisArtifact;
  insights: Insight[];
}

export function buildDeepAnalysisArtifacts(days: readonly DailyStats[]): DeepAnalysisArtifacts {
  const report = generateHealthReport(days);
  return { report, insights: generateActionableInsights(report) };
}

// ── Workout dashboard ───────────────────────────────────────────────

export interface WorkoutOptions {
  today: string;
  generatedAt: string;
  trendDays?: number;
  summaryDays?: number;
  muscleGroupDays?: number;
  prLimit?: number;
}

export interface WorkoutArtifacts {
  workout_trends: WorkoutTrendsArtifact;
  workout_summary: WorkoutSummaryArtifact;
  muscle_groups: MuscleGroupsArtifact;
  exercise_prs: ExercisePrsArtifact;
  workout_insights: InsightsArtifact;
}

/** Muscle groups cover the same 30 days as the trends by default. */
export function buildWorkoutArtifacts(
  workouts: readonly WorkoutRecord[],
  options: WorkoutOptions,
): WorkoutArtifacts {
  const { today } = options;
  const summary = generateWorkoutSummary(workouts, options.summaryDays ?? 7, today);
  const muscles = generateMuscleGroupData(workouts, options.muscleGroupDays ?? 30, today);

  return {
    workout_trends: generateWorkoutTrends(workouts, options.trendDays ?? 30, today),
    workout_summary: summary,
    muscle_groups: muscles,
    exercise_prs: generateExercisePrs(workouts, options.prLimit ?? 20, options.generatedAt),
    workout_insights: { insights: generateWorkoutInsights(workouts, summary, muscles, today) },
  };
}

// ── Weekly summary ──────────────────────────────────────────────────

/** Artifact key for each daily total and reading. */
const WEEKLY_STAT_NAMES = {
  steps: "steps",
  distanceKm: "distance_km",
  activeEnergyKcal: "active_energy_kcal",
  exerciseMinutes: "exercise_minutes",
  standHours: "stand_hours",
  flights: "flights",
  daylightMinutes: "daylight_minutes",
  restingHr: "resting_hr",
  vo2Max: "vo2_max",
  hrvAvg: "hrv_avg",
  walkingHr: "walking_hr",
  bloodOxygen: "blood_oxygen",
} as const satisfies Record<keyof DailyTotals | keyof DailyReadings, string>;

function weeklyStatName(field: string): string {
  for (const [key, name] of Object.entries(WEEKLY_STAT_NAMES)) {
    if (key === field) return name;
  }
  return field;
}

function goalDays(summary: MetricSummary | undefined, goal: number) {
  if (!summary) return undefined;
  return { met: summary.values.filter((v) => v >= goal).length, count: summary.count };
}

export interface WeeklySummaryOptions {
  /** Inclusive window, normally the seven days ending yesterday */
  range: { start: string; end: string };
  generatedAt: string;
}

/**
 * Per-metric values, average, extremes and total over the window, plus how
 * many of the recorded days met each daily goal. Days outside the window are
 * ignored.
 */
export function buildWeeklySummaryArtifact(
  days: readonly DailyAggregate[],
  options: WeeklySummaryOptions,
): WeeklySummaryArtifact {
  const { start, end } = options.range;
  const inWindow = days.filter((d) => d.date >= start && d.date <= end);

  const weekly: WeeklyStats = calculateWeeklyStats(inWindow) ?? {};
  const stats: Record<string, MetricSummary> = {};
  for (const [field, summary] of Object.entries(weekly)) {
    stats[weeklyStatName(field)] = summary;
  }

  const steps = goalDays(stats["steps"], GOALS.steps);
  const stand = goalDays(stats["stand_hours"], GOALS.standHours);
  const exercise = goalDays(stats["exercise_minutes"], GOALS.exerciseMinutes);

  return {
    week_start: start,
    week_end: end,
    days_in_window: dayRange(start, end).length,
    days_analyzed: inWindow.length,
    stats,
    goal_days: {
      ...(steps ? { steps } : {}),
      ...(stand ? { stand_hours: stand } : {}),
      ...(exercise ? { exercise_minutes: exercise } : {}),
    },
    generated_at: options.generatedAt,
  };
}

/** Monday-to-Sunday workout buckets, newest first. */
export function buildWeeklyWorkoutsArtifact(
  workouts: readonly WorkoutRecord[],
  options: { today: string; weeks?: number; generatedAt: string },
): WeeklyWorkoutsArtifact {
  return {
    weeks: getWeeklyWorkoutSummary(workouts, options.weeks ?? 4, options.today).map((week) => ({
      week_start: week.weekStart,
      week_end: week.weekEnd,
      workout_count: week.workoutCount,
      total_volume_kg: week.totalVolumeKg,
      total_sets: week.totalSets,
      avg_duration: week.avgDuration,
      muscle_groups: week.muscleGroups,
    })),
    generated_at: options.generatedAt,
  };
}
