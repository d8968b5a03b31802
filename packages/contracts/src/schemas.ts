import { z } from "zod";
import { weekdayLabels } from "./metrics.js";

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "Must be YYYY-MM-DD");

// ============================================================================
// RAW INPUT SCHEMAS (daily export, workout tracker)
// ============================================================================

export const rawReadingSchema = z.record(z.unknown());

export const rawMetricSchema = z.object({
  name: z.string().optional(),
  units: z.string().optional(),
  data: z.array(z.unknown()).optional()
}).passthrough();

/**
 * Envelope of one daily export. `metrics` is either a list of named metric
 * objects or an object keyed by metric name.
 */
export const rawDailyExportSchema = z.object({
  data: z.object({
    metrics: z.union([z.array(z.unknown()), z.record(z.unknown())])
  }).passthrough()
}).passthrough();

export const exerciseTemplateSchema = z.object({
  id: z.string().optional(),
  title: z.string().optional(),
  primary_muscle_group: z.string().optional(),
  secondary_muscle_groups: z.array(z.string()).optional()
}).passthrough();

export const exerciseTemplateMapSchema = z.record(exerciseTemplateSchema);

// ============================================================================
// SHARED ARTIFACT PIECES
// ============================================================================

export const insightSchema = z.object({
  type: z.enum(["positive", "warning", "neutral"]),
  icon: z.string(),
  title: z.string().min(1),
  text: z.string().min(1)
});

export const insightsArtifactSchema = z.object({
  insights: z.array(insightSchema).min(1)
});

export const datedValueSchema = z.object({
  value: z.number(),
  date: isoDate.nullable()
});

const goalTallySchema = z.object({
  achieved: z.number().int().nonnegative(),
  total: z.number().int().nonnegative()
});

const binaryFlag = z.union([z.literal(0), z.literal(1)]);

// ============================================================================
// DASHBOARD ARTIFACTS
// ============================================================================

export const dailyTrendsArtifactSchema = z.object({
  dates: z.array(isoDate),
  steps: z.array(z.number()),
  distance: z.array(z.number()),
  active_energy: z.array(z.number()),
  exercise_minutes: z.array(z.number()),
  stand_hours: z.array(z.number()),
  resting_hr: z.array(z.number()),
  hrv: z.array(z.number())
});

export const weeklyComparisonArtifactSchema = z.object({
  weeks: z.array(z.string().regex(/^\d{4}-W\d{2}$/)),
  avg_steps: z.array(z.number()),
  avg_distance: z.array(z.number()),
  avg_energy: z.array(z.number()),
  avg_exercise: z.array(z.number())
});

export const goalsProgressArtifactSchema = z.object({
  dates: z.array(isoDate),
  steps_goal: z.array(binaryFlag),
  stand_goal: z.array(binaryFlag),
  exercise_goal: z.array(binaryFlag)
});

export const summaryStatsArtifactSchema = z.object({
  period: z.string().nullable(),
  days_count: z.number().int().nonnegative(),
  totals: z.object({
    steps: z.number(),
    distance_km: z.number(),
    active_energy_kcal: z.number(),
    exercise_minutes: z.number()
  }),
  averages: z.object({
    steps: z.number(),
    distance_km: z.number(),
    active_energy_kcal: z.number(),
    exercise_minutes: z.number(),
    stand_hours: z.number(),
    resting_hr: z.number(),
    hrv: z.number()
  }),
  goals: z.object({
    steps_10k: goalTallySchema,
    stand_12h: goalTallySchema,
    exercise_30m: goalTallySchema
  })
});

export const hrZoneLabels = ["resting", "light", "moderate", "vigorous", "peak"] as const;

export const hrDistributionArtifactSchema = z.object({
  labels: z.array(z.enum(hrZoneLabels)).length(5),
  values: z.array(z.number().int().nonnegative()).length(5)
});

export const healthScoreLevelSchema = z.enum(["excellent", "good", "moderate", "needs_work"]);

export const healthScoreArtifactSchema = z.object({
  score: z.number().int().min(0).max(100),
  description: z.string(),
  level: healthScoreLevelSchema,
  breakdown: z.object({
    steps: z.number().optional(),
    exercise: z.number().optional(),
    stand: z.number().optional(),
    resting_hr: z.number().optional(),
    hrv: z.number().optional()
  }),
  max_score: z.literal(100)
});

export const personalRecordsArtifactSchema = z.object({
  max_steps: datedValueSchema,
  max_distance: datedValueSchema,
  max_exercise: datedValueSchema,
  lowest_resting_hr: datedValueSchema,
  highest_hrv: datedValueSchema
});

export const dashboardMetadataSchema = z.object({
  generated_at: z.string(),
  data_range: z.object({
    start: isoDate,
    end: isoDate,
    days_loaded: z.number().int().nonnegative()
  }),
  last_update: isoDate.nullable(),
  version: z.string(),
  features: z.array(z.string())
});

// ============================================================================
// WORKOUT ARTIFACTS
// ============================================================================

export const workoutTrendsArtifactSchema = z.object({
  dates: z.array(isoDate),
  workout_count: z.array(z.number().int().nonnegative()),
  volume_kg: z.array(z.number().nonnegative()),
  duration_minutes: z.array(z.number().int().nonnegative()),
  sets: z.array(z.number().int().nonnegative()),
  exercises: z.array(z.number().int().nonnegative())
});

export const workoutSummaryArtifactSchema = z.object({
  period_days: z.number().int().positive(),
  workout_count: z.number().int().nonnegative(),
  avg_workouts_per_week: z.number().nonnegative(),
  total_volume_kg: z.number().nonnegative(),
  total_sets: z.number().int().nonnegative(),
  total_reps: z.number().int().nonnegative(),
  total_duration_minutes: z.number().int().nonnegative(),
  avg_workout_duration: z.number().int().nonnegative(),
  unique_exercises: z.number().int().nonnegative(),
  training_days: z.number().int().nonnegative()
});

export const muscleGroupsArtifactSchema = z.object({
  labels: z.array(z.string()),
  volume_kg: z.array(z.number().nonnegative()),
  percentages: z.array(z.number().nonnegative()),
  sets: z.array(z.number().int().nonnegative()),
  frequency: z.array(z.number().int().nonnegative()),
  total_volume_kg: z.number().nonnegative()
});

export const exercisePrSchema = z.object({
  name: z.string(),
  max_weight_kg: z.number().nonnegative(),
  max_weight_date: isoDate.nullable(),
  max_volume_kg: z.number().nonnegative(),
  max_volume_date: isoDate.nullable(),
  total_sessions: z.number().int().positive()
});

export const exercisePrsArtifactSchema = z.object({
  exercises: z.array(exercisePrSchema),
  generated_at: z.string()
});

// ============================================================================
// WEEKLY SUMMARY ARTIFACTS
// ============================================================================

export const metricSummarySchema = z.object({
  values: z.array(z.number()),
  avg: z.number(),
  min: z.number(),
  max: z.number(),
  total: z.number(),
  count: z.number().int().positive()
});

const goalDaysSchema = z.object({
  met: z.number().int().nonnegative(),
  count: z.number().int().nonnegative()
});

export const weeklySummaryArtifactSchema = z.object({
  week_start: isoDate,
  week_end: isoDate,
  days_in_window: z.number().int().positive(),
  days_analyzed: z.number().int().nonnegative(),
  stats: z.record(metricSummarySchema),
  goal_days: z.object({
    steps: goalDaysSchema.optional(),
    stand_hours: goalDaysSchema.optional(),
    exercise_minutes: goalDaysSchema.optional()
  }),
  generated_at: z.string()
});

export const workoutWeekSchema = z.object({
  week_start: isoDate,
  week_end: isoDate,
  workout_count: z.number().int().nonnegative(),
  total_volume_kg: z.number().nonnegative(),
  total_sets: z.number().int().nonnegative(),
  avg_duration: z.number().int().nonnegative(),
  muscle_groups: z.array(z.string())
});

export const weeklyWorkoutsArtifactSchema = z.object({
  weeks: z.array(workoutWeekSchema),
  generated_at: z.string()
});

// ============================================================================
// DEEP ANALYSIS ARTIFACTS
// ============================================================================

const trajectoryEntrySchema = z.object({
  early_avg: z.number(),
  late_avg: z.number(),
  change: z.number(),
  improving: z.boolean()
});

export const fitnessTrajectorySchema = z.object({
  vo2_max: trajectoryEntrySchema.optional(),
  resting_hr: trajectoryEntrySchema.optional(),
  hrv: trajectoryEntrySchema.optional()
});

const patternMetricsSchema = z.object({
  steps: z.number().optional(),
  exercise_min: z.number().optional(),
  resting_hr: z.number().optional(),
  hrv_avg: z.number().optional()
});

export const weeklyPatternsArtifactSchema = z.record(z.enum(weekdayLabels), patternMetricsSchema);

export const monthlyProgressionArtifactSchema = z.array(
  patternMetricsSchema.extend({
    month: z.string().regex(/^\d{4}-\d{2}$/),
    vo2_max: z.number().optional()
  })
);

export const correlationsArtifactSchema = z.object({
  exercise_to_rhr: z.object({
    high_exercise_threshold: z.number(),
    high_exercise_next_rhr: z.number(),
    low_exercise_next_rhr: z.number(),
    difference: z.number()
  }).optional(),
  steps_to_hrv: z.object({
    low_steps_hrv: z.number(),
    medium_steps_hrv: z.number(),
    high_steps_hrv: z.number()
  }).optional()
});

export const streaksSchema = z.object({
  longest_step_streak: z.number().int().nonnegative(),
  longest_streak_end: isoDate.nullable(),
  current_streak: z.number().int().nonnegative(),
  exercise_days: z.number().int().nonnegative(),
  total_days: z.number().int().nonnegative(),
  exercise_consistency: z.number().min(0).max(1)
});

export const allPersonalRecordsArtifactSchema = z.record(datedValueSchema);

const flaggedDaySchema = z.tuple([isoDate, z.number()]);

export const anomaliesSchema = z.object({
  low_hrv_days: z.array(flaggedDaySchema).max(10).optional(),
  hrv_avg: z.number().optional(),
  high_intensity_days: z.array(flaggedDaySchema).max(10).optional()
});

export const periodComparisonSchema = z.record(
  z.object({
    recent_avg: z.number(),
    previous_avg: z.number(),
    change: z.number(),
    pct_change: z.number()
  })
);

export const deepAnalysisArtifactSchema = z.object({
  overview: z.object({
    total_days: z.number().int().nonnegative(),
    date_range: z.object({
      start: isoDate.nullable(),
      end: isoDate.nullable()
    })
  }),
  fitness_trajectory: fitnessTrajectorySchema,
  weekly_patterns: weeklyPatternsArtifactSchema,
  monthly_progression: monthlyProgressionArtifactSchema,
  correlations: correlationsArtifactSchema,
  streaks: streaksSchema,
  personal_records: allPersonalRecordsArtifactSchema,
  anomalies: anomaliesSchema,
  recent_vs_previous: periodComparisonSchema
});

export const deepInsightsArtifactSchema = z.array(insightSchema).min(1);

// ============================================================================
// INFERRED TYPES
// ============================================================================

export type DailyTrendsArtifact = z.infer<typeof dailyTrendsArtifactSchema>;
export type WeeklyComparisonArtifact = z.infer<typeof weeklyComparisonArtifactSchema>;
export type GoalsProgressArtifact = z.infer<typeof goalsProgressArtifactSchema>;
export type SummaryStatsArtifact = z.infer<typeof summaryStatsArtifactSchema>;
export type HrDistributionArtifact = z.infer<typeof hrDistributionArtifactSchema>;
export type HealthScoreLevel = z.infer<typeof healthScoreLevelSchema>;
export type HealthScoreArtifact = z.infer<typeof healthScoreArtifactSchema>;
export type PersonalRecordsArtifact = z.infer<typeof personalRecordsArtifactSchema>;
export type DashboardMetadata = z.infer<typeof dashboardMetadataSchema>;
export type InsightsArtifact = z.infer<typeof insightsArtifactSchema>;
export type WorkoutTrendsArtifact = z.infer<typeof workoutTrendsArtifactSchema>;
export type WorkoutSummaryArtifact = z.infer<typeof workoutSummaryArtifactSchema>;
export type MuscleGroupsArtifact = z.infer<typeof muscleGroupsArtifactSchema>;
export type ExercisePrsArtifact = z.infer<typeof exercisePrsArtifactSchema>;
export type MetricSummary = z.infer<typeof metricSummarySchema>;
export type WeeklySummaryArtifact = z.infer<typeof weeklySummaryArtifactSchema>;
export type WorkoutWeek = z.infer<typeof workoutWeekSchema>;
export type WeeklyWorkoutsArtifact = z.infer<typeof weeklyWorkoutsArtifactSchema>;
export type FitnessTrajectoryArtifact = z.infer<typeof fitnessTrajectorySchema>;
export type WeeklyPatternsArtifact = z.infer<typeof weeklyPatternsArtifactSchema>;
export type MonthlyProgressionArtifact = z.infer<typeof monthlyProgressionArtifactSchema>;
export type CorrelationsArtifact = z.infer<typeof correlationsArtifactSchema>;
export type StreaksArtifact = z.infer<typeof streaksSchema>;
export type AllPersonalRecordsArtifact = z.infer<typeof allPersonalRecordsArtifactSchema>;
export type AnomaliesArtifact = z.infer<typeof anomaliesSchema>;
export type PeriodComparisonArtifact = z.infer<typeof periodComparisonSchema>;
export type DeepAnalysisArtifact = z.infer<typeof deepAnalysisArtifactSchema>;
