/**
 * Which resting heart-rate reading represents the day.
 *
 * The dashboard pipeline takes the last reading of the day, the deep-analysis
 * pipeline the first. Both are kept; each caller names its policy.
 */
export type RestingHrPolicy = "first" | "last";

/** Summed totals for one day. A metric missing from the export is omitted. */
export interface DailyTotals {
  steps?: number;
  distanceKm?: number;
  activeEnergyKcal?: number;
  exerciseMinutes?: number;
  standHours?: number;
  flights?: number;
  daylightMinutes?: number;
}

/** Point readings for one day. */
export interface DailyReadings {
  restingHr?: number;
  vo2Max?: number;
  hrvAvg?: number;
  walkingHr?: number;
  bloodOxygen?: number;
}

export interface HeartRateStats {
  count: number;
  min: number;
  max: number;
  avg: number;
}

/** One calendar day as the dashboard pipeline sees it. */
export interface DailyAggregate {
  date: string; // YYYY-MM-DD
  totals: DailyTotals;
  readings: DailyReadings;
  hrStats: HeartRateStats | null;
}

/** One calendar day as the deep-analysis pipeline sees it (unrounded). */
export interface DailyStats {
  date: string; // YYYY-MM-DD
  steps?: number;
  distanceKm?: number;
  flights?: number;
  exerciseMin?: number;
  activeCal?: number;
  standHours?: number;
  daylightMin?: number;
  swimDistance?: number;
  swimStrokes?: number;
  hrAvg?: number;
  hrMin?: number;
  hrMax?: number;
  restingHr?: number;
  hrvAvg?: number;
  vo2Max?: number;
  walkSpeed?: number;
  stepLength?: number;
  walkAsymmetry?: number;
  spo2Avg?: number;
  spo2Min?: number;
  respRate?: number;
}

export type DailyStatsKey = Exclude<keyof DailyStats, "date">;

export interface WorkoutDayTotals {
  workoutCount: number;
  totalVolumeKg: number;
  totalSets: number;
  totalReps: number;
  durationMinutes: number;
  exerciseCount: number;
  muscleGroups: string[];
}

export interface ExerciseRecordSummary {
  maxWeightKg: number;
  maxWeightDate: string | null;
  maxVolumeKg: number;
  maxVolumeDate: string | null;
  totalSessions: number;
}

export interface MuscleGroupStats {
  periodDays: number;
  workoutCount: number;
  volumeByGroup: Record<string, number>;
  volumePercentages: Record<string, number>;
  frequencyByGroup: Record<string, number>;
  setsByGroup: Record<string, number>;
}

export interface WeeklyWorkoutSummary {
  weekStart: string;
  weekEnd: string;
  workoutCount: number;
  totalVolumeKg: number;
  totalSets: number;
  avgDuration: number;
  muscleGroups: string[];
}
