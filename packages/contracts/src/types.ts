/** One reading as it appears in a daily export. Shapes vary across exporters. */
export type RawReading = Record<string, unknown>;

export type MetricSeries = {
  units: string;
  count: number;
  data: RawReading[];
};

/** Metric name → its readings for a single day. */
export type MetricMap = Record<string, MetricSeries>;

export type WorkoutSet = {
  reps: number;
  weightKg: number;
  /** Set type tag as supplied by the tracker (working, warmup, drop, ...) */
  type: string;
};

export type ExerciseRecord = {
  name: string;
  muscleGroup: string;
  sets: WorkoutSet[];
  /** Sum of reps × weight over volume-counting sets only */
  volumeKg: number;
  maxWeightKg: number;
  totalReps: number;
  /** Every set, warm-ups included */
  setCount: number;
};

export type WorkoutRecord = {
  id: string;
  name: string;
  date: string; // YYYY-MM-DD
  startTime: string;
  endTime: string;
  durationMinutes: number;
  exercises: ExerciseRecord[];
  totalVolumeKg: number;
  totalSets: number;
  totalReps: number;
  muscleGroups: string[];
  exerciseCount: number;
};

export type ExerciseTemplate = {
  id?: string;
  title?: string;
  primary_muscle_group?: string;
  secondary_muscle_groups?: string[];
};

export type ExerciseTemplateMap = Record<string, ExerciseTemplate>;

export type InsightType = "positive" | "warning" | "neutral";

export type Insight = {
  type: InsightType;
  icon: string;
  title: string;
  text: string;
};

export type DatedValue = {
  value: number;
  date: string | null;
};
