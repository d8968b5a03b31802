export const metricNames = [
  "step_count",
  "walking_running_distance",
  "active_energy",
  "apple_exercise_time",
  "apple_stand_hour",
  "flights_climbed",
  "time_in_daylight",
  "swimming_distance",
  "swimming_stroke_count",
  "heart_rate",
  "resting_heart_rate",
  "heart_rate_variability",
  "vo2_max",
  "walking_heart_rate_average",
  "walking_speed",
  "walking_step_length",
  "walking_asymmetry_percentage",
  "blood_oxygen_saturation",
  "respiratory_rate"
] as const;

export type MetricName = (typeof metricNames)[number];

export const METRIC = {
  STEPS: "step_count",
  DISTANCE: "walking_running_distance",
  ACTIVE_ENERGY: "active_energy",
  EXERCISE_TIME: "apple_exercise_time",
  STAND_HOUR: "apple_stand_hour",
  FLIGHTS: "flights_climbed",
  DAYLIGHT: "time_in_daylight",
  SWIM_DISTANCE: "swimming_distance",
  SWIM_STROKES: "swimming_stroke_count",
  HEART_RATE: "heart_rate",
  RESTING_HR: "resting_heart_rate",
  HRV: "heart_rate_variability",
  VO2_MAX: "vo2_max",
  WALKING_HR: "walking_heart_rate_average",
  WALKING_SPEED: "walking_speed",
  STEP_LENGTH: "walking_step_length",
  WALKING_ASYMMETRY: "walking_asymmetry_percentage",
  BLOOD_OXYGEN: "blood_oxygen_saturation",
  RESPIRATORY_RATE: "respiratory_rate"
} as const satisfies Record<string, MetricName>;

/** Daily goals shared by the goal arrays, summary stats and insight rules. */
export const GOALS = {
  steps: 10000,
  standHours: 12,
  exerciseMinutes: 30
} as const;

export const weekdayLabels = ["Mon", "Tue", "Wed", "Thu", "Fri", "Sat", "Sun"] as const;
export type WeekdayLabel = (typeof weekdayLabels)[number];
