import { differenceInMinutes, isValid, parseISO } from "date-fns";
import type {
  ExerciseRecord,
  ExerciseTemplateMap,
  WorkoutRecord,
  WorkoutSet
} from "@health-analytics/contracts";
import { toQuantity } from "./metric-extraction.js";
import { FALLBACK_MUSCLE_GROUP, inferMuscleGroup } from "./muscle-groups.js";

type RawRecord = Record<string, unknown>;

/**
 * Candidate keys per logical field, in precedence order. The tracker API has
 * shipped several spellings; the first key holding a usable value wins.
 */
export const WORKOUT_FIELDS = {
  id: ["id", "workout_id"],
  name: ["name", "title"],
  start: ["start_time", "startTime", "started_at", "date"],
  end: ["end_time", "endTime", "ended_at", "completed_at"],
  exercises: ["exercises", "exercise_data"]
} as const;

export const EXERCISE_FIELDS = {
  name: ["title", "name", "exercise_name"],
  muscleGroup: ["muscle_group", "primary_muscle_group", "category"],
  sets: ["sets", "set_data"]
} as const;

export const SET_FIELDS = {
  reps: ["reps", "repetitions"],
  weight: ["weight_kg", "weight"],
  type: ["type", "set_type"]
} as const;

export const PAYLOAD_KEYS = ["workouts", "data", "results"] as const;

/** Set types that count toward volume and reps. Warm-ups count only as sets. */
export const VOLUME_SET_TYPES = new Set(["working", "normal", "drop", "dropset"]);

const LB_TO_KG = 0.453592;

export type ExtractWorkoutOptions = {
  /** Template id → template, consulted first for the muscle group */
  templateMap?: ExerciseTemplateMap;
  /** Date assigned to a workout whose start timestamp carries none */
  fallbackDate: string;
};

function isRecord(value: unknown): value is RawRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

export function firstString(record: RawRecord, keys: readonly string[]): string | undefined {
  for (const key of keys) {
    const value = record[key];
    if (typeof value === "string" && value !== "") return value;
    if (typeof value === "number" && value !== 0) return String(value);
  }
  return undefined;
}

export function firstNumber(record: RawRecord, keys: readonly string[]): number | undefined {
  for (const key of keys) {
    const value = toQuantity(record[key]);
    if (value !== 0) return value;
  }
  return undefined;
}

export function firstList(record: RawRecord, keys: readonly string[]): unknown[] | undefined {
  for (const key of keys) {
    const value = record[key];
    if (Array.isArray(value) && value.length > 0) return value;
  }
  return undefined;
}

function looksLikeWorkout(value: unknown): boolean {
  if (!isRecord(value)) return false;
  return Object.values(WORKOUT_FIELDS).some((keys) => keys.some((key) => key in value));
}

/** Locate the workout list whatever the payload's top-level shape. */
export function unwrapWorkoutPayload(payload: unknown): unknown[] {
  if (Array.isArray(payload)) return payload;
  if (!isRecord(payload)) return [];

  for (const key of PAYLOAD_KEYS) {
    const value = payload[key];
    if (Array.isArray(value)) {
      if (value.length > 0) return value;
      continue;
    }
    if (looksLikeWorkout(value)) return [value];
  }
  return [];
}

const TIMESTAMP_PATTERN = /^(\d{4}-\d{2}-\d{2})(?:[T ](\d{2}:\d{2}:\d{2})(\.\d+)?)?/;

/** Calendar date of a timestamp as written, ignoring any offset. */
export function extractDate(timestamp: string, fallbackDate: string): string {
  const match = TIMESTAMP_PATTERN.exec(timestamp);
  if (!match?.[1]) return fallbackDate;
  return isValid(parseISO(match[1])) ? match[1] : fallbackDate;
}

function parseWallClock(timestamp: string): Date | null {
  const match = TIMESTAMP_PATTERN.exec(timestamp);
  if (!match?.[1] || !match[2]) return null;
  const parsed = parseISO(`${match[1]}T${match[2]}${match[3] ?? ""}Z`);
  return isValid(parsed) ? parsed : null;
}

/** Whole minutes between two timestamps, floored at 0. */
export function calculateDuration(start: string, end: string): number {
  if (!start || !end) return 0;
  const startAt = parseWallClock(start);
  const endAt = parseWallClock(end);
  if (!startAt || !endAt) return 0;
  return Math.max(0, differenceInMinutes(endAt, startAt));
}

function parseSet(raw: RawRecord): WorkoutSet {
  const reps = Math.trunc(firstNumber(raw, SET_FIELDS.reps) ?? 0);
  let weight = firstNumber(raw, SET_FIELDS.weight) ?? 0;
  if (raw["weight_unit"] === "lbs" || raw["unit"] === "lb") {
    weight *= LB_TO_KG;
  }
  const type = firstString(raw, SET_FIELDS.type) ?? "working";
  return { reps, weightKg: weight, type };
}

/**
 * Resolve an exercise's muscle group: template lookup, then the exercise's
 * own field, then a keyword match on its name.
 */
export function resolveMuscleGroup(
  raw: RawRecord,
  name: string,
  templateMap?: ExerciseTemplateMap,
): string {
  const templateId = raw["exercise_template_id"];
  let group = "";
  if (templateMap && typeof templateId === "string") {
    group = templateMap[templateId]?.primary_muscle_group ?? "";
  }
  if (!group) {
    group = firstString(raw, EXERCISE_FIELDS.muscleGroup) ?? "";
  }
  if (!group || group.toLowerCase() === FALLBACK_MUSCLE_GROUP) {
    group = inferMuscleGroup(name);
  }
  return group.toLowerCase();
}

export function parseExercise(raw: RawRecord, templateMap?: ExerciseTemplateMap): ExerciseRecord {
  const name = firstString(raw, EXERCISE_FIELDS.name) ?? "Unknown";
  const sets: WorkoutSet[] = [];
  let volume = 0;
  let maxWeight = 0;
  let totalReps = 0;

  for (const entry of firstList(raw, EXERCISE_FIELDS.sets) ?? []) {
    if (!isRecord(entry)) continue;
    const set = parseSet(entry);
    sets.push({ ...set, weightKg: round1(set.weightKg) });

    if (VOLUME_SET_TYPES.has(set.type.toLowerCase())) {
      volume += set.reps * set.weightKg;
      totalReps += set.reps;
    }
    maxWeight = Math.max(maxWeight, set.weightKg);
  }

  return {
    name,
    muscleGroup: resolveMuscleGroup(raw, name, templateMap),
    sets,
    volumeKg: round1(volume),
    maxWeightKg: round1(maxWeight),
    totalReps,
    setCount: sets.length,
  };
}

export function parseWorkout(raw: RawRecord, options: ExtractWorkoutOptions): WorkoutRecord {
  const startTime = firstString(raw, WORKOUT_FIELDS.start) ?? "";
  const endTime = firstString(raw, WORKOUT_FIELDS.end) ?? "";

  const exercises: ExerciseRecord[] = [];
  for (const entry of firstList(raw, WORKOUT_FIELDS.exercises) ?? []) {
    if (isRecord(entry)) exercises.push(parseExercise(entry, options.templateMap));
  }

  const muscleGroups: string[] = [];
  for (const exercise of exercises) {
    if (exercise.muscleGroup && !muscleGroups.includes(exercise.muscleGroup)) {
      muscleGroups.push(exercise.muscleGroup);
    }
  }

  return {
    id: firstString(raw, WORKOUT_FIELDS.id) ?? "",
    name: firstString(raw, WORKOUT_FIELDS.name) ?? "Workout",
    date: extractDate(startTime, options.fallbackDate),
    startTime,
    endTime,
    durationMinutes: calculateDuration(startTime, endTime),
    exercises,
    totalVolumeKg: exercises.reduce((s, e) => s + e.volumeKg, 0),
    totalSets: exercises.reduce((s, e) => s + e.setCount, 0),
    totalReps: exercises.reduce((s, e) => s + e.totalReps, 0),
    muscleGroups,
    exerciseCount: exercises.length,
  };
}

/**
 * Normalize a workout tracker response into workout records, newest first.
 * Unrecognizable payloads and entries yield an empty list, never an error.
 */
export function extractWorkoutMetrics(payload: unknown, options: ExtractWorkoutOptions): WorkoutRecord[] {
  const workouts: WorkoutRecord[] = [];
  for (const entry of unwrapWorkoutPayload(payload)) {
    if (isRecord(entry)) workouts.push(parseWorkout(entry, options));
  }
  return workouts.sort((a, b) => (a.startTime < b.startTime ? 1 : a.startTime > b.startTime ? -1 : 0));
}
