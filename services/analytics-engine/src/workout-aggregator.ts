/**
 * Workout Aggregator
 *
 * Per-day totals, per-exercise records, muscle-group distribution and
 * weekly summaries over parsed strength-training sessions, plus the
 * workout dashboard artifacts built from them.
 * `today` is always passed in.
 */

import type {
  ExercisePrsArtifact,
  Insight,
  MuscleGroupsArtifact,
  WorkoutRecord,
  WorkoutSummaryArtifact,
  WorkoutTrendsArtifact,
} from "@health-analytics/contracts";
import { dayRange, shiftDay, weekStart } from "./dates.js";
import { roundHalfEven, roundTo } from "./rounding.js";
import { sum } from "./statistics.js";
import type {
  ExerciseRecordSummary,
  MuscleGroupStats,
  WeeklyWorkoutSummary,
  WorkoutDayTotals,
} from "./types.js";

function uniqueGroups(workouts: readonly WorkoutRecord[]): string[] {
  const groups = new Set<string>();
  for (const w of workouts) {
    for (const group of w.muscleGroups) groups.add(group);
  }
  return [...groups];
}

/** Workouts on or after `today - days`. */
function since(workouts: readonly WorkoutRecord[], days: number, today: string): WorkoutRecord[] {
  const cutoff = shiftDay(today, -days);
  return workouts.filter((w) => w.date >= cutoff);
}

function titleCase(value: string): string {
  return value.replace(/\w\S*/g, (word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase());
}

const formatKg = (value: number): string =>
  value.toLocaleString("en-US", { maximumFractionDigits: 0 });

/** Totals for one date, or null when nothing was logged that day. */
export function calculateWorkoutTotals(
  workouts: readonly WorkoutRecord[],
  date: string,
): WorkoutDayTotals | null {
  const day = workouts.filter((w) => w.date === date);
  if (day.length === 0) return null;

  return {
    workoutCount: day.length,
    totalVolumeKg: roundTo(sum(day.map((w) => w.totalVolumeKg)), 1),
    totalSets: sum(day.map((w) => w.totalSets)),
    totalReps: sum(day.map((w) => w.totalReps)),
    durationMinutes: sum(day.map((w) => w.durationMinutes)),
    exerciseCount: sum(day.map((w) => w.exerciseCount)),
    muscleGroups: uniqueGroups(day),
  };
}

/**
 * Best weight and best single-session volume per exercise name. Ties keep
 * the first session seen.
 */
export function getWorkoutRecords(workouts: readonly WorkoutRecord[]): Map<string, ExerciseRecordSummary> {
  const records = new Map<string, ExerciseRecordSummary>();

  for (const workout of workouts) {
    for (const exercise of workout.exercises) {
      const record = records.get(exercise.name) ?? {
        maxWeightKg: 0,
        maxWeightDate: null,
        maxVolumeKg: 0,
        maxVolumeDate: null,
        totalSessions: 0,
      };
      record.totalSessions += 1;

      if (exercise.maxWeightKg > record.maxWeightKg) {
        record.maxWeightKg = exercise.maxWeightKg;
        record.maxWeightDate = workout.date;
      }
      if (exercise.volumeKg > record.maxVolumeKg) {
        record.maxVolumeKg = exercise.volumeKg;
        record.maxVolumeDate = workout.date;
      }
      records.set(exercise.name, record);
    }
  }

  return records;
}

export function getMuscleGroupStats(
  workouts: readonly WorkoutRecord[],
  days: number,
  today: string,
): MuscleGroupStats {
  const recent = since(workouts, days, today);
  const volume: Record<string, number> = {};
  const frequency: Record<string, number> = {};
  const sets: Record<string, number> = {};

  for (const workout of recent) {
    for (const exercise of workout.exercises) {
      const group = exercise.muscleGroup;
      volume[group] = (volume[group] ?? 0) + exercise.volumeKg;
      frequency[group] = (frequency[group] ?? 0) + 1;
      sets[group] = (sets[group] ?? 0) + exercise.setCount;
    }
  }

  const volumeByGroup: Record<string, number> = {};
  for (const [group, kg] of Object.entries(volume)) volumeByGroup[group] = roundTo(kg, 1);

  const total = sum(Object.values(volumeByGroup));
  const volumePercentages: Record<string, number> = {};
  if (total > 0) {
    for (const [group, kg] of Object.entries(volumeByGroup)) {
      volumePercentages[group] = roundTo((kg / total) * 100, 1);
    }
  }

  return {
    periodDays: days,
    workoutCount: recent.length,
    volumeByGroup,
    volumePercentages,
    frequencyByGroup: frequency,
    setsByGroup: sets,
  };
}

/**
 * Monday-to-Sunday buckets, newest first, starting with the week that
 * contains `today`.
 */
export function getWeeklyWorkoutSummary(
  workouts: readonly WorkoutRecord[],
  weeks: number,
  today: string,
): WeeklyWorkoutSummary[] {
  const currentMonday = weekStart(today);
  const summaries: WeeklyWorkoutSummary[] = [];

  for (let offset = 0; offset < weeks; offset++) {
    const start = shiftDay(currentMonday, -7 * offset);
    const end = shiftDay(start, 6);
    const inWeek = workouts.filter((w) => w.date >= start && w.date <= end);
    const duration = sum(inWeek.map((w) => w.durationMinutes));

    summaries.push({
      weekStart: start,
      weekEnd: end,
      workoutCount: inWeek.length,
      totalVolumeKg: roundTo(sum(inWeek.map((w) => w.totalVolumeKg)), 1),
      totalSets: sum(inWeek.map((w) => w.totalSets)),
      avgDuration: inWeek.length > 0 ? roundHalfEven(duration / inWeek.length) : 0,
      muscleGroups: uniqueGroups(inWeek),
    });
  }

  return summaries;
}

// ── Artifacts ────────────────────────────────────────────────────────

/** Daily arrays over the `days` days ending `today`, zero-filled. */
export function generateWorkoutTrends(
  workouts: readonly WorkoutRecord[],
  days: number,
  today: string,
): WorkoutTrendsArtifact {
  const trends: WorkoutTrendsArtifact = {
    dates: [],
    workout_count: [],
    volume_kg: [],
    duration_minutes: [],
    sets: [],
    exercises: [],
  };

  for (const date of dayRange(shiftDay(today, -(days - 1)), today)) {
    const totals = calculateWorkoutTotals(workouts, date);
    trends.dates.push(date);
    trends.workout_count.push(totals?.workoutCount ?? 0);
    trends.volume_kg.push(totals?.totalVolumeKg ?? 0);
    trends.duration_minutes.push(totals?.durationMinutes ?? 0);
    trends.sets.push(totals?.totalSets ?? 0);
    trends.exercises.push(totals?.exerciseCount ?? 0);
  }

  return trends;
}

export function generateWorkoutSummary(
  workouts: readonly WorkoutRecord[],
  days: number,
  today: string,
): WorkoutSummaryArtifact {
  const recent = since(workouts, days, today);
  if (recent.length === 0) {
    return {
      period_days: days,
      workout_count: 0,
      avg_workouts_per_week: 0,
      total_volume_kg: 0,
      total_sets: 0,
      total_reps: 0,
      total_duration_minutes: 0,
      avg_workout_duration: 0,
      unique_exercises: 0,
      training_days: 0,
    };
  }

  const duration = sum(recent.map((w) => w.durationMinutes));
  const exerciseNames = new Set(recent.flatMap((w) => w.exercises.map((e) => e.name)));

  return {
    period_days: days,
    workout_count: recent.length,
    avg_workouts_per_week: roundTo(recent.length / (days / 7), 1),
    total_volume_kg: roundTo(sum(recent.map((w) => w.totalVolumeKg))),
    total_sets: sum(recent.map((w) => w.totalSets)),
    total_reps: sum(recent.map((w) => w.totalReps)),
    total_duration_minutes: duration,
    avg_workout_duration: roundHalfEven(duration / recent.length),
    unique_exercises: exerciseNames.size,
    training_days: new Set(recent.map((w) => w.date)).size,
  };
}

/** Groups sorted by volume, heaviest first, with title-cased labels. */
export function generateMuscleGroupData(
  workouts: readonly WorkoutRecord[],
  days: number,
  today: string,
): MuscleGroupsArtifact {
  const stats = getMuscleGroupStats(workouts, days, today);
  const groups = Object.entries(stats.volumeByGroup).sort((a, b) => b[1] - a[1]);
  const total = sum(groups.map(([, kg]) => kg));

  return {
    labels: groups.map(([group]) => titleCase(group)),
    volume_kg: groups.map(([, kg]) => kg),
    percentages: groups.map(([, kg]) => (total > 0 ? roundTo((kg / total) * 100, 1) : 0)),
    sets: groups.map(([group]) => stats.setsByGroup[group] ?? 0),
    frequency: groups.map(([group]) => stats.frequencyByGroup[group] ?? 0),
    total_volume_kg: roundTo(total),
  };
}

/** Top `limit` exercises by max weight. */
export function generateExercisePrs(
  workouts: readonly WorkoutRecord[],
  limit: number,
  generatedAt: string,
): ExercisePrsArtifact {
  const ranked = [...getWorkoutRecords(workouts).entries()]
    .sort((a, b) => b[1].maxWeightKg - a[1].maxWeightKg)
    .slice(0, limit);

  return {
    exercises: ranked.map(([name, record]) => ({
      name,
      max_weight_kg: record.maxWeightKg,
      max_weight_date: record.maxWeightDate,
      max_volume_kg: record.maxVolumeKg,
      max_volume_date: record.maxVolumeDate,
      total_sessions: record.totalSessions,
    })),
    generated_at: generatedAt,
  };
}

const MAX_WORKOUT_INSIGHTS = 4;

/** Training insight cards, at most four, with a fallback when none apply. */
export function generateWorkoutInsights(
  workouts: readonly WorkoutRecord[],
  summary: WorkoutSummaryArtifact,
  muscles: MuscleGroupsArtifact,
  today: string,
): Insight[] {
  if (workouts.length === 0) {
    return [{
      type: "neutral",
      icon: "📊",
      title: "Start Tracking",
      text: "Sync your workouts to see training insights.",
    }];
  }

  const insights: Insight[] = [];

  const perWeek = summary.avg_workouts_per_week;
  if (perWeek >= 4) {
    insights.push({
      type: "positive",
      icon: "💪",
      title: "Consistent Training",
      text: `Averaging ${perWeek} workouts/week. Great consistency!`,
    });
  } else if (perWeek >= 2) {
    insights.push({
      type: "neutral",
      icon: "📈",
      title: "Good Progress",
      text: `Training ${perWeek}x per week. Try adding one more session.`,
    });
  } else if (perWeek > 0) {
    insights.push({
      type: "warning",
      icon: "📉",
      title: "Training Opportunity",
      text: "Consider increasing workout frequency for better results.",
    });
  }

  const volume = summary.total_volume_kg;
  if (volume > 20000) {
    insights.push({
      type: "positive",
      icon: "🏋️",
      title: "High Volume Week",
      text: `Moved ${formatKg(volume)} kg this week. Impressive work!`,
    });
  } else if (volume > 10000) {
    insights.push({
      type: "positive",
      icon: "🔥",
      title: "Solid Training",
      text: `Total volume of ${formatKg(volume)} kg. Keep pushing!`,
    });
  }

  if (muscles.percentages.length > 0) {
    const maxPct = Math.max(...muscles.percentages);
    const dominant = muscles.labels[muscles.percentages.indexOf(maxPct)];
    if (maxPct > 40 && dominant) {
      insights.push({
        type: "warning",
        icon: "⚖️",
        title: "Training Focus",
        text: `${dominant} dominates at ${maxPct}% of volume. Consider balance.`,
      });
    }
  }

  const duration = summary.avg_workout_duration;
  if (duration > 90) {
    insights.push({
      type: "neutral",
      icon: "⏱️",
      title: "Marathon Sessions",
      text: `Avg workout is ${duration} min. Shorter, focused sessions can be effective too.`,
    });
  } else if (duration >= 45 && duration <= 75) {
    insights.push({
      type: "positive",
      icon: "✅",
      title: "Optimal Duration",
      text: `Your ${duration}-min workouts hit the sweet spot for gains.`,
    });
  }

  const weekAgo = shiftDay(today, -7);
  let best: { name: string; weight: number } | null = null;
  for (const [name, record] of getWorkoutRecords(workouts)) {
    if (record.maxWeightDate === null || record.maxWeightDate < weekAgo) continue;
    if (!best || record.maxWeightKg > best.weight) best = { name, weight: record.maxWeightKg };
  }
  if (best) {
    insights.push({
      type: "positive",
      icon: "🏆",
      title: "New Personal Record!",
      text: `Hit ${best.weight}kg on ${best.name} this week!`,
    });
  }

  if (insights.length === 0) {
    insights.push({
      type: "neutral",
      icon: "💪",
      title: "Keep Training",
      text: "Continue logging workouts for personalized insights.",
    });
  }

  return insights.slice(0, MAX_WORKOUT_INSIGHTS);
}
