/**
 * Health Score
 *
 * Weighted composite out of 100 from a window's averaged metrics:
 * - steps 25 (ratio to 10 000, capped at 1.2)
 * - exercise 25 (ratio to 30 min, capped at 1.5)
 * - stand 20 (ratio to 12 h, capped at 1.2)
 * - resting HR 15 (banded, lower is better)
 * - HRV 15 (banded, higher is better)
 *
 * A missing or zero average contributes nothing; the total is never
 * renormalized. Heuristic, not clinically validated.
 */

import {
  GOALS,
  hrZoneLabels,
  type HealthScoreArtifact,
  type HealthScoreLevel,
  type HrDistributionArtifact,
  type SummaryStatsArtifact,
} from "@health-analytics/contracts";
import { clamp, roundHalfEven, roundTo } from "./rounding.js";
import type { DailyAggregate } from "./types.js";

export const SCORE_WEIGHTS = {
  steps: 25,
  exercise: 25,
  stand: 20,
  resting_hr: 15,
  hrv: 15,
} as const;

export type ScoreAverages = Partial<
  Pick<SummaryStatsArtifact["averages"], "steps" | "exercise_minutes" | "stand_hours" | "resting_hr" | "hrv">
>;

type Breakdown = HealthScoreArtifact["breakdown"];

interface ScoreBand {
  min: number;
  level: HealthScoreLevel;
  description: string;
}

const NEEDS_WORK: ScoreBand = {
  min: 0,
  level: "needs_work",
  description: "Room for improvement. Try to be more active.",
};

const LEVELS: readonly ScoreBand[] = [
  { min: 85, level: "excellent", description: "Excellent! You're crushing your health goals." },
  { min: 70, level: "good", description: "Great work! You're on track for good health." },
  { min: 55, level: "moderate", description: "Good progress. A bit more activity will help." },
  NEEDS_WORK,
];

function restingHrFactor(bpm: number): number {
  if (bpm <= 60) return 1;
  if (bpm <= 70) return 0.8;
  if (bpm <= 80) return 0.6;
  return 0.4;
}

function hrvFactor(ms: number): number {
  if (ms >= 50) return 1;
  if (ms >= 40) return 0.9;
  if (ms >= 30) return 0.7;
  return 0.5;
}

export function scoreLevel(score: number): { level: HealthScoreLevel; description: string } {
  const { level, description } = LEVELS.find((b) => score >= b.min) ?? NEEDS_WORK;
  return { level, description };
}

export function calculateHealthScore(averages: ScoreAverages): HealthScoreArtifact {
  const parts: Array<[keyof Breakdown, number]> = [];

  const steps = averages.steps ?? 0;
  if (steps > 0) {
    parts.push(["steps", Math.min(steps / GOALS.steps, 1.2) * SCORE_WEIGHTS.steps]);
  }

  const exercise = averages.exercise_minutes ?? 0;
  if (exercise > 0) {
    parts.push(["exercise", Math.min(exercise / GOALS.exerciseMinutes, 1.5) * SCORE_WEIGHTS.exercise]);
  }

  const stand = averages.stand_hours ?? 0;
  if (stand > 0) {
    parts.push(["stand", Math.min(stand / GOALS.standHours, 1.2) * SCORE_WEIGHTS.stand]);
  }

  const rhr = averages.resting_hr ?? 0;
  if (rhr > 0) {
    parts.push(["resting_hr", SCORE_WEIGHTS.resting_hr * restingHrFactor(rhr)]);
  }

  const hrv = averages.hrv ?? 0;
  if (hrv > 0) {
    parts.push(["hrv", SCORE_WEIGHTS.hrv * hrvFactor(hrv)]);
  }

  const breakdown: Breakdown = {};
  let total = 0;
  for (const [key, points] of parts) {
    breakdown[key] = roundTo(points, 1);
    total += points;
  }

  const score = clamp(roundHalfEven(total), 0, 100);
  return {
    score,
    ...scoreLevel(score),
    breakdown,
    max_score: 100,
  };
}

/**
 * Heart-rate zone tallies over the most recent `window` records.
 *
 * An approximation: each day with heart-rate stats adds points to zones
 * from only its min, average and max. It does not measure time in zone.
 * - resting +1 when min < 60
 * - light +2 when 60 ≤ avg < 100, +1 when avg < 60
 * - moderate +1 when max ≥ 100
 * - vigorous +1 when max ≥ 140
 * - peak +1 when max ≥ 170
 */
export function generateHeartRateDistribution(
  days: readonly DailyAggregate[],
  window = 7,
): HrDistributionArtifact {
  const zones = { resting: 0, light: 0, moderate: 0, vigorous: 0, peak: 0 };
  const recent = [...days]
    .sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0))
    .slice(-window);

  for (const day of recent) {
    const hr = day.hrStats;
    if (!hr || hr.count <= 0 || hr.min <= 0 || hr.max <= 0) continue;

    if (hr.min < 60) zones.resting += 1;

    if (hr.avg >= 60 && hr.avg < 100) zones.light += 2;
    else if (hr.avg < 60) zones.light += 1;

    if (hr.max >= 100) zones.moderate += 1;
    if (hr.max >= 140) zones.vigorous += 1;
    if (hr.max >= 170) zones.peak += 1;
  }

  return {
    labels: [...hrZoneLabels],
    values: hrZoneLabels.map((label) => zones[label]),
  };
}
