/**
 * Correlation & Anomaly Engine
 *
 * Lag-1 bucketed comparisons between adjacent records and outlier days
 * against a mean ± 1.5 sample standard deviations band.
 * Not statistically rigorous; both outputs are heuristics for insight cards.
 * Pure math, no I/O.
 */

import type { AnomaliesArtifact, CorrelationsArtifact } from "@health-analytics/contracts";
import { mean, median, sampleStdev } from "./statistics.js";
import type { DailyStats, DailyStatsKey } from "./types.js";

/** A correlation or anomaly series needs strictly more observations than this. */
export const MIN_OBSERVATIONS = 10;
export const ANOMALY_SD_THRESHOLD = 1.5;
export const MAX_FLAGGED_DAYS = 10;

type Pair = [today: number, tomorrow: number];

function byDate(days: readonly DailyStats[]): DailyStats[] {
  return [...days].sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
}

/**
 * (today's value, next record's value) for adjacent records where today's
 * value is positive and tomorrow has a reading.
 */
export function lagPairs(days: readonly DailyStats[], today: DailyStatsKey, tomorrow: DailyStatsKey): Pair[] {
  const sorted = byDate(days);
  const pairs: Pair[] = [];
  for (let i = 0; i < sorted.length - 1; i++) {
    const x = sorted[i]?.[today] ?? 0;
    const y = sorted[i + 1]?.[tomorrow];
    if (x > 0 && y !== undefined) pairs.push([x, y]);
  }
  return pairs;
}

/** Split a sorted sample into bottom, middle and top thirds. */
export function terciles<T>(sorted: readonly T[]): [T[], T[], T[]] {
  const n = sorted.length;
  const a = Math.floor(n / 3);
  const b = Math.floor((2 * n) / 3);
  return [sorted.slice(0, a), sorted.slice(a, b), sorted.slice(b)];
}

const meanOrZero = (values: number[]): number => (values.length > 0 ? mean(values) : 0);

export function findCorrelations(days: readonly DailyStats[]): CorrelationsArtifact {
  const correlations: CorrelationsArtifact = {};

  // Exercise today → resting HR tomorrow, median split
  const exercisePairs = lagPairs(days, "exerciseMin", "restingHr");
  if (exercisePairs.length > MIN_OBSERVATIONS) {
    const threshold = median(exercisePairs.map(([x]) => x)) ?? 0;
    const high = exercisePairs.filter(([x]) => x > threshold).map(([, y]) => y);
    const low = exercisePairs.filter(([x]) => x <= threshold).map(([, y]) => y);

    if (high.length > 0 && low.length > 0) {
      correlations.exercise_to_rhr = {
        high_exercise_threshold: threshold,
        high_exercise_next_rhr: mean(high),
        low_exercise_next_rhr: mean(low),
        difference: mean(low) - mean(high),
      };
    }
  }

  // Steps today → HRV tomorrow, tercile split
  const stepPairs = lagPairs(days, "steps", "hrvAvg");
  if (stepPairs.length > MIN_OBSERVATIONS) {
    const sorted = [...stepPairs].sort((a, b) => a[0] - b[0]);
    const [low, medium, high] = terciles(sorted);
    correlations.steps_to_hrv = {
      low_steps_hrv: meanOrZero(low.map(([, y]) => y)),
      medium_steps_hrv: meanOrZero(medium.map(([, y]) => y)),
      high_steps_hrv: meanOrZero(high.map(([, y]) => y)),
    };
  }

  return correlations;
}

type Flagged = [date: string, value: number];

function series(days: readonly DailyStats[], field: DailyStatsKey): Flagged[] {
  return byDate(days).flatMap((d): Flagged[] => {
    const value = d[field];
    return value === undefined ? [] : [[d.date, value]];
  });
}

/**
 * Low-HRV days (possible stress or illness), most severe first, and
 * high-intensity days by max heart rate, highest first. At most ten each.
 */
export function detectAnomalies(days: readonly DailyStats[]): AnomaliesArtifact {
  const anomalies: AnomaliesArtifact = {};

  const hrv = series(days, "hrvAvg");
  if (hrv.length > MIN_OBSERVATIONS) {
    const values = hrv.map(([, v]) => v);
    const avg = mean(values);
    const sd = sampleStdev(values) ?? 0;
    const low = hrv.filter(([, v]) => v < avg - ANOMALY_SD_THRESHOLD * sd);
    if (low.length > 0) {
      anomalies.low_hrv_days = low.sort((a, b) => a[1] - b[1]).slice(0, MAX_FLAGGED_DAYS);
      anomalies.hrv_avg = avg;
    }
  }

  const hrMax = series(days, "hrMax");
  if (hrMax.length > MIN_OBSERVATIONS) {
    const values = hrMax.map(([, v]) => v);
    const avg = mean(values);
    const sd = sampleStdev(values) ?? 0;
    const high = hrMax.filter(([, v]) => v > avg + ANOMALY_SD_THRESHOLD * sd);
    if (high.length > 0) {
      anomalies.high_intensity_days = high.sort((a, b) => b[1] - a[1]).slice(0, MAX_FLAGGED_DAYS);
    }
  }

  return anomalies;
}
