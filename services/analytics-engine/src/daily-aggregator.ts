/**
 * Daily Aggregator
 *
 * Reduces one day's metric readings to totals, point readings and heart-rate
 * statistics. Two pipelines share the extraction layer:
 * - dashboard (`aggregateDay`): rounded totals, last resting HR reading
 * - deep analysis (`computeDailyStats`): unrounded values, first resting HR
 * Operates on already-parsed metric maps; no I/O.
 */

import { METRIC, type MetricMap } from "@health-analytics/contracts";
import {
  hasQuantity,
  metricReadings,
  metricValues,
  readingQuantity,
} from "@health-analytics/importers";
import { roundTo, truncate } from "./rounding.js";
import { maxOf, mean, minOf, sum } from "./statistics.js";
import type {
  DailyAggregate,
  DailyReadings,
  DailyStats,
  DailyStatsKey,
  DailyTotals,
  HeartRateStats,
  RestingHrPolicy,
} from "./types.js";

/** An hourly stand bucket counts once its reading reaches this value. */
export const STAND_HOUR_THRESHOLD = 1;

function quantities(metrics: MetricMap, name: string): number[] | null {
  if (!(name in metrics)) return null;
  return metricReadings(metrics, name).map(readingQuantity);
}

function pickReading(values: number[], policy: RestingHrPolicy): number | undefined {
  return policy === "first" ? values[0] : values[values.length - 1];
}

export function countStandHours(values: readonly number[]): number {
  return values.filter((v) => v >= STAND_HOUR_THRESHOLD).length;
}

/**
 * Summed daily totals. Counts (steps, energy, minutes, flights) are rounded to
 * whole units, distance to 2 decimals. Stand hours count qualifying buckets.
 */
export function calculateTotals(metrics: MetricMap): DailyTotals {
  const totals: DailyTotals = {};

  const rounded = (name: string): number | undefined => {
    const values = quantities(metrics, name);
    return values ? Math.round(sum(values)) : undefined;
  };

  const steps = rounded(METRIC.STEPS);
  if (steps !== undefined) totals.steps = steps;

  const energy = rounded(METRIC.ACTIVE_ENERGY);
  if (energy !== undefined) totals.activeEnergyKcal = energy;

  const exercise = rounded(METRIC.EXERCISE_TIME);
  if (exercise !== undefined) totals.exerciseMinutes = exercise;

  const stand = quantities(metrics, METRIC.STAND_HOUR);
  if (stand) totals.standHours = countStandHours(stand);

  const distance = quantities(metrics, METRIC.DISTANCE);
  if (distance) totals.distanceKm = roundTo(sum(distance), 2);

  const flights = rounded(METRIC.FLIGHTS);
  if (flights !== undefined) totals.flights = flights;

  const daylight = rounded(METRIC.DAYLIGHT);
  if (daylight !== undefined) totals.daylightMinutes = daylight;

  return totals;
}

/** Point readings: resting HR per policy, latest VO2max and walking HR, mean HRV and SpO2. */
export function getKeyReadings(metrics: MetricMap, policy: RestingHrPolicy = "last"): DailyReadings {
  const readings: DailyReadings = {};

  const rhr = pickReading(quantities(metrics, METRIC.RESTING_HR) ?? [], policy);
  if (rhr !== undefined) readings.restingHr = truncate(rhr);

  const vo2 = quantities(metrics, METRIC.VO2_MAX) ?? [];
  const latestVo2 = vo2[vo2.length - 1];
  if (latestVo2 !== undefined) readings.vo2Max = roundTo(latestVo2, 1);

  const hrv = quantities(metrics, METRIC.HRV) ?? [];
  if (hrv.length > 0) readings.hrvAvg = truncate(mean(hrv));

  const walking = quantities(metrics, METRIC.WALKING_HR) ?? [];
  const latestWalking = walking[walking.length - 1];
  if (latestWalking !== undefined) readings.walkingHr = truncate(latestWalking);

  const spo2 = quantities(metrics, METRIC.BLOOD_OXYGEN) ?? [];
  if (spo2.length > 0) readings.bloodOxygen = truncate(mean(spo2));

  return readings;
}

/**
 * Heart rate throughout the day, over readings that carry a quantity.
 * Returns null when no reading does.
 */
export function getHeartRateStats(metrics: MetricMap): HeartRateStats | null {
  const values = metricReadings(metrics, METRIC.HEART_RATE)
    .filter(hasQuantity)
    .map(readingQuantity);
  const min = minOf(values);
  const max = maxOf(values);
  if (min === null || max === null) return null;

  return {
    count: values.length,
    min: truncate(min),
    max: truncate(max),
    avg: truncate(mean(values)),
  };
}

export function aggregateDay(
  date: string,
  metrics: MetricMap,
  policy: RestingHrPolicy = "last",
): DailyAggregate {
  return {
    date,
    totals: calculateTotals(metrics),
    readings: getKeyReadings(metrics, policy),
    hrStats: getHeartRateStats(metrics),
  };
}

/** Dashboard pipeline over many days, oldest first. */
export function aggregateDays(
  byDate: Record<string, MetricMap>,
  policy: RestingHrPolicy = "last",
): DailyAggregate[] {
  return Object.keys(byDate)
    .sort()
    .flatMap((date) => {
      const metrics = byDate[date];
      return metrics ? [aggregateDay(date, metrics, policy)] : [];
    });
}

type Reducer = (values: number[]) => number;

const latest: Reducer = (values) => values[values.length - 1] ?? 0;
const lowest: Reducer = (values) => minOf(values) ?? 0;
const highest: Reducer = (values) => maxOf(values) ?? 0;

/** Deep-analysis reductions: target field, source metric, reducer. */
const DEEP_REDUCTIONS: ReadonlyArray<[DailyStatsKey, string, Reducer]> = [
  ["steps", METRIC.STEPS, sum],
  ["distanceKm", METRIC.DISTANCE, sum],
  ["flights", METRIC.FLIGHTS, sum],
  ["exerciseMin", METRIC.EXERCISE_TIME, sum],
  ["activeCal", METRIC.ACTIVE_ENERGY, sum],
  ["standHours", METRIC.STAND_HOUR, countStandHours],
  ["daylightMin", METRIC.DAYLIGHT, sum],
  ["swimDistance", METRIC.SWIM_DISTANCE, sum],
  ["swimStrokes", METRIC.SWIM_STROKES, sum],
  ["hrAvg", METRIC.HEART_RATE, mean],
  ["hrMin", METRIC.HEART_RATE, lowest],
  ["hrMax", METRIC.HEART_RATE, highest],
  ["hrvAvg", METRIC.HRV, mean],
  ["vo2Max", METRIC.VO2_MAX, latest],
  ["walkSpeed", METRIC.WALKING_SPEED, mean],
  ["stepLength", METRIC.STEP_LENGTH, mean],
  ["walkAsymmetry", METRIC.WALKING_ASYMMETRY, mean],
  ["spo2Avg", METRIC.BLOOD_OXYGEN, mean],
  ["spo2Min", METRIC.BLOOD_OXYGEN, lowest],
  ["respRate", METRIC.RESPIRATORY_RATE, mean],
];

/**
 * Flat, unrounded per-day statistics over non-zero readings. Heart rate
 * prefers each sample's `Avg` field. A metric with no non-zero reading is
 * omitted.
 */
export function computeDailyStats(
  date: string,
  metrics: MetricMap,
  policy: RestingHrPolicy = "first",
): DailyStats {
  const stats: DailyStats = { date };

  for (const [key, metric, reduce] of DEEP_REDUCTIONS) {
    const values = metricValues(metrics, metric);
    if (values.length > 0) stats[key] = reduce(values);
  }

  const rhr = pickReading(metricValues(metrics, METRIC.RESTING_HR), policy);
  if (rhr !== undefined) stats.restingHr = rhr;

  return stats;
}

/** True when at least one metric survived beside the date. */
export function hasDailyMetrics(stats: DailyStats): boolean {
  return Object.keys(stats).some((key) => key !== "date");
}

/**
 * Deep-analysis pipeline over many days, oldest first. Days whose readings
 * were all zero or missing are dropped.
 */
export function computeAllDailyStats(
  byDate: Record<string, MetricMap>,
  policy: RestingHrPolicy = "first",
): DailyStats[] {
  return Object.keys(byDate)
    .sort()
    .flatMap((date) => {
      const metrics = byDate[date];
      if (!metrics) return [];
      const stats = computeDailyStats(date, metrics, policy);
      return hasDailyMetrics(stats) ? [stats] : [];
    });
}
