import {
  METRIC,
  rawDailyExportSchema,
  rawMetricSchema,
  rawReadingSchema,
  type MetricMap,
  type MetricSeries,
  type RawReading
} from "@health-analytics/contracts";

function toReadings(data: unknown): RawReading[] {
  if (!Array.isArray(data)) return [];
  const readings: RawReading[] = [];
  for (const entry of data) {
    const parsed = rawReadingSchema.safeParse(entry);
    if (parsed.success) readings.push(parsed.data);
  }
  return readings;
}

function toSeries(units: string | undefined, data: unknown): MetricSeries {
  const readings = toReadings(data);
  return { units: units ?? "", count: readings.length, data: readings };
}

/**
 * Flatten one day's export into metric name → readings.
 *
 * Returns null when the export has no `data.metrics` envelope. Both the
 * list-of-named-objects shape and the keyed-object shape are accepted.
 */
export function extractAllMetrics(raw: unknown): MetricMap | null {
  const parsed = rawDailyExportSchema.safeParse(raw);
  if (!parsed.success) return null;

  const { metrics } = parsed.data.data;
  const result: MetricMap = {};

  if (Array.isArray(metrics)) {
    for (const entry of metrics) {
      const metric = rawMetricSchema.safeParse(entry);
      if (!metric.success) continue;
      const name = metric.data.name ?? "unknown";
      result[name] = toSeries(metric.data.units, metric.data.data);
    }
    return result;
  }

  for (const [name, value] of Object.entries(metrics)) {
    if (Array.isArray(value)) {
      result[name] = toSeries(undefined, value);
      continue;
    }
    const metric = rawMetricSchema.safeParse(value);
    if (metric.success) {
      result[name] = toSeries(metric.data.units, metric.data.data);
    }
  }
  return result;
}

/** Coerce a loosely-typed quantity to a float. Non-numeric input is 0. */
export function toQuantity(value: unknown): number {
  if (typeof value === "number") return Number.isFinite(value) ? value : 0;
  if (typeof value === "string" && value.trim() !== "") {
    const n = Number(value);
    return Number.isFinite(n) ? n : 0;
  }
  return 0;
}

export function readingQuantity(reading: RawReading): number {
  return toQuantity(reading["qty"]);
}

/** Heart-rate samples carry an `Avg` field that wins over `qty` when present. */
export function readingHeartRate(reading: RawReading): number {
  if (reading["Avg"] != null) return toQuantity(reading["Avg"]);
  return toQuantity(reading["qty"]);
}

/** True when the reading's `qty` is a finite number or a numeric string. */
export function hasQuantity(reading: RawReading): boolean {
  const qty = reading["qty"];
  if (typeof qty === "number") return Number.isFinite(qty);
  return typeof qty === "string" && qty.trim() !== "" && Number.isFinite(Number(qty));
}

export function metricReadings(metrics: MetricMap, name: string): RawReading[] {
  return metrics[name]?.data ?? [];
}

/**
 * Non-zero values of a metric for the day, in reading order.
 * Heart rate uses `Avg` by default; other metrics use `qty`.
 */
export function metricValues(
  metrics: MetricMap,
  name: string,
  pick: (reading: RawReading) => number = name === METRIC.HEART_RATE ? readingHeartRate : readingQuantity,
): number[] {
  const values: number[] = [];
  for (const reading of metricReadings(metrics, name)) {
    const value = pick(reading);
    if (value) values.push(value);
  }
  return values;
}
