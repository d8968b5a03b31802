/**
 * Descriptive statistics over plain number arrays.
 * Empty input yields 0 for sums and means, null where no value exists.
 */

export function sum(values: readonly number[]): number {
  return values.reduce((s, v) => s + v, 0);
}

export function mean(values: readonly number[]): number {
  return values.length > 0 ? sum(values) / values.length : 0;
}

export function median(values: readonly number[]): number | null {
  if (values.length === 0) return null;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  const upper = sorted[mid] ?? 0;
  if (sorted.length % 2 === 1) return upper;
  const lower = sorted[mid - 1] ?? 0;
  return (lower + upper) / 2;
}

/** Sample standard deviation (n − 1 denominator). Needs at least 2 values. */
export function sampleStdev(values: readonly number[]): number | null {
  if (values.length < 2) return null;
  const avg = mean(values);
  const squares = values.reduce((s, v) => s + (v - avg) ** 2, 0);
  return Math.sqrt(squares / (values.length - 1));
}

export function minOf(values: readonly number[]): number | null {
  return values.length > 0 ? Math.min(...values) : null;
}

export function maxOf(values: readonly number[]): number | null {
  return values.length > 0 ? Math.max(...values) : null;
}
