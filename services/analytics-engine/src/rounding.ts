/**
 * Rounding helpers for dashboard figures.
 *
 * Totals and averages shown on the dashboard mix three conventions:
 * truncation for whole-unit averages, half-up rounding to a fixed number of
 * decimals for distances and scores, and half-to-even rounding for the
 * composite health score and workout duration averages.
 */

/** Round half away from zero to `digits` decimals. */
export function roundTo(value: number, digits = 0): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

/** Drop the fractional part (whole-unit averages: 96.4 bpm → 96). */
export function truncate(value: number): number {
  return Math.trunc(value);
}

/**
 * Round to the nearest integer, ties to the even neighbour.
 * - 2.5 → 2
 * - 3.5 → 4
 * - 2.6 → 3
 */
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const diff = value - floor;
  if (diff > 0.5) return floor + 1;
  if (diff < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}

/** Clamp into [min, max]. */
export function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}
