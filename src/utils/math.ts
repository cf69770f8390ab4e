/**
 * @fileoverview Math utilities for score computation
 */

/**
 * Clamp a value to a range [min, max].
 */
export function clamp(value: number, min: number, max: number): number {
  if (value < min) return min;
  if (value > max) return max;
  return value;
}

/**
 * Clamp a value to [0, 1]. NaN collapses to 0 so a broken input can never
 * read as confidence.
 */
export function clamp01(value: number): number {
  if (Number.isNaN(value)) return 0;
  return clamp(value, 0, 1);
}

/**
 * Round to a fixed number of decimals. Scores are rounded before they are
 * compared so that float noise from summation order cannot decide a tie.
 */
export function roundTo(value: number, decimals = 6): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  let total = 0;
  for (const value of values) total += value;
  return total / values.length;
}
