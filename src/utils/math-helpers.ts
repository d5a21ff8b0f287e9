/**
 * Math Helper Utilities
 *
 * Safe aggregation helpers for metric reduction. Guard against division
 * by zero on empty inputs and keep rounding in one place.
 */

/**
 * Calculate safe average of an array of numbers
 *
 * @example
 * ```typescript
 * safeAverage([1, 2, 3])        // => 2
 * safeAverage([])               // => 0
 * safeAverage([], 100)          // => 100
 * ```
 */
export function safeAverage(values: readonly number[], defaultValue = 0): number {
  if (values.length === 0) {
    return defaultValue;
  }

  return safeSum(values) / values.length;
}

/**
 * Calculate safe division that guards against division by zero
 *
 * @example
 * ```typescript
 * safeDivide(10, 2)        // => 5
 * safeDivide(10, 0)        // => 0
 * safeDivide(10, 0, 100)   // => 100
 * ```
 */
export function safeDivide(numerator: number, denominator: number, defaultValue = 0): number {
  if (denominator === 0) {
    return defaultValue;
  }

  return numerator / denominator;
}

/**
 * Sum of values, or defaultValue when empty
 */
export function safeSum(values: readonly number[], defaultValue = 0): number {
  if (values.length === 0) {
    return defaultValue;
  }

  return values.reduce((acc, val) => acc + val, 0);
}

/**
 * Round half away from zero to a fixed number of decimals.
 *
 * Adds a relative epsilon so values like 1.005 round the way they print.
 *
 * @example
 * ```typescript
 * roundTo(6.3333, 2)   // => 6.33
 * roundTo(0.125, 2)    // => 0.13
 * ```
 */
export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  const sign = value < 0 ? -1 : 1;
  return (sign * Math.round(Math.abs(value) * factor * (1 + Number.EPSILON))) / factor;
}
