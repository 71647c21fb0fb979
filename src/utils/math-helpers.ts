/**
 * Math Helper Utilities
 *
 * Safe numeric operations shared by the samplers, the observation builder
 * and the rollout statistics.
 */

/**
 * Clamp a value into [min, max]
 *
 * NaN is returned unchanged so callers can still detect it.
 *
 * @example
 * ```typescript
 * clamp(1.2, 0, 1)   // => 1
 * clamp(-0.1, 0, 1)  // => 0
 * clamp(0.4, 0, 1)   // => 0.4
 * ```
 */
export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/**
 * Wrap a value into [0, 1)
 *
 * @example
 * ```typescript
 * wrapUnit(1.25)   // => 0.25
 * wrapUnit(-0.25)  // => 0.75
 * ```
 */
export function wrapUnit(value: number): number {
  const wrapped = value - Math.floor(value);
  // Rounding can land exactly on 1 for tiny negative inputs
  return wrapped >= 1 ? 0 : wrapped;
}

/**
 * Mean of `values`, or `defaultValue` when there are none
 */
export function safeAverage(values: readonly number[], defaultValue = 0): number {
  if (values.length === 0) {
    return defaultValue;
  }

  return safeSum(values) / values.length;
}

/**
 * `numerator / denominator`, or `defaultValue` for a zero denominator
 *
 * @example
 * ```typescript
 * safeDivide(3, 4)      // => 0.75
 * safeDivide(3, 0, 1)   // => 1
 * ```
 */
export function safeDivide(numerator: number, denominator: number, defaultValue = 0): number {
  if (denominator === 0) {
    return defaultValue;
  }

  return numerator / denominator;
}

/**
 * Sum of `values`, or `defaultValue` when there are none
 */
export function safeSum(values: readonly number[], defaultValue = 0): number {
  if (values.length === 0) {
    return defaultValue;
  }

  return values.reduce((acc, val) => acc + val, 0);
}

/**
 * Population variance (0 for fewer than two values)
 */
export function populationVariance(values: readonly number[]): number {
  if (values.length < 2) {
    return 0;
  }

  const mean = safeAverage(values);
  return values.reduce((acc, val) => acc + (val - mean) ** 2, 0) / values.length;
}

/**
 * Population standard deviation (0 for fewer than two values)
 *
 * @example
 * ```typescript
 * standardDeviation([2, 4, 4, 4, 5, 5, 7, 9])  // => 2
 * ```
 */
export function standardDeviation(values: readonly number[]): number {
  return Math.sqrt(populationVariance(values));
}
