/**
 * Rollout statistics
 *
 * Summaries of per-episode metrics and a standardized difference between
 * two strategies' returns. Variance is the population variance.
 */

import { RouterEnvError } from '../api/errors.js';
import { populationVariance, safeAverage, safeDivide, standardDeviation } from '../utils/math-helpers.js';

/**
 * Sample statistics
 */
export interface SampleStatistics {
  n: number;
  mean: number;
  variance: number;
  stdDev: number;
  min: number;
  max: number;
  median: number;
}

/**
 * Effect size calculation (Cohen's d)
 */
export interface EffectSize {
  cohensD: number;
  interpretation: 'negligible' | 'small' | 'medium' | 'large';
}

/**
 * Calculate sample statistics from array of values
 *
 * @throws {RouterEnvError} InvalidArgument for an empty array
 */
export function calculateSampleStatistics(values: readonly number[]): SampleStatistics {
  if (values.length === 0) {
    throw new RouterEnvError('InvalidArgument', 'Cannot calculate statistics for empty array');
  }

  const sorted = [...values].sort((a, b) => a - b);
  const n = sorted.length;

  const mean = safeAverage(sorted);
  const variance = populationVariance(sorted);

  return {
    n,
    mean,
    variance,
    stdDev: standardDeviation(sorted),
    min: sorted[0],
    max: sorted[n - 1],
    median: percentile(sorted, 50),
  };
}

/**
 * Linear-interpolated percentile of a sorted array
 */
export function percentile(sortedValues: readonly number[], p: number): number {
  if (p < 0 || p > 100) {
    throw new RouterEnvError('InvalidArgument', 'Percentile must be between 0 and 100', { p });
  }

  const index = (p / 100) * (sortedValues.length - 1);
  const lower = Math.floor(index);
  const upper = Math.ceil(index);
  const weight = index - lower;

  if (lower === upper) {
    return sortedValues[lower];
  }
  return sortedValues[lower] * (1 - weight) + sortedValues[upper] * weight;
}

/**
 * Cohen's d of `variant` against `baseline`
 *
 * - |d| < 0.2: negligible
 * - 0.2 ≤ |d| < 0.5: small
 * - 0.5 ≤ |d| < 0.8: medium
 * - |d| ≥ 0.8: large
 *
 * Identical constant samples give d = 0.
 */
export function calculateEffectSize(
  baseline: readonly number[],
  variant: readonly number[]
): EffectSize {
  const stats1 = calculateSampleStatistics(baseline);
  const stats2 = calculateSampleStatistics(variant);

  const pooledVariance = safeDivide(
    stats1.n * stats1.variance + stats2.n * stats2.variance,
    stats1.n + stats2.n
  );
  const cohensD = safeDivide(stats2.mean - stats1.mean, Math.sqrt(pooledVariance));
  const magnitude = Math.abs(cohensD);

  let interpretation: EffectSize['interpretation'];
  if (magnitude < 0.2) {
    interpretation = 'negligible';
  } else if (magnitude < 0.5) {
    interpretation = 'small';
  } else if (magnitude < 0.8) {
    interpretation = 'medium';
  } else {
    interpretation = 'large';
  }

  return { cohensD, interpretation };
}
