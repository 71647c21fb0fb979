/**
 * Traffic Generator
 *
 * Produces one synthetic request per call, shaped by a time-of-day load
 * curve:
 * - Load factor: deterministic sinusoid peaking at business hours
 *   (0.375 = 9am), trough at 0.875, clipped to [0.1, 1.0]
 * - Complexity: right-skewed Beta, shifted upward under high load
 * - Length: independent Beta, observation only
 * - Quality requirement: rises with complexity and load, plus noise
 *
 * The load factor never touches the random stream, so every `sample` call
 * consumes the same draws regardless of time of day: complexity Beta,
 * length Beta, then one normal for the quality noise.
 */

import { DEFAULT_TRAFFIC_PARAMS, TRAFFIC } from '../config/defaults.js';
import type { TrafficParams, TrafficRequest } from '../types/traffic.js';
import { clamp } from '../utils/math-helpers.js';
import { mergeDefined } from '../utils/object-helpers.js';
import type { RandomStream } from './random-stream.js';

/**
 * Load factor at a time of day in [0, 1)
 */
export function computeLoadFactor(timeOfDay: number): number {
  // The sinusoid crosses the baseline a quarter day before the peak
  const phase = timeOfDay - (TRAFFIC.PEAK_PHASE - 0.25);
  const base = TRAFFIC.LOAD_BASELINE + TRAFFIC.LOAD_AMPLITUDE * Math.sin(2 * Math.PI * phase);
  return clamp(base, TRAFFIC.LOAD_FLOOR, TRAFFIC.LOAD_CEILING);
}

export class TrafficGenerator {
  private readonly random: RandomStream;
  private readonly params: TrafficParams;

  constructor(random: RandomStream, params: Partial<TrafficParams> = {}) {
    this.random = random;
    this.params = mergeDefined<TrafficParams>(DEFAULT_TRAFFIC_PARAMS, params);
  }

  /**
   * Deterministic load factor; consumes no randomness
   */
  loadFactor(timeOfDay: number): number {
    return computeLoadFactor(timeOfDay);
  }

  /**
   * Sample one request at the given time of day
   */
  sample(timeOfDay: number): TrafficRequest {
    const load = this.loadFactor(timeOfDay);
    const loadShift = load - TRAFFIC.LOAD_BASELINE;

    const complexityRaw = this.random.beta(this.params.complexityAlpha, this.params.complexityBeta);
    const complexity = clamp(complexityRaw + loadShift * TRAFFIC.COMPLEXITY_LOAD_SHIFT, 0, 1);

    const length = this.random.beta(this.params.lengthAlpha, this.params.lengthBeta);

    const qualityBase =
      TRAFFIC.QUALITY_BASE +
      TRAFFIC.QUALITY_COMPLEXITY_SLOPE * complexity +
      TRAFFIC.QUALITY_LOAD_SLOPE * loadShift;
    const qualityNoise = this.random.normal(0, TRAFFIC.QUALITY_NOISE_STD);
    const qualityRequired = clamp(qualityBase + qualityNoise, 0, 1);

    return { length, complexity, qualityRequired };
  }
}
