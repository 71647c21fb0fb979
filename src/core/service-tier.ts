/**
 * Service Tier Model
 *
 * Samples the outcome of serving a request on a tier:
 * - Latency: normal(mean, std) floored at a small positive minimum, no cap
 * - Quality: complexity widens the gap between base quality and 1.0,
 *   plus small Gaussian noise, clipped to [0, 1]
 * - Cost: the tier's fixed per-call cost
 *
 * Simple requests look alike on every tier; complex ones expose the
 * quality differences that justify the costlier tiers.
 */

import { SERVICE_TIER } from '../config/defaults.js';
import { ServiceTierListSchema } from '../types/schemas/config.js';
import { zodErrorToRouterEnvError } from '../api/errors.js';
import type { ServiceTier, TierOutcome } from '../types/tiers.js';
import { clamp } from '../utils/math-helpers.js';
import type { RandomStream } from './random-stream.js';

/**
 * Sample a latency (seconds); one normal draw
 */
export function sampleLatency(tier: ServiceTier, random: RandomStream): number {
  const raw = random.normal(tier.latencyMean, tier.latencyStd);
  return Math.max(SERVICE_TIER.MIN_LATENCY, raw);
}

/**
 * Noise-free effective quality for a request of the given complexity
 */
export function expectedQuality(tier: ServiceTier, complexity: number): number {
  const gap = 1 - tier.qualityScore;
  return 1 - gap * (0.5 + 0.5 * complexity);
}

/**
 * Sample effective quality; one normal draw
 */
export function sampleQuality(
  tier: ServiceTier,
  complexity: number,
  random: RandomStream
): number {
  const noise = random.normal(0, SERVICE_TIER.QUALITY_NOISE_STD);
  return clamp(expectedQuality(tier, complexity) + noise, 0, 1);
}

/**
 * Deterministic cost of one call
 */
export function callCost(tier: ServiceTier): number {
  return tier.costPerCall;
}

/**
 * Sample a full outcome: latency first, then quality
 */
export function sampleOutcome(
  tier: ServiceTier,
  complexity: number,
  random: RandomStream
): TierOutcome {
  const latency = sampleLatency(tier, random);
  const quality = sampleQuality(tier, complexity, random);
  return { latency, quality, cost: callCost(tier) };
}

/**
 * Validate a tier collection and return a frozen copy
 *
 * @throws {RouterEnvError} InvalidConfig on negative cost, out-of-range
 *   quality, an empty collection or duplicate names
 */
export function validateServiceTiers(tiers: readonly ServiceTier[]): readonly ServiceTier[] {
  const result = ServiceTierListSchema.safeParse(tiers);
  if (!result.success) {
    throw zodErrorToRouterEnvError(result.error);
  }

  return Object.freeze(result.data.map((tier) => Object.freeze({ ...tier })));
}

/**
 * Index of the cheapest tier (first one wins ties)
 */
export function cheapestTierIndex(tiers: readonly ServiceTier[]): number {
  let best = 0;
  tiers.forEach((tier, index) => {
    if (tier.costPerCall < tiers[best].costPerCall) {
      best = index;
    }
  });
  return best;
}
