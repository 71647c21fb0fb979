/**
 * Baseline routing policies
 *
 * Fixed strategies to compare a trained agent against. Each reads only the
 * observation, so they run unchanged under any wrapper.
 */

import { RouterEnvError } from '../api/errors.js';
import { RandomStream } from '../core/random-stream.js';
import { cheapestTierIndex } from '../core/service-tier.js';
import type { Observation } from '../types/environment.js';
import type { ServiceTier } from '../types/tiers.js';

/**
 * Maps an observation to a tier index
 */
export interface RoutingPolicy {
  readonly name: string;
  act(observation: Observation): number;
  /** Called at the start of every episode */
  reset?(): void;
}

function assertTierCount(tierCount: number): void {
  if (!Number.isInteger(tierCount) || tierCount <= 0) {
    throw new RouterEnvError('InvalidArgument', `tierCount must be a positive integer, got ${tierCount}`, {
      tierCount,
    });
  }
}

function assertTiers(tiers: readonly ServiceTier[]): void {
  if (tiers.length === 0) {
    throw new RouterEnvError('InvalidArgument', 'At least one service tier is required');
  }
}

/**
 * Uniform choice from its own seeded stream; the stream runs on across
 * episodes
 */
export function createRandomPolicy(tierCount: number, seed = 0): RoutingPolicy {
  assertTierCount(tierCount);
  const random = new RandomStream(seed);

  return {
    name: 'random',
    act: () => random.integer(tierCount),
  };
}

/**
 * Cycles 0, 1, ..., tierCount - 1, restarting at 0 each episode
 */
export function createRoundRobinPolicy(tierCount: number): RoutingPolicy {
  assertTierCount(tierCount);
  let next = 0;

  return {
    name: 'round_robin',
    act: () => {
      const action = next;
      next = (next + 1) % tierCount;
      return action;
    },
    reset: () => {
      next = 0;
    },
  };
}

/**
 * Always the lowest-cost tier
 */
export function createCheapestFirstPolicy(tiers: readonly ServiceTier[]): RoutingPolicy {
  assertTiers(tiers);
  const cheapest = cheapestTierIndex(tiers);

  return {
    name: 'cheapest_first',
    act: () => cheapest,
  };
}

/**
 * Cheapest tier whose base quality meets the request's requirement (the
 * last observation component); the highest-quality tier when none does
 */
export function createQualityAwarePolicy(tiers: readonly ServiceTier[]): RoutingPolicy {
  assertTiers(tiers);

  const byCost = tiers
    .map((tier, index) => ({ tier, index }))
    .sort((a, b) => a.tier.costPerCall - b.tier.costPerCall || a.index - b.index);

  let best = 0;
  tiers.forEach((tier, index) => {
    if (tier.qualityScore > tiers[best].qualityScore) {
      best = index;
    }
  });

  return {
    name: 'quality_aware',
    act: (observation) => {
      const required = observation[observation.length - 1];
      const match = byCost.find(({ tier }) => tier.qualityScore >= required);
      return match ? match.index : best;
    },
  };
}
