/**
 * Reward Function
 *
 * r = -costWeight * cost
 *     + qualityWeight * quality
 *     - latencyPenalty * max(0, latency - slaThreshold)
 *     - qualityMissPenalty * max(0, qualityRequired - quality)
 *
 * Pure: no state, no division, no logarithms. Finite for finite inputs.
 */

import { DEFAULT_REWARD_CONFIG } from '../config/defaults.js';
import type { RewardBreakdown, RewardConfig, RewardInput } from '../types/reward.js';
import { mergeDefined } from '../utils/object-helpers.js';

/**
 * Fill unspecified weights with defaults
 */
export function resolveRewardConfig(config: Partial<RewardConfig> = {}): RewardConfig {
  return mergeDefined<RewardConfig>(DEFAULT_REWARD_CONFIG, config);
}

/**
 * Latency above the SLA (0 when within it)
 */
export function latencyViolation(latency: number, slaThreshold: number): number {
  return Math.max(0, latency - slaThreshold);
}

/**
 * Quality below the requirement (0 when met)
 */
export function qualityShortfall(qualityRequired: number, quality: number): number {
  return Math.max(0, qualityRequired - quality);
}

/**
 * Reward with each signed term reported separately
 */
export function computeRewardBreakdown(input: RewardInput, config: RewardConfig): RewardBreakdown {
  const costTerm = -config.costWeight * input.cost;
  const qualityTerm = config.qualityWeight * input.quality;
  const latencyTerm = config.latencyPenalty * latencyViolation(input.latency, config.slaThreshold);
  const qualityMissTerm =
    config.qualityMissPenalty * qualityShortfall(input.qualityRequired, input.quality);

  return {
    costTerm,
    qualityTerm,
    latencyTerm,
    qualityMissTerm,
    total: costTerm + qualityTerm - latencyTerm - qualityMissTerm,
  };
}

/**
 * Scalar reward for one served request
 */
export function computeReward(input: RewardInput, config: RewardConfig): number {
  return computeRewardBreakdown(input, config).total;
}
