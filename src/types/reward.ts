/**
 * Reward types
 */

/**
 * Weights and thresholds for the routing reward
 *
 * Weights may be zero or negative to invert incentives; cost always enters
 * the reward with a negative sign before weighting.
 */
export interface RewardConfig {
  costWeight: number;
  qualityWeight: number;

  /** Penalty per second of latency above `slaThreshold` */
  latencyPenalty: number;

  /** Latency SLA (seconds) */
  slaThreshold: number;

  /** Penalty per unit of quality below the request's requirement */
  qualityMissPenalty: number;
}

/**
 * Everything the reward needs about one served request
 */
export interface RewardInput {
  cost: number;
  quality: number;
  latency: number;
  qualityRequired: number;
}

/**
 * Reward split into its signed terms; `total` is their sum
 */
export interface RewardBreakdown {
  costTerm: number;
  qualityTerm: number;
  latencyTerm: number;
  qualityMissTerm: number;
  total: number;
}
