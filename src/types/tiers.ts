/**
 * Service tier types
 *
 * A service tier is one backend option the router can send a request to.
 * Tiers are immutable once an environment is constructed; the ordered tier
 * collection defines the action space (action = tier index).
 */

/**
 * Static description of a backend service tier
 */
export interface ServiceTier {
  /** Unique identifier within a tier collection */
  readonly name: string;

  /** Fixed cost charged per call (currency units, >= 0) */
  readonly costPerCall: number;

  /** Mean of the latency distribution (seconds) */
  readonly latencyMean: number;

  /** Spread of the latency distribution (seconds) */
  readonly latencyStd: number;

  /** Base quality score in [0, 1] */
  readonly qualityScore: number;
}

/**
 * Sampled result of serving one request on a tier
 */
export interface TierOutcome {
  latency: number;
  quality: number;
  cost: number;
}
