/**
 * Default Configuration Constants
 *
 * All simulation constants centralized here for easy tuning.
 * Values that shape the simulated world are also exposed through
 * config/router-env.yaml.
 */

import type { RewardConfig } from '../types/reward.js';
import type { ServiceTier } from '../types/tiers.js';
import type { TrafficParams } from '../types/traffic.js';

/**
 * Episode Configuration
 */
export const EPISODE = {
  /** Steps per episode */
  EPISODE_LENGTH: 1000,

  /** Initial budget (currency units) */
  BUDGET: 10.0,

  /** Queue depth normalization constant and cap */
  MAX_QUEUE_DEPTH: 50.0,

  /** Simulated steps per day (1 step = 1 minute) */
  STEPS_PER_DAY: 1440,

  /** Upper bound of the uniform initial queue depth */
  INITIAL_QUEUE_DEPTH_MAX: 0.2,

  /** Mean of the exponential queue increment on the chosen tier */
  QUEUE_INCREMENT_MEAN: 2.0,

  /** Range of the per-step multiplicative queue decay */
  QUEUE_DECAY_MIN: 0.9,
  QUEUE_DECAY_MAX: 0.98,
} as const;

/**
 * Service Tier Sampling
 */
export const SERVICE_TIER = {
  /** Latency floor (seconds) */
  MIN_LATENCY: 0.01,

  /** Std of the zero-mean noise added to effective quality */
  QUALITY_NOISE_STD: 0.02,
} as const;

/**
 * Traffic Generator
 */
export const TRAFFIC = {
  /** Time of day at which load peaks (0.375 = 9am) */
  PEAK_PHASE: 0.375,

  /** Load factor = clip(BASELINE + AMPLITUDE * sin(...), FLOOR, CEILING) */
  LOAD_BASELINE: 0.5,
  LOAD_AMPLITUDE: 0.4,
  LOAD_FLOOR: 0.1,
  LOAD_CEILING: 1.0,

  /** Complexity shift per unit of load above the baseline */
  COMPLEXITY_LOAD_SHIFT: 0.2,

  /** qualityRequired = BASE + COMPLEXITY_SLOPE * c + LOAD_SLOPE * (load - 0.5) + noise */
  QUALITY_BASE: 0.5,
  QUALITY_COMPLEXITY_SLOPE: 0.4,
  QUALITY_LOAD_SLOPE: 0.1,
  QUALITY_NOISE_STD: 0.05,
} as const;

/**
 * Environment Registry
 */
export const REGISTRY = {
  /** Id of the built-in routing environment */
  ROUTER_ENV_ID: 'LLMRouter-v0',

  /** Time limit applied by the registry to the built-in environment */
  MAX_EPISODE_STEPS: 1000,
} as const;

/**
 * Logging
 */
export const LOGGING = {
  /** Environment variable that overrides the default pino level */
  LEVEL_ENV_VAR: 'ROUTER_SIM_LOG_LEVEL',

  DEFAULT_LEVEL: 'info',
} as const;

export const DEFAULT_REWARD_CONFIG: Readonly<RewardConfig> = Object.freeze({
  costWeight: 1.0,
  qualityWeight: 0.5,
  latencyPenalty: 2.0,
  slaThreshold: 1.0, // seconds
  qualityMissPenalty: 1.0,
});

export const DEFAULT_TRAFFIC_PARAMS: Readonly<TrafficParams> = Object.freeze({
  complexityAlpha: 2.0,
  complexityBeta: 5.0,
  lengthAlpha: 2.0,
  lengthBeta: 3.0,
});

/**
 * Five preset tiers spanning the cost/latency/quality frontier, from a
 * premium large model down to an inexpensive open model.
 */
export const DEFAULT_SERVICE_TIERS: readonly ServiceTier[] = Object.freeze([
  { name: 'tier1_large', costPerCall: 0.03, latencyMean: 2.0, latencyStd: 0.5, qualityScore: 0.95 },
  { name: 'tier1_small', costPerCall: 0.003, latencyMean: 0.5, latencyStd: 0.1, qualityScore: 0.82 },
  { name: 'tier2_large', costPerCall: 0.015, latencyMean: 1.5, latencyStd: 0.4, qualityScore: 0.9 },
  { name: 'tier2_small', costPerCall: 0.001, latencyMean: 0.3, latencyStd: 0.08, qualityScore: 0.75 },
  { name: 'open_source', costPerCall: 0.0005, latencyMean: 0.8, latencyStd: 0.3, qualityScore: 0.7 },
]);
