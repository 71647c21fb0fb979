/**
 * Rollout evaluation and baseline policies
 */

export {
  createCheapestFirstPolicy,
  createQualityAwarePolicy,
  createRandomPolicy,
  createRoundRobinPolicy,
  type RoutingPolicy,
} from './baselines.js';

export {
  compareStrategies,
  runRollouts,
  type MakeEnvironment,
  type EpisodeResult,
  type RolloutOptions,
  type RolloutReport,
  type StrategyComparison,
} from './rollout.js';

export {
  calculateEffectSize,
  calculateSampleStatistics,
  percentile,
  type EffectSize,
  type SampleStatistics,
} from './statistics.js';
