export { RouterEnvironment } from './core/router-environment.js';
export { TimeLimit } from './core/time-limit.js';
export { BoxSpace, DiscreteSpace } from './core/spaces.js';
export { RandomStream, createRandomStream } from './core/random-stream.js';
export {
  callCost,
  cheapestTierIndex,
  expectedQuality,
  sampleLatency,
  sampleOutcome,
  sampleQuality,
  validateServiceTiers,
} from './core/service-tier.js';
export { TrafficGenerator, computeLoadFactor } from './core/traffic-generator.js';
export {
  computeReward,
  computeRewardBreakdown,
  latencyViolation,
  qualityShortfall,
  resolveRewardConfig,
} from './core/reward.js';

export {
  RouterEnvError,
  isRouterEnvError,
  zodErrorToRouterEnvError,
  type RouterEnvErrorCode,
  type RouterEnvErrorShape,
} from './api/errors.js';
export type * from './api/events.js';

// Registry
export {
  EnvironmentRegistry,
  createDefaultRegistry,
  registerBuiltinEnvironments,
  type EnvironmentFactory,
  type EnvironmentSpec,
  type MakeOptions,
} from './registry/environment-registry.js';

// Configuration
export {
  DEFAULT_REWARD_CONFIG,
  DEFAULT_SERVICE_TIERS,
  DEFAULT_TRAFFIC_PARAMS,
  EPISODE,
  REGISTRY,
} from './config/defaults.js';
export {
  loadConfig,
  loadEnvironmentOptions,
  toEnvironmentOptions,
  type ConfigEnvironment,
} from './config/loader.js';

export * from './evaluation/index.js';
export * from './testing/index.js';

export type * from './types/index.js';
