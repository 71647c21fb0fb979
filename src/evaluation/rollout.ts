/**
 * Rollout evaluation
 *
 * Runs whole episodes of a policy and summarizes them. Episode `i` is reset
 * with seed `seed + i`, so two policies evaluated with the same options see
 * the same start times, initial queues and first requests.
 */

import type { Logger } from 'pino';
import { RouterEnvError } from '../api/errors.js';
import type { RoutingEnvironment } from '../types/environment.js';
import { createDefaultLogger, lazyLog } from '../utils/logger-helpers.js';
import { safeDivide, safeSum } from '../utils/math-helpers.js';
import type { RoutingPolicy } from './baselines.js';
import {
  calculateEffectSize,
  calculateSampleStatistics,
  type EffectSize,
  type SampleStatistics,
} from './statistics.js';

export type MakeEnvironment = () => RoutingEnvironment;

export interface RolloutOptions {
  episodes: number;
  /** Seed of the first episode (default 0) */
  seed?: number;
  logger?: Logger;
}

/**
 * Totals of one evaluated episode
 */
export interface EpisodeResult {
  seed: number;
  totalReward: number;
  totalCost: number;
  steps: number;
  slaViolations: number;
  /** True when the episode ended by truncation rather than termination */
  truncated: boolean;
}

export interface RolloutReport {
  policy: string;
  episodes: EpisodeResult[];
  reward: SampleStatistics;
  cost: SampleStatistics;
  meanSteps: number;
  /** SLA violations per step over all episodes */
  slaViolationRate: number;
}

export interface StrategyComparison {
  reports: RolloutReport[];
  /** Policy names by mean reward, best first */
  ranking: string[];
  /** Effect size of each policy's returns against the first policy's */
  effectSizes: Record<string, EffectSize>;
}

function runEpisode(env: RoutingEnvironment, policy: RoutingPolicy, seed: number): EpisodeResult {
  policy.reset?.();
  let { observation } = env.reset(seed);

  const result: EpisodeResult = {
    seed,
    totalReward: 0,
    totalCost: 0,
    steps: 0,
    slaViolations: 0,
    truncated: false,
  };

  for (;;) {
    const step = env.step(policy.act(observation));
    observation = step.observation;

    result.totalReward += step.reward;
    result.totalCost += step.info.cost;
    result.steps += 1;
    if (step.info.slaViolated) {
      result.slaViolations += 1;
    }

    if (step.terminated || step.truncated) {
      result.truncated = step.truncated && !step.terminated;
      return result;
    }
  }
}

/**
 * Evaluate a policy over `episodes` episodes on a fresh environment
 *
 * @throws {RouterEnvError} InvalidArgument when `episodes` is not a positive integer
 */
export function runRollouts(
  makeEnv: MakeEnvironment,
  policy: RoutingPolicy,
  options: RolloutOptions
): RolloutReport {
  const { episodes, seed = 0 } = options;
  if (!Number.isInteger(episodes) || episodes <= 0) {
    throw new RouterEnvError('InvalidArgument', `episodes must be a positive integer, got ${episodes}`, {
      episodes,
    });
  }

  const logger = options.logger ?? createDefaultLogger('rollout');
  const env = makeEnv();
  const results: EpisodeResult[] = [];

  try {
    for (let i = 0; i < episodes; i++) {
      const result = runEpisode(env, policy, seed + i);
      results.push(result);
      lazyLog(logger, 'debug', () => ({ policy: policy.name, ...result }), 'Rollout episode finished');
    }
  } finally {
    env.close();
  }

  const totalSteps = safeSum(results.map((result) => result.steps));
  const totalViolations = safeSum(results.map((result) => result.slaViolations));

  const report: RolloutReport = {
    policy: policy.name,
    episodes: results,
    reward: calculateSampleStatistics(results.map((result) => result.totalReward)),
    cost: calculateSampleStatistics(results.map((result) => result.totalCost)),
    meanSteps: totalSteps / results.length,
    slaViolationRate: safeDivide(totalViolations, totalSteps),
  };

  logger.info(
    {
      policy: report.policy,
      episodes,
      meanReward: report.reward.mean,
      stdReward: report.reward.stdDev,
      meanCost: report.cost.mean,
    },
    'Rollout evaluation complete'
  );

  return report;
}

/**
 * Evaluate several policies on identical episode seeds
 *
 * @throws {RouterEnvError} InvalidArgument for no policies or a repeated policy name
 */
export function compareStrategies(
  makeEnv: MakeEnvironment,
  policies: readonly RoutingPolicy[],
  options: RolloutOptions
): StrategyComparison {
  if (policies.length === 0) {
    throw new RouterEnvError('InvalidArgument', 'At least one policy is required');
  }

  const seen = new Set<string>();
  for (const { name } of policies) {
    if (seen.has(name)) {
      throw new RouterEnvError('InvalidArgument', `Duplicate policy name '${name}'`, { name });
    }
    seen.add(name);
  }

  const reports = policies.map((policy) => runRollouts(makeEnv, policy, options));
  const ranking = [...reports]
    .sort((a, b) => b.reward.mean - a.reward.mean)
    .map((report) => report.policy);

  const baselineReturns = reports[0].episodes.map((result) => result.totalReward);
  const effectSizes: Record<string, EffectSize> = {};
  for (const report of reports) {
    effectSizes[report.policy] = calculateEffectSize(
      baselineReturns,
      report.episodes.map((result) => result.totalReward)
    );
  }

  return { reports, ranking, effectSizes };
}
