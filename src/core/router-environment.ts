/**
 * Router Environment
 *
 * Episode simulator for training an agent to route inference requests.
 * At each step the agent picks a service tier for the pending request;
 * the environment samples the outcome, advances the hidden dynamics
 * (budget, queue depths, time of day), scores the decision and draws the
 * next request.
 *
 * Observation (Float32Array, every component in [0, 1]):
 *   [0]          request length
 *   [1]          request complexity
 *   [2..k+1]     queue depth per tier / maxQueueDepth
 *   [k+2]        time of day
 *   [k+3]        budget remaining / initial budget
 *   [k+4]        request quality requirement
 *
 * Random draw order (fixed, so a seed reproduces a trajectory):
 *   reset: start time uniform, k initial queue depths, first request
 *   step:  latency normal, quality normal, queue increment exponential,
 *          k queue decay factors, next request
 */

import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import {
  RouterEnvError,
  createInvalidActionError,
  createNotInitializedError,
  zodErrorToRouterEnvError,
} from '../api/errors.js';
import type { RouterEnvironmentEvents } from '../api/events.js';
import { DEFAULT_SERVICE_TIERS, EPISODE } from '../config/defaults.js';
import type {
  EpisodePhase,
  EpisodeSnapshot,
  EpisodeSummary,
  Observation,
  ResetInfo,
  ResetOptions,
  ResetResult,
  RouterEnvironmentDependencies,
  RouterEnvironmentOptions,
  RoutingEnvironment,
  StepInfo,
  StepResult,
} from '../types/environment.js';
import type { RewardConfig } from '../types/reward.js';
import { RouterEnvironmentOptionsSchema } from '../types/schemas/config.js';
import type { ServiceTier } from '../types/tiers.js';
import type { TrafficParams, TrafficRequest } from '../types/traffic.js';
import { createDefaultLogger, lazyLog } from '../utils/logger-helpers.js';
import { clamp, safeDivide, wrapUnit } from '../utils/math-helpers.js';
import { type RandomStream, createRandomStream } from './random-stream.js';
import { computeReward, qualityShortfall, resolveRewardConfig } from './reward.js';
import { sampleOutcome, validateServiceTiers } from './service-tier.js';
import { BoxSpace, DiscreteSpace } from './spaces.js';
import { TrafficGenerator, computeLoadFactor } from './traffic-generator.js';

/**
 * Mutable state of one episode
 */
interface EpisodeState {
  random: RandomStream;
  traffic: TrafficGenerator;
  stepCount: number;
  budgetRemaining: number;
  queueDepths: number[];
  timeOfDay: number;
  pending: TrafficRequest;
  terminated: boolean;
  summary: EpisodeSummary;
}

/**
 * Components after the queue block: time of day, budget, quality requirement
 */
const TRAILING_COMPONENTS = 3;

export class RouterEnvironment
  extends EventEmitter<RouterEnvironmentEvents>
  implements RoutingEnvironment
{
  public readonly tiers: readonly ServiceTier[];
  public readonly rewardConfig: Readonly<RewardConfig>;
  public readonly episodeLength: number;
  public readonly initialBudget: number;
  public readonly maxQueueDepth: number;
  public readonly observationSpace: BoxSpace;
  public readonly actionSpace: DiscreteSpace;

  private readonly configuredSeed?: number;
  private readonly trafficParams: Partial<TrafficParams>;
  private readonly logger: Logger;

  private episode?: EpisodeState;

  /**
   * @param options - Tiers, reward weights, episode length, budget, queue cap, seed
   * @param dependencies - Optional hooks (logger)
   * @throws {RouterEnvError} InvalidConfig when an option fails validation
   */
  constructor(options: RouterEnvironmentOptions = {}, dependencies: RouterEnvironmentDependencies = {}) {
    super();

    const parsed = RouterEnvironmentOptionsSchema.safeParse(options);
    if (!parsed.success) {
      throw zodErrorToRouterEnvError(parsed.error);
    }

    this.tiers = validateServiceTiers(options.tiers ?? DEFAULT_SERVICE_TIERS);
    this.rewardConfig = Object.freeze(resolveRewardConfig(parsed.data.rewardConfig));
    this.episodeLength = parsed.data.episodeLength ?? EPISODE.EPISODE_LENGTH;
    this.initialBudget = parsed.data.budget ?? EPISODE.BUDGET;
    this.maxQueueDepth = parsed.data.maxQueueDepth ?? EPISODE.MAX_QUEUE_DEPTH;
    this.configuredSeed = parsed.data.seed;
    this.trafficParams = parsed.data.traffic ?? {};
    this.logger = dependencies.logger ?? createDefaultLogger('router-environment');

    const tierCount = this.tiers.length;
    this.observationSpace = new BoxSpace(2 + tierCount + TRAILING_COMPONENTS, 0, 1);
    this.actionSpace = new DiscreteSpace(tierCount);

    this.logger.debug(
      {
        tiers: this.tiers.map((tier) => tier.name),
        episodeLength: this.episodeLength,
        budget: this.initialBudget,
        maxQueueDepth: this.maxQueueDepth,
        rewardConfig: this.rewardConfig,
      },
      'RouterEnvironment initialized'
    );
  }

  get unwrapped(): RouterEnvironment {
    return this;
  }

  get phase(): EpisodePhase {
    if (!this.episode) {
      return 'uninitialized';
    }
    return this.episode.terminated ? 'terminated' : 'running';
  }

  /**
   * Start a new episode
   *
   * Every reset starts a fresh stream from `seed`, else the configured
   * seed, else OS entropy, so an episode never depends on the one before.
   */
  reset(seed?: number, options: ResetOptions = {}): ResetResult<Observation, ResetInfo> {
    const { startTimeOfDay } = options;
    if (
      startTimeOfDay !== undefined &&
      !(Number.isFinite(startTimeOfDay) && startTimeOfDay >= 0 && startTimeOfDay < 1)
    ) {
      throw new RouterEnvError(
        'InvalidArgument',
        `Invalid startTimeOfDay: ${startTimeOfDay} (expected a number in [0, 1))`,
        { startTimeOfDay }
      );
    }

    const random = createRandomStream(seed ?? this.configuredSeed);
    const traffic = new TrafficGenerator(random, this.trafficParams);

    // Always drawn, even when pinned, to keep the stream aligned
    const drawnTimeOfDay = random.uniform(0, 1);
    const timeOfDay = startTimeOfDay ?? drawnTimeOfDay;
    const queueDepths = this.tiers.map(() => random.uniform(0, EPISODE.INITIAL_QUEUE_DEPTH_MAX));
    const pending = traffic.sample(timeOfDay);

    this.episode = {
      random,
      traffic,
      stepCount: 0,
      budgetRemaining: this.initialBudget,
      queueDepths,
      timeOfDay,
      pending,
      terminated: false,
      summary: this.createSummary(),
    };

    const observation = this.buildObservation(this.episode);

    this.logger.debug({ seed: random.seed, timeOfDay }, 'Episode reset');
    this.emit('reset', {
      seed: random.seed,
      startTimeOfDay: timeOfDay,
      observation: observation.slice(),
    });

    return { observation, info: {} };
  }

  /**
   * Route the pending request to tier `action`
   *
   * @throws {RouterEnvError} NotInitialized before the first reset,
   *   InvalidAction for an action outside [0, tierCount),
   *   EpisodeTerminated once the episode has ended
   */
  step(action: number): StepResult<Observation, StepInfo> {
    const episode = this.episode;
    if (!episode) {
      throw createNotInitializedError();
    }
    if (!this.actionSpace.contains(action)) {
      this.logger.warn({ action, tierCount: this.tiers.length }, 'Rejected invalid action');
      throw createInvalidActionError(action, this.tiers.length);
    }
    if (episode.terminated) {
      throw new RouterEnvError('EpisodeTerminated', 'Episode has terminated; call reset() first', {
        stepCount: episode.stepCount,
      });
    }

    const tier = this.tiers[action];
    const served = episode.pending;

    // 1. Outcome for the pending request
    const outcome = sampleOutcome(tier, served.complexity, episode.random);

    // 2-4. Budget, step counter, clock
    episode.budgetRemaining = Math.max(0, episode.budgetRemaining - outcome.cost);
    episode.stepCount += 1;
    episode.timeOfDay = wrapUnit(episode.timeOfDay + 1 / EPISODE.STEPS_PER_DAY);

    // 5. Queues
    this.updateQueueDepths(episode, action);

    // 6. Reward for the request just served
    const reward = computeReward(
      {
        cost: outcome.cost,
        quality: outcome.quality,
        latency: outcome.latency,
        qualityRequired: served.qualityRequired,
      },
      this.rewardConfig
    );

    // 7. Next request
    episode.pending = episode.traffic.sample(episode.timeOfDay);

    // 8. Termination; truncation belongs to wrappers
    const terminated =
      episode.stepCount >= this.episodeLength || episode.budgetRemaining <= 0;
    episode.terminated = terminated;

    const info: StepInfo = {
      cost: outcome.cost,
      quality: outcome.quality,
      latency: outcome.latency,
      tierName: tier.name,
      tierIndex: action,
      budgetRemaining: episode.budgetRemaining,
      qualityRequired: served.qualityRequired,
      slaViolated: outcome.latency > this.rewardConfig.slaThreshold,
      step: episode.stepCount,
      timeOfDay: episode.timeOfDay,
      loadFactor: computeLoadFactor(episode.timeOfDay),
    };

    this.recordStep(episode.summary, info, reward);

    lazyLog(
      this.logger,
      'debug',
      () => ({ step: info.step, tier: info.tierName, reward, budgetRemaining: info.budgetRemaining }),
      'Step completed'
    );

    const observation = this.buildObservation(episode);
    this.emit('step', { action, reward, terminated, info });

    if (terminated) {
      const summary = this.snapshotSummary(episode.summary);
      this.logger.info(
        {
          steps: summary.steps,
          totalReward: summary.totalReward,
          totalCost: summary.totalCost,
          budgetExhausted: episode.budgetRemaining <= 0,
        },
        'Episode finished'
      );
      this.emit('episodeEnd', summary);
    }

    return { observation, reward, terminated, truncated: false, info };
  }

  /**
   * Totals of the current (or last finished) episode
   */
  getEpisodeSummary(): EpisodeSummary | undefined {
    return this.episode ? this.snapshotSummary(this.episode.summary) : undefined;
  }

  /**
   * Copy of the hidden state, for diagnostics and tests
   */
  getState(): EpisodeSnapshot | undefined {
    const episode = this.episode;
    if (!episode) {
      return undefined;
    }

    return {
      phase: this.phase,
      stepCount: episode.stepCount,
      budgetRemaining: episode.budgetRemaining,
      queueDepths: [...episode.queueDepths],
      timeOfDay: episode.timeOfDay,
      pendingRequest: { ...episode.pending },
    };
  }

  /**
   * No external resources are held; drops listeners only
   */
  close(): void {
    this.removeAllListeners();
    this.logger.debug('RouterEnvironment closed');
  }

  private updateQueueDepths(episode: EpisodeState, action: number): void {
    const depths = episode.queueDepths;
    const increment = episode.random.exponential(EPISODE.QUEUE_INCREMENT_MEAN);
    depths[action] = Math.min(this.maxQueueDepth, depths[action] + increment);

    for (let i = 0; i < depths.length; i++) {
      depths[i] *= episode.random.uniform(EPISODE.QUEUE_DECAY_MIN, EPISODE.QUEUE_DECAY_MAX);
    }
  }

  private buildObservation(episode: EpisodeState): Observation {
    const tierCount = this.tiers.length;
    const observation = new Float32Array(this.observationSpace.size);

    observation[0] = clamp(episode.pending.length, 0, 1);
    observation[1] = clamp(episode.pending.complexity, 0, 1);
    for (let i = 0; i < tierCount; i++) {
      observation[2 + i] = clamp(episode.queueDepths[i] / this.maxQueueDepth, 0, 1);
    }
    observation[2 + tierCount] = episode.timeOfDay;
    observation[3 + tierCount] = clamp(safeDivide(episode.budgetRemaining, this.initialBudget), 0, 1);
    observation[4 + tierCount] = clamp(episode.pending.qualityRequired, 0, 1);

    return observation;
  }

  private createSummary(): EpisodeSummary {
    return {
      steps: 0,
      totalReward: 0,
      totalCost: 0,
      slaViolations: 0,
      qualityMisses: 0,
      budgetRemaining: this.initialBudget,
      tierCounts: Object.fromEntries(this.tiers.map((tier) => [tier.name, 0])),
    };
  }

  private recordStep(summary: EpisodeSummary, info: StepInfo, reward: number): void {
    summary.steps = info.step;
    summary.totalReward += reward;
    summary.totalCost += info.cost;
    summary.budgetRemaining = info.budgetRemaining;
    summary.tierCounts[info.tierName] += 1;
    if (info.slaViolated) {
      summary.slaViolations += 1;
    }
    if (qualityShortfall(info.qualityRequired, info.quality) > 0) {
      summary.qualityMisses += 1;
    }
  }

  private snapshotSummary(summary: EpisodeSummary): EpisodeSummary {
    return { ...summary, tierCounts: { ...summary.tierCounts } };
  }
}
