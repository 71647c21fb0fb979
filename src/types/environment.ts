/**
 * Environment contract types
 *
 * The reset/step contract shared by the router environment, its wrappers
 * and anything built by the environment registry.
 */

import type { Logger } from 'pino';
import type { BoxSpace, DiscreteSpace } from '../core/spaces.js';
import type { RewardConfig } from './reward.js';
import type { ServiceTier } from './tiers.js';
import type { TrafficParams, TrafficRequest } from './traffic.js';

/**
 * Observation vector; every component lies in [0, 1]
 */
export type Observation = Float32Array;

/**
 * Options accepted by `reset`
 */
export interface ResetOptions {
  /**
   * Pin the episode's starting time of day instead of using the random draw.
   * The draw is still consumed so seeded streams stay aligned.
   */
  startTimeOfDay?: number;
}

/**
 * Value returned by `reset`
 */
export interface ResetResult<TObservation, TInfo> {
  observation: TObservation;
  info: TInfo;
}

/**
 * Value returned by `step`
 */
export interface StepResult<TObservation, TInfo> {
  observation: TObservation;
  reward: number;
  terminated: boolean;
  truncated: boolean;
  info: TInfo;
}

/**
 * Generic discrete-action environment
 */
export interface Environment<TObservation, TAction, TStepInfo, TResetInfo> {
  readonly observationSpace: BoxSpace;
  readonly actionSpace: DiscreteSpace;

  /** The innermost environment, with every wrapper removed */
  readonly unwrapped: Environment<TObservation, TAction, TStepInfo, TResetInfo>;

  reset(seed?: number, options?: ResetOptions): ResetResult<TObservation, TResetInfo>;
  step(action: TAction): StepResult<TObservation, TStepInfo>;
  close(): void;
}

/**
 * Diagnostics attached to every step
 *
 * Advisory only: the reward and state never depend on what a caller does
 * with this object.
 */
export interface StepInfo {
  cost: number;
  quality: number;
  latency: number;
  tierName: string;
  tierIndex: number;
  budgetRemaining: number;
  /** Requirement of the request that was just served */
  qualityRequired: number;
  slaViolated: boolean;
  step: number;
  timeOfDay: number;
  /** Load at `timeOfDay`, i.e. after the clock advanced */
  loadFactor: number;
}

/**
 * `reset` returns an empty diagnostics mapping
 */
export type ResetInfo = Record<string, never>;

/**
 * The routing environment contract
 */
export type RoutingEnvironment = Environment<Observation, number, StepInfo, ResetInfo>;

/**
 * Construction options, all optional
 */
export interface RouterEnvironmentOptions {
  /** Ordered tier collection; defaults to the five preset tiers */
  tiers?: readonly ServiceTier[];
  rewardConfig?: Partial<RewardConfig>;
  /** Steps per episode */
  episodeLength?: number;
  /** Initial budget (currency units) */
  budget?: number;
  /** Queue depth normalization constant and cap */
  maxQueueDepth?: number;
  seed?: number;
  traffic?: Partial<TrafficParams>;
}

/**
 * Test and integration hooks
 */
export interface RouterEnvironmentDependencies {
  logger?: Logger;
}

/**
 * Per-episode totals kept alongside the episode state
 */
export interface EpisodeSummary {
  steps: number;
  totalReward: number;
  totalCost: number;
  slaViolations: number;
  qualityMisses: number;
  budgetRemaining: number;
  /** Selection count per tier name */
  tierCounts: Record<string, number>;
}

/**
 * Episode lifecycle: uninitialized -> running -> terminated; only reset
 * leaves `terminated`
 */
export type EpisodePhase = 'uninitialized' | 'running' | 'terminated';

/**
 * Read-only copy of the hidden episode state
 */
export interface EpisodeSnapshot {
  phase: EpisodePhase;
  stepCount: number;
  budgetRemaining: number;
  queueDepths: number[];
  timeOfDay: number;
  pendingRequest: TrafficRequest;
}
