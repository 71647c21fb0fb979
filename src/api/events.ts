/**
 * Router Environment Event System
 *
 * Defines event types and payloads for the RouterEnvironment class.
 * Listeners run synchronously inside reset/step; they observe the episode
 * and cannot change its state.
 */

import type { EpisodeSummary, Observation, StepInfo } from '../types/index.js';

/**
 * Event payload when an episode starts
 */
export interface EpisodeResetEvent {
  /** Seed of the stream driving this episode */
  seed: number;
  startTimeOfDay: number;
  observation: Observation;
}

/**
 * Event payload for each routing decision
 */
export interface StepEvent {
  action: number;
  reward: number;
  terminated: boolean;
  info: StepInfo;
}

/**
 * Router environment events
 */
export interface RouterEnvironmentEvents {
  reset: (event: EpisodeResetEvent) => void;
  step: (event: StepEvent) => void;
  episodeEnd: (summary: EpisodeSummary) => void;
}
