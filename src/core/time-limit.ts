/**
 * Time-limit wrapper
 *
 * Reports `truncated` once a fixed number of steps has elapsed since the
 * last reset. The wrapped environment never truncates on its own, so this
 * is the only place an external step budget enters an episode.
 */

import { RouterEnvError } from '../api/errors.js';
import type {
  Environment,
  ResetOptions,
  ResetResult,
  StepResult,
} from '../types/environment.js';
import type { BoxSpace, DiscreteSpace } from './spaces.js';

export class TimeLimit<TObservation, TAction, TStepInfo, TResetInfo>
  implements Environment<TObservation, TAction, TStepInfo, TResetInfo>
{
  private elapsedSteps?: number;

  constructor(
    private readonly env: Environment<TObservation, TAction, TStepInfo, TResetInfo>,
    public readonly maxEpisodeSteps: number
  ) {
    if (!Number.isInteger(maxEpisodeSteps) || maxEpisodeSteps <= 0) {
      throw new RouterEnvError(
        'InvalidConfig',
        `maxEpisodeSteps must be a positive integer, got ${maxEpisodeSteps}`,
        { maxEpisodeSteps }
      );
    }
  }

  get observationSpace(): BoxSpace {
    return this.env.observationSpace;
  }

  get actionSpace(): DiscreteSpace {
    return this.env.actionSpace;
  }

  get unwrapped(): Environment<TObservation, TAction, TStepInfo, TResetInfo> {
    return this.env.unwrapped;
  }

  /**
   * Steps since the last reset (undefined before the first reset)
   */
  get elapsed(): number | undefined {
    return this.elapsedSteps;
  }

  reset(seed?: number, options?: ResetOptions): ResetResult<TObservation, TResetInfo> {
    const result = this.env.reset(seed, options);
    this.elapsedSteps = 0;
    return result;
  }

  step(action: TAction): StepResult<TObservation, TStepInfo> {
    if (this.elapsedSteps === undefined) {
      // Let the wrapped environment raise its own NotInitialized error
      return this.env.step(action);
    }

    const result = this.env.step(action);
    this.elapsedSteps += 1;

    if (this.elapsedSteps >= this.maxEpisodeSteps) {
      return { ...result, truncated: true };
    }
    return result;
  }

  close(): void {
    this.env.close();
  }
}
