/**
 * Observation and action spaces
 *
 * Shape descriptions a policy can query before the first reset.
 */

import type { RandomStream } from './random-stream.js';

/**
 * Continuous box with the same bounds on every component
 */
export class BoxSpace {
  public readonly shape: readonly number[];

  constructor(
    size: number,
    public readonly low: number,
    public readonly high: number
  ) {
    this.shape = Object.freeze([size]);
  }

  get size(): number {
    return this.shape[0];
  }

  /**
   * True when the vector has the right length and every component is
   * within [low, high]
   */
  contains(value: ArrayLike<number>): boolean {
    if (value.length !== this.size) {
      return false;
    }

    for (let i = 0; i < value.length; i++) {
      const component = value[i];
      if (!(component >= this.low && component <= this.high)) {
        return false;
      }
    }
    return true;
  }
}

/**
 * Discrete set {0, 1, ..., n - 1}
 */
export class DiscreteSpace {
  constructor(public readonly n: number) {}

  contains(value: unknown): value is number {
    return typeof value === 'number' && Number.isInteger(value) && value >= 0 && value < this.n;
  }

  /**
   * Uniform element; the caller owns the stream
   */
  sample(random: RandomStream): number {
    return random.integer(this.n);
  }
}
