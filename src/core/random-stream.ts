/**
 * Seeded Random Stream
 *
 * Explicitly owned, single-threaded pseudo-random source. Every sampler in
 * the simulator takes a stream as an argument instead of reaching for
 * ambient global state, so two environments can coexist and a fixed seed
 * reproduces a trajectory exactly.
 *
 * Draw costs (uniform draws consumed per call):
 * - uniform, integer, exponential: 1
 * - normal: 2 (Box-Muller, the spare value is discarded)
 * - gamma, beta: variable (rejection sampling), but fixed for a given state
 *
 * @module core/random-stream
 */

import { randomInt } from 'node:crypto';
import { RouterEnvError } from '../api/errors.js';
import { safeDivide } from '../utils/math-helpers.js';

const UINT32_RANGE = 0x1_0000_0000;

/**
 * Seeds map one-to-one onto the 32-bit generator state
 */
function seedToState(seed: number): number {
  if (!Number.isInteger(seed) || seed < 0 || seed >= UINT32_RANGE) {
    throw new RouterEnvError(
      'InvalidArgument',
      `Invalid seed: ${seed} (expected an integer in [0, 2^32))`,
      { seed }
    );
  }

  return seed >>> 0;
}

/**
 * Mulberry32-based random stream with the distributions the simulator needs
 */
export class RandomStream {
  public readonly seed: number;
  private state: number;
  private draws = 0;

  constructor(seed: number) {
    this.state = seedToState(seed);
    this.seed = seed;
  }

  /**
   * Number of uniform draws consumed so far
   */
  get drawCount(): number {
    return this.draws;
  }

  /**
   * Next uniform value in [0, 1)
   */
  next(): number {
    this.draws++;
    this.state = (this.state + 0x6d2b79f5) | 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / UINT32_RANGE;
  }

  /**
   * Uniform value in [low, high)
   */
  uniform(low = 0, high = 1): number {
    return low + (high - low) * this.next();
  }

  /**
   * Uniform integer in [0, maxExclusive)
   */
  integer(maxExclusive: number): number {
    return Math.floor(this.next() * maxExclusive);
  }

  /**
   * Normal draw via Box-Muller
   */
  normal(mean = 0, std = 1): number {
    // 1 - next() lies in (0, 1], keeping the logarithm finite
    const u1 = 1 - this.next();
    const u2 = this.next();
    const z = Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
    return mean + std * z;
  }

  /**
   * Exponential draw with the given mean
   */
  exponential(mean = 1): number {
    return -mean * Math.log(1 - this.next());
  }

  /**
   * Gamma(shape, 1) draw (Marsaglia-Tsang)
   */
  gamma(shape: number): number {
    if (shape < 1) {
      // Boost: Gamma(a) = Gamma(a + 1) * U^(1/a)
      const boosted = this.gamma(shape + 1);
      return boosted * Math.pow(this.next(), 1 / shape);
    }

    const d = shape - 1 / 3;
    const c = 1 / Math.sqrt(9 * d);

    for (;;) {
      let x: number;
      let v: number;
      do {
        x = this.normal();
        v = 1 + c * x;
      } while (v <= 0);

      v = v * v * v;
      const u = this.next();

      if (u < 1 - 0.0331 * x ** 4) {
        return d * v;
      }
      if (Math.log(u) < 0.5 * x * x + d * (1 - v + Math.log(v))) {
        return d * v;
      }
    }
  }

  /**
   * Beta(alpha, beta) draw, from two gamma draws (alpha first)
   */
  beta(alpha: number, beta: number): number {
    const x = this.gamma(alpha);
    const y = this.gamma(beta);
    return safeDivide(x, x + y, 0.5);
  }
}

/**
 * Create a stream; an omitted seed is drawn from the OS entropy source
 */
export function createRandomStream(seed?: number): RandomStream {
  return new RandomStream(seed ?? randomInt(UINT32_RANGE));
}
