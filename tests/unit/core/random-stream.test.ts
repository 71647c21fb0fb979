import { describe, it, expect } from 'vitest';
import { RandomStream, createRandomStream } from '@/core/random-stream.js';
import { isRouterEnvError } from '@/api/errors.js';

function draws(stream: RandomStream, count: number, sample: (s: RandomStream) => number): number[] {
  return Array.from({ length: count }, () => sample(stream));
}

function mean(values: number[]): number {
  return values.reduce((acc, value) => acc + value, 0) / values.length;
}

describe('RandomStream', () => {
  describe('seeding', () => {
    it('should reproduce the same sequence for the same seed', () => {
      const a = new RandomStream(42);
      const b = new RandomStream(42);
      expect(draws(a, 20, (s) => s.next())).toEqual(draws(b, 20, (s) => s.next()));
    });

    it('should produce different sequences for different seeds', () => {
      const a = draws(new RandomStream(1), 5, (s) => s.next());
      const b = draws(new RandomStream(2), 5, (s) => s.next());
      expect(a).not.toEqual(b);
    });

    it('should accept the largest 32-bit seed', () => {
      const stream = new RandomStream(2 ** 32 - 1);
      expect(stream.seed).toBe(2 ** 32 - 1);
      expect(stream.next()).toBeGreaterThanOrEqual(0);
    });

    it('should not alias seeds that share their low 32 bits', () => {
      expect(() => new RandomStream(2 ** 32 + 1)).toThrow(/Invalid seed/);
      expect(new RandomStream(1).next()).not.toBe(new RandomStream(0).next());
    });

    it.each([-1, 1.5, Number.NaN, 2 ** 32, Number.MAX_SAFE_INTEGER])(
      'should reject seed %s with InvalidArgument',
      (seed) => {
        let caught: unknown;
        try {
          new RandomStream(seed);
        } catch (error) {
          caught = error;
        }
        expect(isRouterEnvError(caught, 'InvalidArgument')).toBe(true);
      }
    );

    it('should draw a seed when none is given', () => {
      const stream = createRandomStream();
      expect(Number.isInteger(stream.seed)).toBe(true);
      expect(stream.seed).toBeGreaterThanOrEqual(0);
      expect(stream.seed).toBeLessThan(2 ** 32);
    });

    it('should use the given seed in createRandomStream', () => {
      expect(createRandomStream(9).next()).toBe(new RandomStream(9).next());
    });
  });

  describe('draw accounting', () => {
    it('should count one draw for uniform, integer and exponential', () => {
      const stream = new RandomStream(3);
      stream.uniform(0, 1);
      stream.integer(5);
      stream.exponential(2);
      expect(stream.drawCount).toBe(3);
    });

    it('should count two draws per normal', () => {
      const stream = new RandomStream(3);
      stream.normal(0, 1);
      stream.normal(5, 2);
      expect(stream.drawCount).toBe(4);
    });
  });

  describe('distributions', () => {
    it('should keep next() in [0, 1)', () => {
      for (const value of draws(new RandomStream(11), 2000, (s) => s.next())) {
        expect(value).toBeGreaterThanOrEqual(0);
        expect(value).toBeLessThan(1);
      }
    });

    it('should keep uniform draws in [low, high)', () => {
      for (const value of draws(new RandomStream(12), 1000, (s) => s.uniform(0.9, 0.98))) {
        expect(value).toBeGreaterThanOrEqual(0.9);
        expect(value).toBeLessThan(0.98);
      }
    });

    it('should return integers in [0, max)', () => {
      const values = draws(new RandomStream(13), 1000, (s) => s.integer(5));
      for (const value of values) {
        expect(Number.isInteger(value)).toBe(true);
        expect(value).toBeGreaterThanOrEqual(0);
        expect(value).toBeLessThan(5);
      }
      expect(new Set(values).size).toBe(5);
    });

    it('should center normal draws on the mean', () => {
      const values = draws(new RandomStream(14), 5000, (s) => s.normal(3, 1));
      expect(mean(values)).toBeGreaterThan(2.9);
      expect(mean(values)).toBeLessThan(3.1);
      expect(values.every(Number.isFinite)).toBe(true);
    });

    it('should return positive exponential draws with the given mean', () => {
      const values = draws(new RandomStream(15), 5000, (s) => s.exponential(2));
      expect(values.every((value) => value >= 0)).toBe(true);
      expect(mean(values)).toBeGreaterThan(1.85);
      expect(mean(values)).toBeLessThan(2.15);
    });

    it('should match the gamma mean for shapes below and above 1', () => {
      const small = draws(new RandomStream(16), 5000, (s) => s.gamma(0.5));
      const large = draws(new RandomStream(17), 5000, (s) => s.gamma(3));
      expect(small.every((value) => value > 0)).toBe(true);
      expect(mean(small)).toBeGreaterThan(0.45);
      expect(mean(small)).toBeLessThan(0.55);
      expect(mean(large)).toBeGreaterThan(2.85);
      expect(mean(large)).toBeLessThan(3.15);
    });

    it('should keep beta draws in [0, 1] around alpha / (alpha + beta)', () => {
      const values = draws(new RandomStream(18), 5000, (s) => s.beta(2, 5));
      for (const value of values) {
        expect(value).toBeGreaterThanOrEqual(0);
        expect(value).toBeLessThanOrEqual(1);
      }
      expect(mean(values)).toBeGreaterThan(2 / 7 - 0.02);
      expect(mean(values)).toBeLessThan(2 / 7 + 0.02);
    });
  });
});
