import { describe, it, expect } from 'vitest';
import {
  clamp,
  populationVariance,
  safeAverage,
  safeDivide,
  safeSum,
  standardDeviation,
  wrapUnit,
} from '@/utils/math-helpers.js';

describe('Math Helpers', () => {
  describe('clamp', () => {
    it('should leave in-range values alone', () => {
      expect(clamp(0.4, 0, 1)).toBe(0.4);
    });

    it('should clip to the bounds', () => {
      expect(clamp(1.2, 0, 1)).toBe(1);
      expect(clamp(-0.1, 0, 1)).toBe(0);
    });

    it('should pass NaN through', () => {
      expect(clamp(Number.NaN, 0, 1)).toBeNaN();
    });
  });

  describe('wrapUnit', () => {
    it('should wrap into [0, 1)', () => {
      expect(wrapUnit(1.25)).toBe(0.25);
      expect(wrapUnit(-0.25)).toBe(0.75);
      expect(wrapUnit(1)).toBe(0);
      expect(wrapUnit(0.5)).toBe(0.5);
    });

    it('should never return 1 for tiny negative inputs', () => {
      expect(wrapUnit(-1e-20)).toBe(0);
    });
  });

  describe('safeAverage', () => {
    it('should return 0 for empty array', () => {
      expect(safeAverage([])).toBe(0);
    });

    it('should return custom default for empty array', () => {
      expect(safeAverage([], 100)).toBe(100);
    });

    it('should calculate correct average for array with values', () => {
      expect(safeAverage([1, 2, 3])).toBe(2);
      expect(safeAverage([-10, 10])).toBe(0);
    });
  });

  describe('safeDivide', () => {
    it('should return 0 for division by zero', () => {
      expect(safeDivide(10, 0)).toBe(0);
    });

    it('should return custom default for division by zero', () => {
      expect(safeDivide(10, 0, 100)).toBe(100);
    });

    it('should divide normally otherwise', () => {
      expect(safeDivide(10, 4)).toBe(2.5);
    });
  });

  describe('safeSum', () => {
    it('should sum values or return the default', () => {
      expect(safeSum([1, 2, 3.5])).toBe(6.5);
      expect(safeSum([], 7)).toBe(7);
    });
  });

  describe('populationVariance', () => {
    it('should divide by the sample size', () => {
      expect(populationVariance([2, 4, 4, 4, 5, 5, 7, 9])).toBe(4);
      expect(populationVariance([1, 3])).toBe(1);
    });

    it('should return 0 for fewer than two values', () => {
      expect(populationVariance([])).toBe(0);
      expect(populationVariance([5])).toBe(0);
    });
  });

  describe('standardDeviation', () => {
    it('should compute the population standard deviation', () => {
      expect(standardDeviation([2, 4, 4, 4, 5, 5, 7, 9])).toBe(2);
    });

    it('should return 0 for fewer than two values', () => {
      expect(standardDeviation([])).toBe(0);
      expect(standardDeviation([3])).toBe(0);
    });
  });
});
