/**
 * Common Zod schema primitives for inference-router-sim
 */

import { z } from 'zod';

/**
 * Non-empty string validator
 */
export const NonEmptyString = z.string().min(1, 'Cannot be empty');

/**
 * Finite number validator (rejects NaN and +/-Infinity)
 */
export const FiniteNumber = z.number().finite('Must be finite');

/**
 * Positive integer validator
 */
export const PositiveInteger = z
  .number()
  .int('Must be an integer')
  .positive('Must be a positive integer');

/**
 * Non-negative number validator
 */
export const NonNegativeNumber = FiniteNumber.min(0, 'Must be non-negative');

/**
 * Strictly positive number validator
 */
export const PositiveNumber = FiniteNumber.positive('Must be positive');

/**
 * Closed unit interval [0, 1]
 */
export const UnitInterval = z
  .number()
  .min(0, 'Must be at least 0')
  .max(1, 'Cannot exceed 1');

/**
 * RNG seed: an unsigned 32-bit integer
 */
export const Seed = z
  .number()
  .int('Seed must be an integer')
  .min(0, 'Seed must be non-negative')
  .max(0xffff_ffff, 'Seed must fit in 32 bits');
