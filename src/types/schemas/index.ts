/**
 * Zod schema exports for inference-router-sim validation
 *
 * @example
 * ```typescript
 * import { ServiceTierListSchema } from 'inference-router-sim/schemas';
 *
 * const result = ServiceTierListSchema.safeParse(tiers);
 * if (!result.success) {
 *   console.error(result.error.issues);
 * }
 * ```
 */

// Common primitives
export * from './common.js';

// Config schemas
export * from './config.js';
