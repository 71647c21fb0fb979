/**
 * Environment Configuration Schemas
 *
 * Zod schemas for constructor options (camelCase) and for the
 * router-env.yaml file (snake_case).
 *
 * @module schemas/config
 */

import { z } from 'zod';
import {
  FiniteNumber,
  NonEmptyString,
  NonNegativeNumber,
  PositiveInteger,
  PositiveNumber,
  Seed,
  UnitInterval,
} from './common.js';

/**
 * Service tier
 */
export const ServiceTierSchema = z.object({
  name: NonEmptyString,
  costPerCall: NonNegativeNumber,
  latencyMean: FiniteNumber,
  latencyStd: NonNegativeNumber,
  qualityScore: UnitInterval,
});

/**
 * Ordered tier collection; names must be unique
 */
export const ServiceTierListSchema = z
  .array(ServiceTierSchema)
  .min(1, 'At least one service tier is required')
  .superRefine((tiers, ctx) => {
    const seen = new Set<string>();
    tiers.forEach((tier, index) => {
      if (seen.has(tier.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate tier name '${tier.name}'`,
          path: [index, 'name'],
        });
      }
      seen.add(tier.name);
    });
  });

/**
 * Reward weights (partial: missing fields take defaults)
 */
export const RewardConfigSchema = z.object({
  costWeight: FiniteNumber,
  qualityWeight: FiniteNumber,
  latencyPenalty: FiniteNumber,
  slaThreshold: FiniteNumber,
  qualityMissPenalty: FiniteNumber,
});

/**
 * Traffic generator Beta shapes
 */
export const TrafficParamsSchema = z.object({
  complexityAlpha: PositiveNumber,
  complexityBeta: PositiveNumber,
  lengthAlpha: PositiveNumber,
  lengthBeta: PositiveNumber,
});

/**
 * RouterEnvironment constructor options
 */
export const RouterEnvironmentOptionsSchema = z.object({
  tiers: ServiceTierListSchema.optional(),
  rewardConfig: RewardConfigSchema.partial().optional(),
  episodeLength: PositiveInteger.optional(),
  budget: PositiveNumber.optional(),
  maxQueueDepth: PositiveNumber.optional(),
  seed: Seed.optional(),
  traffic: TrafficParamsSchema.partial().optional(),
});

/**
 * router-env.yaml: tier entry
 */
export const FileServiceTierSchema = z.object({
  name: NonEmptyString,
  cost_per_call: NonNegativeNumber,
  latency_mean: FiniteNumber,
  latency_std: NonNegativeNumber,
  quality_score: UnitInterval,
});

/**
 * router-env.yaml: full file, after environment overrides are merged
 */
export const RouterEnvFileSchema = z.object({
  environment: z.object({
    episode_length: PositiveInteger,
    budget: PositiveNumber,
    max_queue_depth: PositiveNumber,
    seed: Seed.nullable().optional(),
  }),
  reward: z.object({
    cost_weight: FiniteNumber,
    quality_weight: FiniteNumber,
    latency_penalty: FiniteNumber,
    sla_threshold: FiniteNumber,
    quality_miss_penalty: FiniteNumber,
  }),
  traffic: z.object({
    complexity_alpha: PositiveNumber,
    complexity_beta: PositiveNumber,
    length_alpha: PositiveNumber,
    length_beta: PositiveNumber,
  }),
  tiers: z.array(FileServiceTierSchema).min(1, 'At least one service tier is required'),
});

export type RouterEnvFile = z.infer<typeof RouterEnvFileSchema>;
