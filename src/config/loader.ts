/**
 * Configuration Loader
 *
 * Loads environment settings from YAML files with environment-specific overrides
 */

import { existsSync, readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import * as yaml from 'js-yaml';
import { RouterEnvError, zodErrorToRouterEnvError } from '../api/errors.js';
import type { RouterEnvironmentOptions } from '../types/environment.js';
import { RouterEnvFileSchema, type RouterEnvFile } from '../types/schemas/config.js';
import { deepMerge, isPlainObject } from '../utils/object-helpers.js';

export type ConfigEnvironment = 'production' | 'development' | 'test';

/**
 * Find the package root directory by looking for package.json
 */
export function findPackageRoot(): string {
  let currentDir = dirname(fileURLToPath(import.meta.url));

  while (currentDir !== dirname(currentDir)) {
    if (existsSync(join(currentDir, 'package.json'))) {
      return currentDir;
    }
    currentDir = dirname(currentDir);
  }

  return process.cwd();
}

/**
 * Path of the bundled config/router-env.yaml
 */
export function defaultConfigPath(): string {
  return join(findPackageRoot(), 'config', 'router-env.yaml');
}

function resolveEnvironment(environment?: ConfigEnvironment): ConfigEnvironment {
  const env = environment ?? process.env.NODE_ENV;
  return env === 'production' || env === 'test' ? env : 'development';
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

function readConfigFile(path: string): unknown {
  let contents: string;
  try {
    contents = readFileSync(path, 'utf8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      throw new RouterEnvError('ConfigNotFound', `Configuration file not found: ${path}`, { path });
    }
    throw error;
  }

  try {
    return yaml.load(contents);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new RouterEnvError('InvalidConfig', `Failed to parse configuration: ${reason}`, { path });
  }
}

/**
 * Load and validate a router-env YAML file
 *
 * The `environments.<env>` section, chosen by `environment` or NODE_ENV,
 * is merged over the base settings before validation.
 *
 * @throws {RouterEnvError} ConfigNotFound when the file is missing,
 *   InvalidConfig when it does not parse or fails validation
 */
export function loadConfig(configPath?: string, environment?: ConfigEnvironment): RouterEnvFile {
  const finalPath = configPath ?? defaultConfigPath();
  const raw = readConfigFile(finalPath);

  if (!isPlainObject(raw)) {
    throw new RouterEnvError('InvalidConfig', 'Configuration root must be a mapping', {
      path: finalPath,
    });
  }

  const { environments, ...base } = raw;
  let merged: Record<string, unknown> = base;

  if (isPlainObject(environments)) {
    const overrides = environments[resolveEnvironment(environment)];
    if (isPlainObject(overrides)) {
      merged = deepMerge<Record<string, unknown>>(base, overrides);
    }
  }

  const parsed = RouterEnvFileSchema.safeParse(merged);
  if (!parsed.success) {
    throw zodErrorToRouterEnvError(parsed.error);
  }
  return parsed.data;
}

/**
 * Convert YAML settings (snake_case) to construction options (camelCase)
 */
export function toEnvironmentOptions(config: RouterEnvFile): RouterEnvironmentOptions {
  return {
    episodeLength: config.environment.episode_length,
    budget: config.environment.budget,
    maxQueueDepth: config.environment.max_queue_depth,
    seed: config.environment.seed ?? undefined,
    rewardConfig: {
      costWeight: config.reward.cost_weight,
      qualityWeight: config.reward.quality_weight,
      latencyPenalty: config.reward.latency_penalty,
      slaThreshold: config.reward.sla_threshold,
      qualityMissPenalty: config.reward.quality_miss_penalty,
    },
    traffic: {
      complexityAlpha: config.traffic.complexity_alpha,
      complexityBeta: config.traffic.complexity_beta,
      lengthAlpha: config.traffic.length_alpha,
      lengthBeta: config.traffic.length_beta,
    },
    tiers: config.tiers.map((tier) => ({
      name: tier.name,
      costPerCall: tier.cost_per_call,
      latencyMean: tier.latency_mean,
      latencyStd: tier.latency_std,
      qualityScore: tier.quality_score,
    })),
  };
}

/**
 * Load a YAML file straight into RouterEnvironment options
 */
export function loadEnvironmentOptions(
  configPath?: string,
  environment?: ConfigEnvironment
): RouterEnvironmentOptions {
  return toEnvironmentOptions(loadConfig(configPath, environment));
}
