import { describe, it, expect, beforeAll, afterAll, afterEach, vi } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import * as yaml from 'js-yaml';
import {
  defaultConfigPath,
  findPackageRoot,
  loadConfig,
  loadEnvironmentOptions,
  toEnvironmentOptions,
} from '@/config/loader.js';
import { RouterEnvironment } from '@/core/router-environment.js';
import { DEFAULT_REWARD_CONFIG, DEFAULT_SERVICE_TIERS, DEFAULT_TRAFFIC_PARAMS } from '@/config/defaults.js';
import { RouterEnvError, isRouterEnvError, type RouterEnvErrorCode } from '@/api/errors.js';

const minimalConfig = {
  environment: { episode_length: 200, budget: 4, max_queue_depth: 20 },
  reward: {
    cost_weight: 1,
    quality_weight: 0.5,
    latency_penalty: 2,
    sla_threshold: 1,
    quality_miss_penalty: 0,
  },
  traffic: { complexity_alpha: 2, complexity_beta: 5, length_alpha: 2, length_beta: 3 },
  tiers: [
    { name: 'fast', cost_per_call: 0.001, latency_mean: 0.3, latency_std: 0.1, quality_score: 0.7 },
    { name: 'smart', cost_per_call: 0.02, latency_mean: 1.5, latency_std: 0.3, quality_score: 0.93 },
  ],
};

function catchError(fn: () => unknown): RouterEnvError | undefined {
  try {
    fn();
  } catch (error) {
    if (error instanceof RouterEnvError) {
      return error;
    }
    throw error;
  }
  return undefined;
}

function expectCode(fn: () => unknown, code: RouterEnvErrorCode): RouterEnvError | undefined {
  const error = catchError(fn);
  expect(isRouterEnvError(error, code)).toBe(true);
  return error;
}

describe('Config Loader', () => {
  let testConfigDir: string;

  const writeConfig = (name: string, contents: string): string => {
    const path = join(testConfigDir, name);
    writeFileSync(path, contents, 'utf8');
    return path;
  };

  beforeAll(() => {
    testConfigDir = mkdtempSync(join(tmpdir(), 'router-env-config-'));
  });

  afterAll(() => {
    rmSync(testConfigDir, { recursive: true, force: true });
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  describe('bundled config', () => {
    it('should locate config/router-env.yaml under the package root', () => {
      expect(defaultConfigPath()).toBe(join(findPackageRoot(), 'config', 'router-env.yaml'));
    });

    it('should mirror the built-in defaults in development', () => {
      const options = loadEnvironmentOptions(undefined, 'development');

      expect(options.episodeLength).toBe(1000);
      expect(options.budget).toBe(10);
      expect(options.maxQueueDepth).toBe(50);
      expect(options.seed).toBeUndefined();
      expect(options.rewardConfig).toEqual(DEFAULT_REWARD_CONFIG);
      expect(options.traffic).toEqual(DEFAULT_TRAFFIC_PARAMS);
      expect(options.tiers).toEqual(DEFAULT_SERVICE_TIERS);
    });

    it('should apply the test overrides', () => {
      const config = loadConfig(undefined, 'test');
      expect(config.environment.episode_length).toBe(100);
      expect(config.environment.seed).toBe(42);
      expect(config.environment.budget).toBe(10);
    });

    it('should build a working environment', () => {
      const env = new RouterEnvironment(loadEnvironmentOptions(undefined, 'test'));
      expect(env.episodeLength).toBe(100);
      expect(env.observationSpace.size).toBe(10);
      expect(env.reset().observation).toEqual(new RouterEnvironment().reset(42).observation);
    });
  });

  describe('custom files', () => {
    it('should convert snake_case settings to options', () => {
      const path = writeConfig('minimal.yaml', yaml.dump(minimalConfig));

      expect(loadEnvironmentOptions(path, 'development')).toEqual({
        episodeLength: 200,
        budget: 4,
        maxQueueDepth: 20,
        seed: undefined,
        rewardConfig: {
          costWeight: 1,
          qualityWeight: 0.5,
          latencyPenalty: 2,
          slaThreshold: 1,
          qualityMissPenalty: 0,
        },
        traffic: { complexityAlpha: 2, complexityBeta: 5, lengthAlpha: 2, lengthBeta: 3 },
        tiers: [
          { name: 'fast', costPerCall: 0.001, latencyMean: 0.3, latencyStd: 0.1, qualityScore: 0.7 },
          { name: 'smart', costPerCall: 0.02, latencyMean: 1.5, latencyStd: 0.3, qualityScore: 0.93 },
        ],
      });
    });

    it('should pick the override section from NODE_ENV', () => {
      const path = writeConfig(
        'by-env.yaml',
        yaml.dump({
          ...minimalConfig,
          environments: {
            production: { environment: { budget: 100 } },
            test: { environment: { budget: 1 } },
          },
        })
      );

      vi.stubEnv('NODE_ENV', 'production');
      expect(loadConfig(path).environment.budget).toBe(100);

      vi.stubEnv('NODE_ENV', 'staging');
      expect(loadConfig(path).environment.budget).toBe(4);
    });

    it('should merge overrides without dropping sibling keys', () => {
      const path = writeConfig(
        'merge.yaml',
        yaml.dump({ ...minimalConfig, environments: { test: { reward: { cost_weight: 3 } } } })
      );
      const config = loadConfig(path, 'test');
      expect(config.reward.cost_weight).toBe(3);
      expect(config.reward.quality_weight).toBe(0.5);
    });

    it('should replace the tier list from an override', () => {
      const path = writeConfig(
        'tiers.yaml',
        yaml.dump({ ...minimalConfig, environments: { test: { tiers: [minimalConfig.tiers[1]] } } })
      );
      expect(toEnvironmentOptions(loadConfig(path, 'test')).tiers?.map((tier) => tier.name)).toEqual([
        'smart',
      ]);
    });
  });

  describe('errors', () => {
    it('should raise ConfigNotFound for a missing file', () => {
      const error = expectCode(() => loadConfig(join(testConfigDir, 'absent.yaml')), 'ConfigNotFound');
      expect(error?.message).toBe(`Configuration file not found: ${join(testConfigDir, 'absent.yaml')}`);
    });

    it('should raise InvalidConfig for malformed YAML', () => {
      const path = writeConfig('broken.yaml', 'environment: [unclosed\n');
      const error = expectCode(() => loadConfig(path), 'InvalidConfig');
      expect(error?.message).toMatch(/^Failed to parse configuration: /);
    });

    it('should raise InvalidConfig when the root is not a mapping', () => {
      const path = writeConfig('list.yaml', '- a\n- b\n');
      const error = expectCode(() => loadConfig(path), 'InvalidConfig');
      expect(error?.message).toBe('Configuration root must be a mapping');
    });

    it('should name the failing field', () => {
      const path = writeConfig(
        'negative.yaml',
        yaml.dump({ ...minimalConfig, environment: { ...minimalConfig.environment, budget: -1 } })
      );
      const error = expectCode(() => loadConfig(path, 'development'), 'InvalidConfig');
      expect(error?.message).toBe("Validation error on field 'environment.budget': Must be positive");
    });

    it('should reject a file without tiers', () => {
      const withoutTiers = {
        environment: minimalConfig.environment,
        reward: minimalConfig.reward,
        traffic: minimalConfig.traffic,
      };
      const path = writeConfig('no-tiers.yaml', yaml.dump(withoutTiers));
      const error = expectCode(() => loadConfig(path, 'development'), 'InvalidConfig');
      expect(error?.message).toBe("Validation error on field 'tiers': Required");
    });
  });
});
