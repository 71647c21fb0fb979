/**
 * Environment Registry
 *
 * Builds environments by string id so generic training and evaluation
 * code can construct them without importing a concrete class. Registration
 * is explicit: nothing is registered as a side effect of importing a module.
 *
 * @example
 * ```typescript
 * const registry = createDefaultRegistry();
 * const env = registry.make('LLMRouter-v0', { episodeLength: 50 });
 * const { observation } = env.reset(0);
 * ```
 */

import type { Logger } from 'pino';
import { RouterEnvError } from '../api/errors.js';
import { REGISTRY } from '../config/defaults.js';
import { RouterEnvironment } from '../core/router-environment.js';
import { TimeLimit } from '../core/time-limit.js';
import type {
  RouterEnvironmentDependencies,
  RouterEnvironmentOptions,
  RoutingEnvironment,
} from '../types/environment.js';
import { mergeDefined } from '../utils/object-helpers.js';

/**
 * Builds an unwrapped environment from options
 */
export type EnvironmentFactory = (
  options: RouterEnvironmentOptions,
  dependencies: RouterEnvironmentDependencies
) => RoutingEnvironment;

/**
 * Registration entry
 */
export interface EnvironmentSpec {
  factory: EnvironmentFactory;

  /** Wrap built environments in a TimeLimit with this many steps */
  maxEpisodeSteps?: number;

  /** Options applied under the caller's options */
  defaultOptions?: RouterEnvironmentOptions;
}

/**
 * Per-call overrides for `make`
 */
export interface MakeOptions {
  /** Replace the registered time limit; `null` disables it */
  maxEpisodeSteps?: number | null;
  logger?: Logger;
}

export class EnvironmentRegistry {
  private readonly specs = new Map<string, EnvironmentSpec>();

  /**
   * @throws {RouterEnvError} DuplicateEnvironment when the id is taken
   */
  register(id: string, spec: EnvironmentSpec): void {
    if (this.specs.has(id)) {
      throw new RouterEnvError('DuplicateEnvironment', `Environment '${id}' is already registered`, {
        id,
      });
    }
    this.specs.set(id, spec);
  }

  unregister(id: string): boolean {
    return this.specs.delete(id);
  }

  has(id: string): boolean {
    return this.specs.has(id);
  }

  /**
   * Registered ids in registration order
   */
  list(): string[] {
    return Array.from(this.specs.keys());
  }

  spec(id: string): EnvironmentSpec | undefined {
    return this.specs.get(id);
  }

  /**
   * Build a registered environment
   *
   * @throws {RouterEnvError} UnknownEnvironment for an unregistered id
   */
  make(
    id: string,
    options: RouterEnvironmentOptions = {},
    makeOptions: MakeOptions = {}
  ): RoutingEnvironment {
    const spec = this.specs.get(id);
    if (!spec) {
      throw new RouterEnvError('UnknownEnvironment', `No environment registered as '${id}'`, {
        id,
        registered: this.list(),
      });
    }

    const merged = mergeDefined<RouterEnvironmentOptions>(spec.defaultOptions ?? {}, options);
    const env = spec.factory(merged, { logger: makeOptions.logger });

    const maxEpisodeSteps =
      makeOptions.maxEpisodeSteps === undefined ? spec.maxEpisodeSteps : makeOptions.maxEpisodeSteps;

    if (maxEpisodeSteps === undefined || maxEpisodeSteps === null) {
      return env;
    }
    return new TimeLimit(env, maxEpisodeSteps);
  }
}

/**
 * Register the built-in routing environment
 */
export function registerBuiltinEnvironments(registry: EnvironmentRegistry): void {
  registry.register(REGISTRY.ROUTER_ENV_ID, {
    factory: (options, dependencies) => new RouterEnvironment(options, dependencies),
    maxEpisodeSteps: REGISTRY.MAX_EPISODE_STEPS,
  });
}

/**
 * Registry holding the built-in environments
 */
export function createDefaultRegistry(): EnvironmentRegistry {
  const registry = new EnvironmentRegistry();
  registerBuiltinEnvironments(registry);
  return registry;
}
