/**
 * Environment error utilities.
 *
 * Provides a consistent error type for every public surface of the
 * simulator. All contract violations fail fast and synchronously; none of
 * them are retried.
 */

import type { ZodError } from 'zod';

/**
 * Error codes surfaced to callers.
 */
export type RouterEnvErrorCode =
  | 'NotInitialized'
  | 'InvalidAction'
  | 'EpisodeTerminated'
  | 'InvalidArgument'
  | 'InvalidConfig'
  | 'ConfigNotFound'
  | 'UnknownEnvironment'
  | 'DuplicateEnvironment';

/**
 * Plain-object shape of an error (for JSON output and logs).
 */
export interface RouterEnvErrorShape {
  code: RouterEnvErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * Error raised by the environment, its wrappers and the registry.
 */
export class RouterEnvError extends Error implements RouterEnvErrorShape {
  public readonly code: RouterEnvErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(
    code: RouterEnvErrorCode,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'RouterEnvError';
    this.code = code;
    this.details = details;
  }

  /**
   * Serialize error into plain shape.
   */
  public toObject(): RouterEnvErrorShape {
    return {
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Type guard for a specific error code.
 */
export function isRouterEnvError(
  error: unknown,
  code?: RouterEnvErrorCode
): error is RouterEnvError {
  return error instanceof RouterEnvError && (code === undefined || error.code === code);
}

/**
 * Step was called before the first reset.
 */
export function createNotInitializedError(): RouterEnvError {
  return new RouterEnvError('NotInitialized', 'Call reset() before step()');
}

/**
 * Action is not a tier index in [0, tierCount).
 */
export function createInvalidActionError(action: unknown, tierCount: number): RouterEnvError {
  return new RouterEnvError(
    'InvalidAction',
    `Invalid action: ${String(action)} (expected an integer in [0, ${tierCount}))`,
    { action, tierCount }
  );
}

/**
 * Convert a Zod validation error to a RouterEnvError.
 *
 * Reports the first failing field; every issue is kept under `details.issues`.
 *
 * @example
 * ```typescript
 * const result = ServiceTierListSchema.safeParse([]);
 * if (!result.success) {
 *   throw zodErrorToRouterEnvError(result.error);
 * }
 * // Throws: "Validation error on field 'root': At least one service tier is required"
 * ```
 */
export function zodErrorToRouterEnvError(
  error: ZodError,
  code: RouterEnvErrorCode = 'InvalidConfig'
): RouterEnvError {
  const firstIssue = error.issues[0];
  const field = firstIssue && firstIssue.path.length > 0 ? firstIssue.path.join('.') : 'root';
  const message = `Validation error on field '${field}': ${firstIssue?.message ?? 'invalid value'}`;

  return new RouterEnvError(code, message, {
    field,
    issues: error.issues.map((issue) => ({
      path: issue.path,
      message: issue.message,
      code: issue.code,
    })),
  });
}
