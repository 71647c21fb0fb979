/**
 * Logger Helpers
 *
 * Per-step logging happens thousands of times per episode, so context
 * objects are only built when the level is enabled.
 */

import { pino, type Logger } from 'pino';
import { LOGGING } from '../config/defaults.js';

type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';
type LogContext = Record<string, unknown>;
type ContextBuilder = () => LogContext;

/**
 * Resolve the default pino level (ROUTER_SIM_LOG_LEVEL or 'info')
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): string {
  return env[LOGGING.LEVEL_ENV_VAR] ?? LOGGING.DEFAULT_LEVEL;
}

/**
 * Create the default logger used when no logger is injected
 */
export function createDefaultLogger(name: string): Logger {
  return pino({ name, level: resolveLogLevel() });
}

/**
 * Lazy log helper that only evaluates context when log level is enabled
 *
 * @example
 * // Context only created if debug is enabled
 * lazyLog(logger, 'debug', () => ({ action, reward }), 'Step completed');
 */
export function lazyLog(
  logger: Logger | undefined,
  level: LogLevel,
  contextBuilder: ContextBuilder,
  message: string
): void {
  if (!logger || !logger.isLevelEnabled(level)) {
    return;
  }

  logger[level](contextBuilder(), message);
}
