/**
 * Logging
 *
 * Root pino logger factory plus a lazy helper for per-transition debug logs,
 * so context objects are only built when the level is enabled.
 */

import { pino } from 'pino';
import type { Logger, LevelWithSilent } from 'pino';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

const LOG_LEVELS: readonly LevelWithSilent[] = [
  'trace',
  'debug',
  'info',
  'warn',
  'error',
  'fatal',
  'silent',
];

export interface CreateLoggerOptions {
  /** Overrides FLEET_RESTART_LOG_LEVEL */
  level?: LevelWithSilent;
  /** Bound as `component` on every line */
  component?: string;
}

function resolveLevel(level?: LevelWithSilent): LevelWithSilent {
  if (level) {
    return level;
  }
  const envLevel = process.env.FLEET_RESTART_LOG_LEVEL?.toLowerCase();
  return LOG_LEVELS.find((candidate) => candidate === envLevel) ?? 'info';
}

/**
 * Create the root logger.
 *
 * @example
 * const logger = createLogger({ component: 'cli' });
 * logger.info({ hosts: 6 }, 'Rollout started');
 */
export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const logger = pino({ level: resolveLevel(options.level) });
  return options.component ? logger.child({ component: options.component }) : logger;
}

/**
 * Log with a context object that is only built when `level` is enabled.
 *
 * @example
 * lazyLog(logger, 'debug', () => ({ hostId, from, to }), 'Host transition');
 */
export function lazyLog(
  logger: Logger | undefined,
  level: LogLevel,
  contextBuilder: () => Record<string, unknown>,
  message: string
): void {
  if (!logger || !logger.isLevelEnabled(level)) {
    return;
  }

  logger[level](contextBuilder(), message);
}
