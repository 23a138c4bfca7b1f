/**
 * @module @plugin-host/plugin-runtime/logging
 * Structured logging for the plugin host
 */

import { pino, type Logger, type LevelWithSilent } from 'pino';

export type { Logger, LevelWithSilent };

export const LOG_LEVELS: readonly LevelWithSilent[] = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
];

export function isLogLevel(value: unknown): value is LevelWithSilent {
  return typeof value === 'string' && LOG_LEVELS.some((level) => level === value);
}

let rootLogger: Logger | undefined;

function getRootLogger(): Logger {
  if (!rootLogger) {
    const fromEnv = process.env.PLUGIN_HOST_LOG_LEVEL;
    rootLogger = pino({
      name: 'plugin-host',
      level: isLogLevel(fromEnv) ? fromEnv : 'info',
    });
  }
  return rootLogger;
}

/**
 * Get a logger for a host component.
 *
 * @example
 * ```typescript
 * const logger = getLogger('catalog').child({ plugin: description.name });
 * logger.warn({ err }, 'Plugin failed to start');
 * ```
 */
export function getLogger(category: string, options: { level?: LevelWithSilent } = {}): Logger {
  return getRootLogger().child({ category }, options.level ? { level: options.level } : undefined);
}
