/**
 * @module @plugin-host/plugin-catalog/config
 *
 * Catalog configuration: explicit options override environment variables,
 * which override defaults.
 *
 * | Variable                  | Option       | Default                   |
 * |---------------------------|--------------|---------------------------|
 * | `PLUGIN_HOST_PLUGINS_DIR` | `pluginsDir` | `~/.<appName>/plugins`    |
 * | `PLUGIN_HOST_APP_NAME`    | `appName`    | `lapce`                   |
 * | `PLUGIN_HOST_LOG_LEVEL`   | `logLevel`   | `info`                    |
 */

import { homedir } from 'node:os';
import * as path from 'node:path';
import { z } from 'zod';
import { ConfigError } from '@plugin-host/plugin-contracts';
import { LOG_LEVELS, isLogLevel, type LevelWithSilent } from '@plugin-host/plugin-runtime';

export const DEFAULT_APP_NAME = 'lapce';

export interface CatalogConfigOptions {
  pluginsDir?: string;
  appName?: string;
  logLevel?: LevelWithSilent;
}

export interface CatalogConfig {
  /** Absolute plugins root */
  pluginsDir: string;
  /** Names the default plugins root, the guest program and the host import namespace */
  appName: string;
  logLevel: LevelWithSilent;
}

const logLevelSchema = z.string().refine(isLogLevel, {
  message: `must be one of ${LOG_LEVELS.join(', ')}`,
});

const catalogConfigSchema = z.object({
  pluginsDir: z.string().min(1, 'must not be empty').optional(),
  appName: z
    .string()
    .min(1, 'must not be empty')
    .regex(/^[A-Za-z0-9._-]+$/, 'must be a plain name')
    .optional(),
  logLevel: logLevelSchema.optional(),
});

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value.trim();
}

/**
 * Resolve the catalog configuration.
 *
 * @param env - environment to read (default: `process.env`)
 * @param home - home directory for the default plugins root (default: `os.homedir()`)
 * @throws ConfigError when a value is invalid
 */
export function resolveCatalogConfig(
  options: CatalogConfigOptions = {},
  env: NodeJS.ProcessEnv = process.env,
  home: string = homedir()
): CatalogConfig {
  const parsed = catalogConfigSchema.safeParse({
    pluginsDir: options.pluginsDir ?? nonEmpty(env.PLUGIN_HOST_PLUGINS_DIR),
    appName: options.appName ?? nonEmpty(env.PLUGIN_HOST_APP_NAME),
    logLevel: options.logLevel ?? nonEmpty(env.PLUGIN_HOST_LOG_LEVEL),
  });

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid plugin host configuration: ${issues.join('; ')}`, { issues });
  }

  const { pluginsDir, logLevel } = parsed.data;
  const appName = parsed.data.appName ?? DEFAULT_APP_NAME;
  return {
    pluginsDir: path.resolve(pluginsDir ?? path.join(home, `.${appName}`, 'plugins')),
    appName,
    logLevel: isLogLevel(logLevel) ? logLevel : 'info',
  };
}
