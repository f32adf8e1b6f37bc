/**
 * Configuration loading and management
 */

import type { Logger } from '@riskband/logger';
import { configSchema, envMapping, stringConfigPaths, type Config } from './schema.js';
import { CommandError, CommandErrorCode } from '../commands/errors.js';

type RawConfig = { [key: string]: unknown };

/**
 * Load configuration from environment variables and defaults.
 *
 * @throws {CommandError} CONFIG_ERROR when a value fails validation
 *
 * @example
 * ```typescript
 * const config = loadConfig({ LOG_LEVEL: 'debug', TABLE_ROWS: '20' });
 * ```
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, logger?: Logger): Config {
  const rawConfig: RawConfig = {};

  for (const [envKey, configPath] of Object.entries(envMapping)) {
    const value = env[envKey];
    if (value !== undefined && value !== '') {
      const parsed = stringConfigPaths.has(configPath) ? value : parseEnvValue(value);
      setNestedProperty(rawConfig, configPath, parsed);
    }
  }

  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    const errors = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new CommandError(
      CommandErrorCode.CONFIG_ERROR,
      `Configuration validation failed:\n${errors.join('\n')}`,
      { issues: errors.length }
    );
  }

  logger?.debug('Configuration loaded', getConfigSummary(result.data));

  return result.data;
}

function isRawConfig(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Set nested property in object
 */
function setNestedProperty(obj: RawConfig, path: string, value: unknown): void {
  const keys = path.split('.');
  const lastKey = keys.pop();
  if (!lastKey) return;

  let current = obj;
  for (const key of keys) {
    const next = current[key];
    if (isRawConfig(next)) {
      current = next;
    } else {
      const created: RawConfig = {};
      current[key] = created;
      current = created;
    }
  }

  current[lastKey] = value;
}

/**
 * Parse environment variable value to appropriate type
 */
export function parseEnvValue(value: string): string | number | boolean {
  if (value === 'true') return true;
  if (value === 'false') return false;

  const num = Number(value);
  if (!Number.isNaN(num) && value.trim() !== '') return num;

  return value;
}

/**
 * Get configuration summary for logging
 */
export function getConfigSummary(config: Config): Record<string, unknown> {
  return {
    provider: config.provider.type,
    fixturePath: config.provider.fixturePath,
    cache: config.cache.enabled ? `memory (ttl ${config.cache.defaultTTL}ms)` : 'disabled',
    output: {
      dir: config.output.dir,
      csv: config.output.csv,
      rows: config.output.rows,
    },
    lookbackYears: config.lookback.years,
    logging: {
      level: config.logging.level,
      format: config.logging.format,
    },
  };
}

export type { Config } from './schema.js';
export { configSchema, envMapping, stringConfigPaths } from './schema.js';
