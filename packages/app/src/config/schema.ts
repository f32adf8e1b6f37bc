/**
 * Configuration schema using Zod
 */

import { z } from 'zod';

/**
 * Application configuration schema
 */
export const configSchema = z.object({
  logging: z
    .object({
      level: z.enum(['error', 'warn', 'info', 'debug']).default('warn'),
      format: z.enum(['json', 'pretty']).default('pretty'),
      filePath: z.string().optional(),
    })
    .default({}),

  provider: z
    .object({
      type: z.enum(['yahoo', 'fixture']).default('yahoo'),
      fixturePath: z.string().optional(),
      baseUrl: z.string().url().optional(),
      timeout: z.number().int().positive().default(10000),
    })
    .default({}),

  cache: z
    .object({
      enabled: z.boolean().default(true),
      defaultTTL: z.number().int().nonnegative().default(3600000), // 1 hour
    })
    .default({}),

  output: z
    .object({
      dir: z.string().default('.'),
      csv: z.boolean().default(true),
      rows: z.number().int().min(10).max(200).default(60),
    })
    .default({}),

  lookback: z
    .object({
      years: z.number().int().min(1).max(15).default(2),
    })
    .default({}),
});

/**
 * Inferred configuration type
 */
export type Config = z.infer<typeof configSchema>;

/**
 * Environment variable mapping
 */
export const envMapping: Readonly<Record<string, string>> = {
  LOG_LEVEL: 'logging.level',
  LOG_FORMAT: 'logging.format',
  LOG_FILE: 'logging.filePath',
  PROVIDER_TYPE: 'provider.type',
  FIXTURE_PATH: 'provider.fixturePath',
  PROVIDER_BASE_URL: 'provider.baseUrl',
  PROVIDER_TIMEOUT: 'provider.timeout',
  CACHE_ENABLED: 'cache.enabled',
  CACHE_TTL: 'cache.defaultTTL',
  OUTPUT_DIR: 'output.dir',
  WRITE_CSV: 'output.csv',
  TABLE_ROWS: 'output.rows',
  LOOKBACK_YEARS: 'lookback.years',
};

/**
 * Config paths whose environment values stay strings, even when they look
 * like numbers or booleans (`OUTPUT_DIR=2024`).
 */
export const stringConfigPaths: ReadonlySet<string> = new Set([
  'logging.filePath',
  'provider.fixturePath',
  'provider.baseUrl',
  'output.dir',
]);
