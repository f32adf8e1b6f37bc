/**
 * @fileoverview Public API of the risk-range application
 * @module @riskband/app
 */

export { run, VERSION, type RunDependencies } from './start.js';
export { buildProgram, intInRange, numberInRange, type CliOptions } from './cli/options.js';
export { loadConfig, getConfigSummary, parseEnvValue, configSchema, envMapping, stringConfigPaths, type Config } from './config/index.js';
export {
  CommandError,
  CommandErrorCode,
  ERROR_MESSAGES,
  formatCommandError,
  wrapError,
} from './commands/errors.js';
export type { Command, CommandResult } from './commands/types.js';
export {
  RiskRangeCommand,
  parseTickers,
  type RiskRangeCommandConfig,
  type RiskRangeCommandOptions,
  type RiskRangeReport,
  type TickerOutcome,
  type TickerSuccess,
  type TickerFailure,
} from './commands/risk-range.command.js';
export { RiskRangeFormatter, METHOD_CAPTION, type OutputFormat } from './formatters/risk-range-formatter.js';
export { formatCsv, formatCsvNumber, csvFileName } from './formatters/csv.js';
export { MemoryCache, type MemoryCacheConfig } from './services/cache/memory-cache.js';
export type { CacheService, CacheStats } from './services/cache/types.js';
export { SeriesLoader, type SeriesLoaderConfig } from './services/series-loader.js';
