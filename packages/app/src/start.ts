/**
 * Application entry: wires configuration, logging, provider, cache and the
 * risk-range command, then prints and exports results.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import type { Writable } from 'node:stream';
import chalk from 'chalk';
import { CommanderError } from 'commander';
import type { DailyBarsProvider, PriceSeries } from '@riskband/contracts';
import {
  attachGlobalHandlers,
  createChildLogger,
  createLogger,
  type Logger,
  type ProcessEvents,
} from '@riskband/logger';
import { YahooProvider } from '@riskband/provider-yahoo';
import { buildProgram, type CliOptions } from './cli/options.js';
import { loadConfig, getConfigSummary, type Config } from './config/index.js';
import { CommandError, CommandErrorCode, formatCommandError, wrapError } from './commands/errors.js';
import {
  parseTickers,
  RiskRangeCommand,
  type RiskRangeCommandOptions,
  type TickerSuccess,
} from './commands/risk-range.command.js';
import { csvFileName, formatCsv } from './formatters/csv.js';
import { RiskRangeFormatter } from './formatters/risk-range-formatter.js';
import { MemoryCache } from './services/cache/memory-cache.js';
import { SeriesLoader } from './services/series-loader.js';

export const VERSION = '0.1.0';

/**
 * External effects of a run. Everything defaults to the real process.
 */
export interface RunDependencies {
  env?: NodeJS.ProcessEnv;
  /** Report output */
  stdout?: (text: string) => void;
  /** Errors and notices */
  stderr?: (text: string) => void;
  /** Log sink; when given, console logging is off */
  logStream?: Writable;
  /** Provider override, bypasses provider configuration */
  provider?: DailyBarsProvider;
  /** Where global error handlers attach; omitted means none */
  processEvents?: ProcessEvents;
}

function createProvider(config: Config, options: CliOptions, logger: Logger): DailyBarsProvider {
  const fixturePath =
    options.fixtures ?? (config.provider.type === 'fixture' ? config.provider.fixturePath : undefined);

  if (config.provider.type === 'fixture' && !fixturePath) {
    throw new CommandError(
      CommandErrorCode.CONFIG_ERROR,
      'PROVIDER_TYPE=fixture requires FIXTURE_PATH or --fixtures'
    );
  }

  return new YahooProvider({
    fixturePath,
    baseUrl: config.provider.baseUrl,
    timeoutMs: config.provider.timeout,
    logger: createChildLogger(logger, { component: 'provider', provider: 'yahoo' }),
  });
}

function toCommandOptions(config: Config, options: CliOptions): RiskRangeCommandOptions {
  return {
    years: options.years ?? config.lookback.years,
    rows: options.rows ?? config.output.rows,
    riskRange: {
      halfLife: options.halfLife,
      atrWindow: options.atrWindow,
      volWindow: options.volWindow,
      vovWindow: options.vovWindow,
      z: options.z,
      wEwma: options.wEwma,
      wGk: options.wGk,
      wAtr: options.wAtr,
      volAdj: options.volAdj,
      vovAdj: options.vovAdj,
      tiltGamma: options.tiltGamma,
    },
  };
}

async function exportCsv(outcome: TickerSuccess, dir: string): Promise<string> {
  await mkdir(dir, { recursive: true });
  const path = join(dir, csvFileName(outcome.ticker));
  await writeFile(path, formatCsv(outcome.result.table), 'utf-8');
  return path;
}

/**
 * Runs the CLI against `argv` (arguments after the script name) and returns
 * the process exit code.
 */
export async function run(argv: string[], deps: RunDependencies = {}): Promise<number> {
  const stdout = deps.stdout ?? ((text: string) => process.stdout.write(text + '\n'));
  const stderr = deps.stderr ?? ((text: string) => process.stderr.write(text + '\n'));

  const program = buildProgram(VERSION)
    .exitOverride()
    .configureOutput({
      writeOut: (text) => stdout(text.trimEnd()),
      writeErr: (text) => stderr(text.trimEnd()),
    });

  try {
    await program.parseAsync(argv, { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }

  const options = program.opts<CliOptions>();
  const [tickerArg = ''] = program.args;

  let config: Config;
  try {
    config = loadConfig(deps.env ?? process.env);
  } catch (error) {
    stderr(chalk.red(formatCommandError(error, options.verbose)));
    return 1;
  }

  const logger = createLogger({
    level: options.verbose ? 'debug' : config.logging.level,
    json: config.logging.format === 'json',
    filePath: config.logging.filePath,
    console: deps.logStream === undefined,
    stream: deps.logStream,
  });

  if (deps.processEvents) {
    attachGlobalHandlers(logger, deps.processEvents);
  }

  logger.debug('Starting risk-range', getConfigSummary(config));

  let provider: DailyBarsProvider;
  try {
    provider = deps.provider ?? createProvider(config, options, logger);
  } catch (error) {
    stderr(chalk.red(formatCommandError(error, options.verbose)));
    return 1;
  }

  const cache = config.cache.enabled
    ? new MemoryCache<PriceSeries>({ logger, defaultTTL: config.cache.defaultTTL })
    : undefined;
  const loader = new SeriesLoader({ provider, logger, cache });
  const command = new RiskRangeCommand({ loader, logger });
  const formatter = new RiskRangeFormatter();

  const result = await command.execute(parseTickers(tickerArg), toCommandOptions(config, options));

  if (result.error) {
    stderr(chalk.red(formatCommandError(result.error, options.verbose)));
    return 1;
  }

  const writeCsv = options.csv && config.output.csv;
  const outDir = resolve(options.out ?? config.output.dir);
  let exportFailures = 0;
  const jsonResults: Array<Record<string, unknown>> = [];

  for (const outcome of result.output.outcomes) {
    if (!outcome.ok) {
      if (options.json) {
        jsonResults.push({ ticker: outcome.ticker, error: outcome.error.toJSON() });
      } else {
        stderr(chalk.red(formatter.formatFailure(outcome)));
      }
      continue;
    }

    if (options.json) {
      jsonResults.push(formatter.toJSON(outcome));
    } else {
      const [header = '', ...rest] = formatter.format(outcome, 'text').split('\n');
      stdout(chalk.bold(header));
      stdout(rest.join('\n'));
      stdout('');
    }

    if (writeCsv) {
      try {
        const path = await exportCsv(outcome, outDir);
        if (!options.json) {
          stderr(chalk.gray(`CSV written: ${path}`));
        }
      } catch (error) {
        exportFailures++;
        const wrapped = wrapError(error, CommandErrorCode.OUTPUT_ERROR, { ticker: outcome.ticker });
        logger.error('CSV export failed', { ticker: outcome.ticker, error: wrapped.toJSON() });
        stderr(chalk.red(formatCommandError(wrapped, options.verbose)));
      }
    }
  }

  if (options.json) {
    stdout(JSON.stringify({ results: jsonResults, failed: result.output.failed }, null, 2));
  }

  return result.success && exportFailures === 0 ? 0 : 1;
}
