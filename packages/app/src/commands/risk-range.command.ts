/**
 * Risk range command implementation
 */

import { InsufficientBarsError } from '@riskband/contracts';
import {
  createChildLogger,
  measureAsync,
  measureSync,
  startTimer,
  withRequestContext,
  type Logger,
} from '@riskband/logger';
import {
  requiredWarmup,
  runRiskRange,
  summarizeLatest,
  tailRows,
  type LatestSummary,
  type ProjectedTable,
  type RiskRangeConfig,
  type RiskRangeResult,
} from '@riskband/risk-range';
import type { SeriesLoader } from '../services/series-loader.js';
import { CommandError, CommandErrorCode, wrapError } from './errors.js';
import type { Command, CommandResult } from './types.js';

export interface RiskRangeCommandConfig {
  loader: SeriesLoader;
  logger: Logger;
}

export interface RiskRangeCommandOptions {
  /** Lookback in whole years */
  years: number;
  /** Number of trailing table rows to report */
  rows: number;
  /** Pipeline overrides, merged with the defaults */
  riskRange: Partial<RiskRangeConfig>;
}

export interface TickerSuccess {
  ok: true;
  ticker: string;
  bars: number;
  result: RiskRangeResult;
  summary: LatestSummary;
  /** Last `rows` table rows, oldest first */
  tail: ProjectedTable;
  duration: number;
}

export interface TickerFailure {
  ok: false;
  ticker: string;
  error: CommandError;
  duration: number;
}

export type TickerOutcome = TickerSuccess | TickerFailure;

export interface RiskRangeReport {
  outcomes: TickerOutcome[];
  failed: number;
}

/**
 * Splits a comma-separated ticker list: spaces removed, upper-cased,
 * empty entries and repeats dropped.
 *
 * @example
 * ```typescript
 * parseTickers('aapl, msft,,AAPL'); // ['AAPL', 'MSFT']
 * ```
 */
export function parseTickers(input: string): string[] {
  const tickers = input
    .toUpperCase()
    .replace(/\s+/g, '')
    .split(',')
    .filter((ticker) => ticker.length > 0);

  return [...new Set(tickers)];
}

/**
 * Error for a series that produced no complete row. With enough bars the
 * cause is a regime score that never gets defined, typically a volume that
 * never varies.
 */
function emptyTableError(ticker: string, received: number, required: number): InsufficientBarsError {
  const message =
    received < required
      ? `Need at least ${required} bars for a complete row, got ${received}`
      : `No complete row in ${received} bars: the volume or vol-of-vol z-score is never defined ` +
        '(constant volume?)';
  return new InsufficientBarsError(message, { required, received, symbol: ticker });
}

/**
 * Computes the risk range for each ticker independently. One ticker failing
 * does not stop the others.
 */
export class RiskRangeCommand implements Command<RiskRangeCommandOptions, RiskRangeReport> {
  name = 'risk-range';
  description = 'Volatility-blended risk range bands for one or more tickers';

  private readonly loader: SeriesLoader;
  private readonly logger: Logger;

  constructor(config: RiskRangeCommandConfig) {
    this.loader = config.loader;
    this.logger = config.logger;
  }

  async execute(
    tickers: string[],
    options: RiskRangeCommandOptions
  ): Promise<CommandResult<RiskRangeReport, CommandError>> {
    const timer = startTimer();

    if (tickers.length === 0) {
      const error = new CommandError(CommandErrorCode.INVALID_ARGS, 'Enter at least one ticker.');
      return {
        success: false,
        output: { outcomes: [], failed: 0 },
        error,
        duration: timer.stop(),
      };
    }

    this.logger.info('Executing risk-range command', {
      tickers,
      years: options.years,
      rows: options.rows,
    });

    const outcomes = await Promise.all(tickers.map((ticker) => this.runTicker(ticker, options)));
    const failed = outcomes.filter((outcome) => !outcome.ok).length;
    const duration = timer.stop();

    this.logger.info('Risk-range command finished', {
      tickers: tickers.length,
      failed,
      duration_ms: duration,
    });

    return {
      success: failed === 0,
      output: { outcomes, failed },
      duration,
    };
  }

  private runTicker(ticker: string, options: RiskRangeCommandOptions): Promise<TickerOutcome> {
    return withRequestContext(
      async (): Promise<TickerOutcome> => {
        const timer = startTimer();
        const log = createChildLogger(this.logger, { component: 'risk-range', ticker });

        try {
          const loaded = await measureAsync(() => this.loader.load(ticker, options.years));
          const series = loaded.result;
          const computed = measureSync(() => runRiskRange(series, options.riskRange));
          const result = computed.result;
          const summary = summarizeLatest(result);

          if (!summary) {
            throw emptyTableError(ticker, series.length, requiredWarmup(result.config) + 1);
          }

          const duration = timer.stop();
          log.info('Risk range computed', {
            bars: series.length,
            rows: result.table.length,
            date: summary.date,
            load_ms: loaded.duration_ms,
            compute_ms: computed.duration_ms,
            duration_ms: duration,
          });

          return {
            ok: true,
            ticker,
            bars: series.length,
            result,
            summary,
            tail: tailRows(result.table, options.rows),
            duration,
          };
        } catch (error) {
          const wrapped = wrapError(error, CommandErrorCode.ANALYSIS_ERROR, { ticker });
          const duration = timer.stop();
          log.error('Risk range failed', { error: wrapped.toJSON(), duration_ms: duration });

          return { ok: false, ticker, error: wrapped, duration };
        }
      },
      undefined,
      { ticker }
    );
  }
}
