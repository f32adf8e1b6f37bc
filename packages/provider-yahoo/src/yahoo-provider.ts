/**
 * @fileoverview Yahoo Finance daily bar provider.
 *
 * Fetches unadjusted daily OHLCV history from the public chart API, or from
 * recorded chart responses in fixture mode.
 *
 * @module @riskband/provider-yahoo
 */

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import axios, { type AxiosInstance } from 'axios';
import type {
  DailyBarsParams,
  DailyBarsProvider,
  PriceSeries,
  ProviderCapabilities,
} from '@riskband/contracts';
import { InvalidConfigurationError, NoDataError, ProviderError } from '@riskband/contracts';
import type { Logger } from '@riskband/logger';
import { parseChartResponse } from './parser.js';
import type { YahooChartResponse, YahooProviderOptions } from './types.js';

export const YAHOO_CHART_BASE_URL = 'https://query1.finance.yahoo.com/v8/finance/chart';

const PROVIDER_ID = 'yahoo';
const DEFAULT_TIMEOUT_MS = 10_000;
const MAX_LOOKBACK_YEARS = 50;

/**
 * Start of a lookback window of `years` whole years ending at `asOf`.
 */
export function lookbackStart(asOf: Date, years: number): Date {
  const start = new Date(asOf.getTime());
  start.setUTCFullYear(start.getUTCFullYear() - years);
  return start;
}

/**
 * Yahoo Finance data provider.
 *
 * @example
 * ```typescript
 * const provider = new YahooProvider({ timeoutMs: 5_000 });
 * const bars = await provider.getDailyBars({ symbol: 'AAPL', years: 2 });
 * ```
 *
 * @example
 * ```typescript
 * // Offline: reads ./fixtures/AAPL-1d.json
 * const provider = new YahooProvider({ fixturePath: './fixtures' });
 * ```
 */
export class YahooProvider implements DailyBarsProvider {
  private readonly http: AxiosInstance;
  private readonly fixturePath: string | undefined;
  private readonly logger: Logger | undefined;

  constructor(options: YahooProviderOptions = {}) {
    this.http =
      options.httpClient ??
      axios.create({
        baseURL: options.baseUrl ?? YAHOO_CHART_BASE_URL,
        timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
        // The chart API rejects requests without a browser-like agent
        headers: { 'User-Agent': 'Mozilla/5.0' },
      });
    this.fixturePath = options.fixturePath;
    this.logger = options.logger;
  }

  capabilities(): ProviderCapabilities {
    return {
      id: PROVIDER_ID,
      maxLookbackYears: MAX_LOOKBACK_YEARS,
      requiresAuthentication: false,
      rateLimits: {
        requestsPerMinute: 60,
        requestsPerDay: 2000,
      },
    };
  }

  /**
   * Fetches unadjusted daily bars for the `years` ending at `asOf` (default now).
   *
   * In fixture mode the whole recording is returned, clipped to the window
   * only when `asOf` is given.
   *
   * @throws {InvalidConfigurationError} If symbol or years is invalid
   * @throws {NoDataError} If no usable bars come back
   * @throws {ProviderError} If the request or fixture read fails
   */
  async getDailyBars(params: DailyBarsParams): Promise<PriceSeries> {
    this.validateParams(params);

    const symbol = params.symbol.trim().toUpperCase();
    const end = params.asOf ?? new Date();
    const start = lookbackStart(end, params.years);

    this.logger?.debug('Fetching daily bars', {
      provider: PROVIDER_ID,
      ticker: symbol,
      from: start.toISOString(),
      to: end.toISOString(),
      source: this.fixturePath ? 'fixture' : 'http',
    });

    const response = this.fixturePath
      ? await this.loadFixture(symbol, this.fixturePath)
      : await this.fetchChart(symbol, start, end);

    const { bars, dropped } = parseChartResponse(response);

    const clipFixture = this.fixturePath !== undefined && params.asOf !== undefined;
    const startDate = start.toISOString().slice(0, 10);
    const endDate = end.toISOString().slice(0, 10);
    const series = clipFixture
      ? bars.filter((bar) => bar.date >= startDate && bar.date <= endDate)
      : bars;

    if (series.length === 0) {
      throw new NoDataError('No data returned for ticker.', { symbol, provider: PROVIDER_ID });
    }

    this.logger?.info('Fetched daily bars', {
      provider: PROVIDER_ID,
      ticker: symbol,
      count: series.length,
      dropped,
      first: series[0]?.date,
      last: series[series.length - 1]?.date,
    });

    return series;
  }

  private validateParams(params: DailyBarsParams): void {
    if (!params.symbol || params.symbol.trim().length === 0) {
      throw new InvalidConfigurationError('Invalid symbol: must be a non-empty string', {
        field: 'symbol',
        value: params.symbol,
      });
    }

    if (
      !Number.isInteger(params.years) ||
      params.years < 1 ||
      params.years > MAX_LOOKBACK_YEARS
    ) {
      throw new InvalidConfigurationError(
        `Invalid years: must be an integer between 1 and ${MAX_LOOKBACK_YEARS}`,
        { field: 'years', value: params.years }
      );
    }

    if (params.asOf && Number.isNaN(params.asOf.getTime())) {
      throw new InvalidConfigurationError('Invalid asOf date', {
        field: 'asOf',
        value: params.asOf,
      });
    }
  }

  private async fetchChart(symbol: string, start: Date, end: Date): Promise<YahooChartResponse> {
    try {
      const { data } = await this.http.get<YahooChartResponse>(`/${encodeURIComponent(symbol)}`, {
        params: {
          interval: '1d',
          period1: Math.floor(start.getTime() / 1000),
          period2: Math.floor(end.getTime() / 1000),
          includePrePost: false,
          events: 'div,splits',
        },
      });

      const chartError = data.chart?.error;
      if (chartError) {
        throw new ProviderError(
          `Yahoo Finance error: ${chartError.description ?? chartError.code ?? 'unknown'}`,
          { provider: PROVIDER_ID, symbol }
        );
      }

      return data;
    } catch (error) {
      if (error instanceof ProviderError) {
        throw error;
      }

      if (axios.isAxiosError(error)) {
        const status = error.response?.status;
        // Unknown tickers come back as 404 "No data found"
        if (status === 404) {
          throw new NoDataError('No data returned for ticker.', { symbol, provider: PROVIDER_ID });
        }
        throw new ProviderError(`Yahoo Finance request failed: ${error.message}`, {
          provider: PROVIDER_ID,
          symbol,
          status,
        });
      }

      throw new ProviderError(
        `Yahoo Finance request failed: ${error instanceof Error ? error.message : String(error)}`,
        { provider: PROVIDER_ID, symbol }
      );
    }
  }

  private async loadFixture(symbol: string, directory: string): Promise<YahooChartResponse> {
    const file = join(directory, `${symbol}-1d.json`);

    let content: string;
    try {
      content = await readFile(file, 'utf-8');
    } catch (error) {
      throw new ProviderError(
        `Failed to load fixture ${file}: ${error instanceof Error ? error.message : String(error)}`,
        { provider: PROVIDER_ID, symbol }
      );
    }

    try {
      const parsed: YahooChartResponse = JSON.parse(content);
      return parsed;
    } catch (error) {
      throw new ProviderError(
        `Invalid fixture ${file}: ${error instanceof Error ? error.message : String(error)}`,
        { provider: PROVIDER_ID, symbol }
      );
    }
  }
}
