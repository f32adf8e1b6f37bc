/**
 * @fileoverview Yahoo Finance provider-specific types.
 *
 * Defines the chart API response shape and provider options.
 *
 * @module @riskband/provider-yahoo/types
 */

import type { AxiosInstance } from 'axios';
import type { PriceBar } from '@riskband/contracts';
import type { Logger } from '@riskband/logger';

/**
 * Per-bar quote arrays. Yahoo reports missing sessions as null entries.
 */
export interface YahooQuote {
  open?: Array<number | null>;
  high?: Array<number | null>;
  low?: Array<number | null>;
  close?: Array<number | null>;
  volume?: Array<number | null>;
}

/**
 * One entry of `chart.result`.
 */
export interface YahooChartResult {
  meta?: {
    symbol?: string;
    currency?: string;
    /** Exchange offset from UTC in seconds, used to derive session dates */
    gmtoffset?: number;
    exchangeTimezoneName?: string;
  };
  /** Bar open times in epoch seconds */
  timestamp?: number[];
  indicators?: {
    quote?: YahooQuote[];
  };
}

/**
 * Response of `GET /v8/finance/chart/{symbol}`.
 */
export interface YahooChartResponse {
  chart?: {
    result?: YahooChartResult[] | null;
    error?: {
      code?: string;
      description?: string;
    } | null;
  };
}

/**
 * Options for YahooProvider configuration.
 */
export interface YahooProviderOptions {
  /**
   * Preconfigured HTTP client. When omitted one is created from
   * `baseUrl` and `timeoutMs`.
   */
  httpClient?: AxiosInstance;

  /** Chart API base URL */
  baseUrl?: string;

  /** Request timeout in milliseconds */
  timeoutMs?: number;

  /**
   * Directory of `{SYMBOL}-1d.json` chart responses. When set, no HTTP
   * requests are made.
   */
  fixturePath?: string;

  logger?: Logger;
}

/**
 * Parsed bars plus the number of rows dropped for missing prices.
 */
export interface ParsedChart {
  bars: PriceBar[];
  dropped: number;
}
