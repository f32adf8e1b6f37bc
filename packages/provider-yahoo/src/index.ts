/**
 * @fileoverview Yahoo Finance provider for daily price history.
 * @module @riskband/provider-yahoo
 */

export { YahooProvider, YAHOO_CHART_BASE_URL, lookbackStart } from './yahoo-provider.js';
export { parseChartResponse, toSessionDate } from './parser.js';
export type {
  YahooChartResponse,
  YahooChartResult,
  YahooQuote,
  YahooProviderOptions,
  ParsedChart,
} from './types.js';
