/**
 * @fileoverview Market data types and provider contracts.
 *
 * Defines provider-agnostic interfaces for daily OHLCV bars, query
 * parameters, and provider capabilities. All types are pure data
 * structures with no I/O or business logic.
 *
 * @module @riskband/contracts/market
 */

/**
 * One trading day's OHLCV observation.
 *
 * Represents immutable market data for a single session.
 *
 * @invariant open, high, low, close > 0
 * @invariant high >= low
 * @invariant volume >= 0
 * @invariant date is an ISO 8601 calendar date (YYYY-MM-DD)
 *
 * @example
 * ```typescript
 * const bar: PriceBar = {
 *   date: '2025-01-15',
 *   open: 100.50,
 *   high: 101.25,
 *   low: 100.00,
 *   close: 101.00,
 *   volume: 1500000
 * };
 * ```
 */
export interface PriceBar {
  /** Session date (YYYY-MM-DD), the ordering key of a series */
  readonly date: string;

  /** Opening price for the session */
  readonly open: number;

  /** Highest price during the session */
  readonly high: number;

  /** Lowest price during the session */
  readonly low: number;

  /** Closing price for the session */
  readonly close: number;

  /** Traded volume during the session */
  readonly volume: number;
}

/**
 * Chronologically ordered daily bars, one per trading day.
 *
 * @invariant dates strictly increasing, no duplicates
 */
export type PriceSeries = readonly PriceBar[];

/**
 * Parameters for requesting daily history from a provider.
 *
 * @example
 * ```typescript
 * const params: DailyBarsParams = { symbol: 'AAPL', years: 2 };
 * ```
 */
export interface DailyBarsParams {
  /** Ticker symbol as the provider knows it (e.g. 'AAPL', '^GSPC') */
  symbol: string;

  /** Lookback window in whole years, counted back from `asOf` */
  years: number;

  /**
   * End of the lookback window.
   * Defaults to the current time.
   */
  asOf?: Date;
}

/**
 * Describes a provider's supported features and limitations.
 */
export interface ProviderCapabilities {
  /** Provider identifier used in logs */
  id: string;

  /** Longest lookback accepted, in years */
  maxLookbackYears: number;

  /** Whether API keys/auth are required */
  requiresAuthentication: boolean;

  /** Rate limiting constraints */
  rateLimits: {
    /** Maximum requests per minute */
    requestsPerMinute: number;

    /** Optional: requests per day */
    requestsPerDay?: number;
  };
}

/**
 * Source of daily price history.
 *
 * Implemented by market-data providers and by in-process fakes in tests.
 */
export interface DailyBarsProvider {
  capabilities(): ProviderCapabilities;
  getDailyBars(params: DailyBarsParams): Promise<PriceSeries>;
}
