/**
 * @fileoverview Main entry point for @riskband/contracts package.
 *
 * Exports the daily bar model, provider contracts, and error taxonomy shared
 * by every package of the suite.
 *
 * @module @riskband/contracts
 */

// Market data types
export type {
  PriceBar,
  PriceSeries,
  DailyBarsParams,
  ProviderCapabilities,
  DailyBarsProvider,
} from './market.js';

// Error classes and guards
export {
  RiskBandError,
  InvalidConfigurationError,
  InsufficientBarsError,
  NoDataError,
  ProviderError,
  isRiskBandError,
  isInvalidConfigurationError,
  isInsufficientBarsError,
  isNoDataError,
  isProviderError,
} from './errors.js';
