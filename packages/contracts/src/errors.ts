/**
 * @fileoverview Error taxonomy for the risk range suite.
 *
 * Defines a hierarchy of structured error classes with machine-readable codes
 * and contextual data for logging and per-ticker reporting.
 *
 * All errors extend the RiskBandError base class and include:
 * - Unique error code (string constant)
 * - Structured data payload
 * - ISO timestamp
 *
 * @module @riskband/contracts/errors
 */

/**
 * Base error class for all risk range errors.
 *
 * @invariant code is non-empty string
 * @invariant timestamp is valid ISO 8601 string
 *
 * @example
 * ```typescript
 * throw new RiskBandError('CUSTOM_ERROR', 'Something went wrong', { context: 'value' });
 * ```
 */
export class RiskBandError extends Error {
  /**
   * Machine-readable error code (e.g. 'INVALID_CONFIGURATION').
   */
  readonly code: string;

  /**
   * Structured error data for debugging.
   */
  readonly data?: Record<string, unknown>;

  /**
   * ISO 8601 timestamp when error was created.
   */
  readonly timestamp: string;

  constructor(code: string, message: string, data?: Record<string, unknown>) {
    super(message);
    this.name = 'RiskBandError';
    this.code = code;
    this.data = data;
    this.timestamp = new Date().toISOString();
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Serializes error to JSON-safe object.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      data: this.data,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }
}

/**
 * Thrown when a pipeline option is outside its domain: non-positive or
 * fractional window sizes, a non-positive confidence multiplier, negative
 * blend weights, or non-finite numbers.
 *
 * @example
 * ```typescript
 * throw new InvalidConfigurationError('atrWindow must be a positive integer', {
 *   field: 'atrWindow',
 *   value: 0
 * });
 * ```
 */
export class InvalidConfigurationError extends RiskBandError {
  declare readonly data: {
    field: string;
    value: unknown;
    [key: string]: unknown;
  };

  constructor(message: string, data: { field: string; value: unknown; [key: string]: unknown }) {
    super('INVALID_CONFIGURATION', message, data);
    this.name = 'InvalidConfigurationError';
  }
}

/**
 * Raised by callers when a series is too short to produce any complete row.
 *
 * The pipeline itself never throws this: short series degrade to undefined
 * values and an empty projected table.
 *
 * @example
 * ```typescript
 * throw new InsufficientBarsError('Need at least 40 bars for a complete row', {
 *   required: 40,
 *   received: 25,
 *   symbol: 'AAPL'
 * });
 * ```
 */
export class InsufficientBarsError extends RiskBandError {
  declare readonly data: {
    required: number;
    received: number;
    symbol: string;
    [key: string]: unknown;
  };

  constructor(
    message: string,
    data: { required: number; received: number; symbol: string; [key: string]: unknown }
  ) {
    super('INSUFFICIENT_BARS', message, data);
    this.name = 'InsufficientBarsError';
  }
}

/**
 * Thrown when a provider answers but has no bars for the symbol.
 */
export class NoDataError extends RiskBandError {
  declare readonly data: {
    symbol: string;
    provider: string;
    [key: string]: unknown;
  };

  constructor(message: string, data: { symbol: string; provider: string; [key: string]: unknown }) {
    super('NO_DATA', message, data);
    this.name = 'NoDataError';
  }
}

/**
 * Thrown when a provider request fails (transport, HTTP status, malformed
 * payload).
 */
export class ProviderError extends RiskBandError {
  declare readonly data: {
    provider: string;
    symbol?: string;
    status?: number;
    [key: string]: unknown;
  };

  constructor(
    message: string,
    data: { provider: string; symbol?: string; status?: number; [key: string]: unknown }
  ) {
    super('PROVIDER_ERROR', message, data);
    this.name = 'ProviderError';
  }
}

/**
 * Type guard to check if an error is a RiskBandError.
 *
 * @example
 * ```typescript
 * try {
 *   // ... code
 * } catch (err) {
 *   if (isRiskBandError(err)) {
 *     logger.error(err.message, { error_code: err.code });
 *   }
 * }
 * ```
 */
export function isRiskBandError(error: unknown): error is RiskBandError {
  return error instanceof RiskBandError;
}

export function isInvalidConfigurationError(error: unknown): error is InvalidConfigurationError {
  return error instanceof InvalidConfigurationError;
}

export function isInsufficientBarsError(error: unknown): error is InsufficientBarsError {
  return error instanceof InsufficientBarsError;
}

export function isNoDataError(error: unknown): error is NoDataError {
  return error instanceof NoDataError;
}

export function isProviderError(error: unknown): error is ProviderError {
  return error instanceof ProviderError;
}
