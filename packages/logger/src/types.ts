/**
 * @fileoverview Type definitions for the risk range logger
 * Provides strongly-typed interfaces for logger configuration and usage.
 */

import type { Writable } from 'node:stream';
import type { Logger as WinstonLogger } from 'winston';

/**
 * Log level determines the minimum severity of messages that will be logged.
 * - 'error': Critical errors that require immediate attention
 * - 'warn': Warning conditions that should be reviewed
 * - 'info': Informational messages about normal operations
 * - 'debug': Detailed debugging information for development
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Configuration options for creating a logger instance.
 *
 * @example
 * ```typescript
 * const config: LoggerConfig = {
 *   level: 'info',
 *   json: process.env['NODE_ENV'] === 'production',
 *   filePath: './logs/risk-range.log'
 * };
 * ```
 */
export interface LoggerConfig {
  /**
   * Minimum log level to output.
   * @default 'info'
   */
  level: LogLevel;

  /**
   * Whether to output logs in JSON format.
   * - true: Machine-readable JSON
   * - false: Human-readable pretty-print
   * @default true in production, false in development
   */
  json?: boolean;

  /**
   * Optional file path for file transport, in addition to console.
   */
  filePath?: string;

  /**
   * Whether to enable console output.
   * @default true
   */
  console?: boolean;

  /**
   * Optional writable stream that receives every formatted line.
   * Used to capture output in tests and to pipe logs elsewhere.
   */
  stream?: Writable;
}

/**
 * Structured log entry with standard fields.
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  /** ISO 8601 timestamp */
  timestamp: string;
  /** Ticker being processed (e.g. "AAPL") */
  ticker?: string;
  /** Request correlation ID */
  request_id?: string;
  /** Component or module name (typically from child logger) */
  component?: string;
  /** Data provider name (e.g. "yahoo", "fixture") */
  provider?: string;
  /** Operation duration in milliseconds */
  duration_ms?: number;
  /** Operation result (e.g. "success", "error", "empty") */
  result?: string;
  operation?: string;
  error_code?: string;
  /** Number of rows or bars processed */
  count?: number;
  cache?: 'hit' | 'miss';
  [key: string]: unknown;
}

/**
 * Child logger context fields.
 *
 * @example
 * ```typescript
 * const tickerLogger = logger.child({ component: 'risk-range', ticker: 'MSFT' });
 * tickerLogger.info('Band computed'); // includes component and ticker
 * ```
 */
export interface ChildLoggerContext {
  component?: string;
  ticker?: string;
  request_id?: string;
  provider?: string;
  operation?: string;
  [key: string]: unknown;
}

/**
 * Winston's Logger, re-exported so packages depend on this one.
 */
export type Logger = WinstonLogger;
