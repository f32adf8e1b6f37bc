/**
 * @fileoverview Main logger factory for the risk range suite
 * Creates configured Winston logger instances with structured logging,
 * PII redaction, and flexible transport options.
 */

import winston, { format } from 'winston';
import type { ChildLoggerContext, LoggerConfig, Logger } from './types.js';
import { redactPII, standardFields, prettyPrint } from './formats.js';

/**
 * Creates a configured logger instance with structured logging and PII redaction.
 *
 * Features:
 * - Standard fields (timestamp, request_id from the active request context)
 * - Redaction of sensitive fields (tokens, keys, passwords)
 * - Console, file and stream transports
 * - JSON in production, pretty-print otherwise
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info', json: true });
 * logger.info('Run started', { tickers: ['AAPL', 'MSFT'] });
 * ```
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'debug', json: false, filePath: './logs/run.log' });
 * const tickerLogger = logger.child({ component: 'pipeline', ticker: 'AAPL' });
 * tickerLogger.debug('Indicators computed', { count: 504 });
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
  const {
    level,
    json = process.env['NODE_ENV'] === 'production',
    filePath,
    console: enableConsole = true,
    stream,
  } = config;

  // Order is important: redact first, then standard fields, then output format
  const logFormat = format.combine(redactPII(), standardFields, json ? format.json() : prettyPrint);

  const transports: winston.transport[] = [];

  if (enableConsole) {
    transports.push(
      new winston.transports.Console({
        level,
        // Diagnostics go to stderr so stdout carries only report output
        stderrLevels: ['error', 'warn', 'info', 'debug'],
      })
    );
  }

  if (filePath) {
    transports.push(
      new winston.transports.File({
        filename: filePath,
        level,
        handleExceptions: false,
        handleRejections: false,
      })
    );
  }

  if (stream) {
    transports.push(new winston.transports.Stream({ stream, level }));
  }

  // Formatting happens once at the logger; transports write the result
  return winston.createLogger({
    level,
    format: logFormat,
    transports,
    // Global handlers in errorHandler.ts decide when to exit
    exitOnError: false,
    // With no transports winston would warn on every write
    silent: transports.length === 0,
  });
}

/**
 * Creates a child logger with additional context fields.
 * Child loggers inherit the parent's transports and include the context
 * fields in every entry.
 *
 * @example
 * ```typescript
 * const providerLogger = createChildLogger(logger, { component: 'provider', provider: 'yahoo' });
 * providerLogger.info('Fetched bars', { ticker: 'AAPL', count: 503 });
 * ```
 */
export function createChildLogger(logger: Logger, context: ChildLoggerContext): Logger {
  return logger.child(context);
}
