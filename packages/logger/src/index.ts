/**
 * @fileoverview Public API exports for @riskband/logger
 * Structured logging and error handling for the risk range suite
 */

// Core logger creation
export { createLogger, createChildLogger } from './createLogger.js';

// Global error handlers
export { attachGlobalHandlers, type ProcessEvents } from './errorHandler.js';

// Request context management
export {
  generateRequestId,
  getRequestId,
  withRequestContext,
} from './request-context.js';

// Performance timing utilities
export { startTimer, measureSync, measureAsync } from './perf-timer.js';

// Redaction helpers
export { isSensitiveFieldName, redactValue } from './formats.js';

// Type exports
export type { Logger, LoggerConfig, LogLevel, LogEntry, ChildLoggerContext } from './types.js';
export type { RequestContext } from './request-context.js';
export type { PerfTimer } from './perf-timer.js';
