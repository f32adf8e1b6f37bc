/**
 * @fileoverview Global error handlers for uncaught exceptions and unhandled rejections
 * Ensures all errors are logged before process termination.
 */

import type { Logger } from './types.js';

/**
 * Milliseconds to wait for the logger to flush before a forced exit.
 */
const FLUSH_TIMEOUT_MS = 3000;

/**
 * Event source the handlers are registered on. Defaults to `process`.
 */
export type ProcessEvents = Pick<NodeJS.EventEmitter, 'on'>;

const attachedTargets = new WeakSet<ProcessEvents>();

/**
 * Attaches global error handlers.
 * Uncaught exceptions and unhandled rejections are logged with their stack
 * and the process exits with code 1 once the logger has flushed. Process
 * warnings are logged and do not exit.
 *
 * @param logger - Logger instance to use for error logging
 * @param target - Event source to listen on
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info' });
 * attachGlobalHandlers(logger);
 * ```
 */
export function attachGlobalHandlers(logger: Logger, target: ProcessEvents = process): void {
  if (attachedTargets.has(target)) {
    logger.warn('Global error handlers already attached, skipping');
    return;
  }

  target.on('uncaughtException', (error: Error) => {
    logger.error('Uncaught exception detected - process will exit', {
      error: {
        name: error.name,
        message: error.message,
        stack: error.stack,
      },
      event: 'uncaughtException',
      fatal: true,
    });
    gracefulExit(logger, 1);
  });

  target.on('unhandledRejection', (reason: unknown) => {
    const errorInfo =
      reason instanceof Error
        ? { name: reason.name, message: reason.message, stack: reason.stack }
        : { message: String(reason) };

    logger.error('Unhandled promise rejection detected - process will exit', {
      error: errorInfo,
      event: 'unhandledRejection',
      fatal: true,
    });
    gracefulExit(logger, 1);
  });

  target.on('warning', (warning: Error) => {
    logger.warn('Process warning emitted', {
      warning: {
        name: warning.name,
        message: warning.message,
      },
      event: 'warning',
    });
  });

  attachedTargets.add(target);

  logger.debug('Global error handlers attached', {
    handlers: ['uncaughtException', 'unhandledRejection', 'warning'],
  });
}

/**
 * Exits after the logger flushes, or after FLUSH_TIMEOUT_MS.
 */
function gracefulExit(logger: Logger, exitCode: number): void {
  const timeoutId = setTimeout(() => {
    console.error(`[Logger] Flush timeout expired (${FLUSH_TIMEOUT_MS}ms), forcing exit`);
    process.exit(exitCode);
  }, FLUSH_TIMEOUT_MS);

  logger.on('finish', () => {
    clearTimeout(timeoutId);
    process.exit(exitCode);
  });

  logger.end();
}
