/**
 * @fileoverview Request context management using AsyncLocalStorage
 * Provides request ID generation and propagation through async operations
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';

/**
 * Request context structure
 */
export interface RequestContext {
  /** Unique request identifier (UUID v4) */
  request_id: string;

  /** Optional additional context fields */
  [key: string]: unknown;
}

const requestContextStorage = new AsyncLocalStorage<RequestContext>();

/**
 * Generate a new unique request ID (UUID v4 format)
 */
export function generateRequestId(): string {
  return randomUUID();
}

/**
 * Get the current request ID from the active context
 *
 * @example
 * ```typescript
 * const requestId = getRequestId();
 * logger.info('Processing', { request_id: requestId });
 * ```
 */
export function getRequestId(): string | undefined {
  return requestContextStorage.getStore()?.request_id;
}

/**
 * Execute a function within a new request context.
 * The request ID is propagated through every async operation the function
 * starts, and the logger's standard fields pick it up automatically.
 *
 * @param fn - Function to execute within the request context
 * @param requestId - Optional request ID to use (generates new one if not provided)
 * @param additionalContext - Optional additional context fields
 *
 * @example
 * ```typescript
 * await withRequestContext(
 *   async () => runTicker('AAPL'),
 *   undefined,
 *   { ticker: 'AAPL' }
 * );
 * ```
 */
export async function withRequestContext<T>(
  fn: () => Promise<T> | T,
  requestId?: string,
  additionalContext?: Record<string, unknown>
): Promise<T> {
  const context: RequestContext = {
    ...additionalContext,
    request_id: requestId || generateRequestId(),
  };

  return requestContextStorage.run(context, fn);
}
