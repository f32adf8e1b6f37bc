/**
 * @fileoverview Custom Winston formats for the risk range logger
 * Includes PII redaction, standard fields, request ID injection and
 * pretty-print output.
 */

import { format } from 'winston';
import { getRequestId } from './request-context.js';

/**
 * Field names whose values never reach a log sink.
 * Matching is case-insensitive.
 */
const SENSITIVE_FIELD_PATTERNS = [
  /password/i,
  /passwd/i,
  /secret/i,
  /api[_-]?key/i,
  /token/i,
  /authorization/i,
  /cookie/i,
  /private[_-]?key/i,
];

const REDACTED = '[REDACTED]';

const CORE_FIELDS = ['level', 'message', 'timestamp', 'label'];

/**
 * Whether a field name matches one of the sensitive patterns.
 */
export function isSensitiveFieldName(key: string): boolean {
  return SENSITIVE_FIELD_PATTERNS.some((pattern) => pattern.test(key));
}

/**
 * Returns a copy of `value` with sensitive fields replaced, recursing into
 * arrays and plain objects.
 *
 * @example
 * ```typescript
 * redactValue({ ticker: 'AAPL', apiKey: 'test-secret' });
 * // { ticker: 'AAPL', apiKey: '[REDACTED]' }
 * ```
 */
export function redactValue(value: unknown): unknown {
  if (value === null || typeof value !== 'object') {
    return value;
  }

  if (Array.isArray(value)) {
    return value.map((item) => redactValue(item));
  }

  if (value instanceof Error || value instanceof Date) {
    return value;
  }

  const result: Record<string, unknown> = {};
  for (const [key, nested] of Object.entries(value)) {
    result[key] = isSensitiveFieldName(key) ? REDACTED : redactValue(nested);
  }
  return result;
}

/**
 * Winston format that redacts sensitive fields from log metadata.
 * Applied first in the chain so nothing downstream sees raw values.
 *
 * @example
 * ```typescript
 * logger.info('Provider configured', { provider: 'yahoo', apiKey: 'test-secret' });
 * // {"level":"info","message":"Provider configured","provider":"yahoo","apiKey":"[REDACTED]"}
 * ```
 */
export const redactPII = format((info) => {
  for (const key of Object.keys(info)) {
    if (CORE_FIELDS.includes(key)) {
      continue;
    }
    info[key] = isSensitiveFieldName(key) ? REDACTED : redactValue(info[key]);
  }
  return info;
});

/**
 * Timestamp, error stacks and the request_id of the active request context.
 */
export const standardFields = format.combine(
  format.timestamp({ format: 'YYYY-MM-DDTHH:mm:ss.SSSZ' }),
  format.errors({ stack: true }),
  format((info) => {
    const requestId = getRequestId();
    if (requestId && !info['request_id']) {
      info['request_id'] = requestId;
    }
    return info;
  })()
);

/**
 * Human-readable single-line output.
 *
 * @example
 * ```typescript
 * // [2025-09-29T12:34:56.789Z] info: Band computed component=pipeline ticker=AAPL count=503
 * ```
 */
export const prettyPrint = format.combine(
  format.colorize(),
  format.printf((info) => {
    const { timestamp, level, message, component, ticker, request_id, ...rest } = info;

    const context: string[] = [];
    if (component) context.push(`component=${String(component)}`);
    if (ticker) context.push(`ticker=${String(ticker)}`);
    if (request_id) context.push(`request_id=${String(request_id)}`);

    for (const [key, value] of Object.entries(rest)) {
      if (['stack', 'splat'].includes(key)) {
        continue;
      }
      context.push(`${key}=${JSON.stringify(value)}`);
    }

    const contextStr = context.length > 0 ? ` ${context.join(' ')}` : '';
    const baseMsg = `[${String(timestamp)}] ${level}: ${String(message)}${contextStr}`;

    if (typeof info['stack'] === 'string') {
      return `${baseMsg}\n${info['stack']}`;
    }

    return baseMsg;
  })
);
