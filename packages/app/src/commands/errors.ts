/**
 * Error handling for CLI commands
 *
 * Provides friendly error messages and structured error codes for
 * command failures.
 */

import { isRiskBandError } from '@riskband/contracts';

/**
 * Command error codes
 */
export enum CommandErrorCode {
  /** Invalid command arguments */
  INVALID_ARGS = 'INVALID_ARGS',
  /** Configuration error (load/validate) */
  CONFIG_ERROR = 'CONFIG_ERROR',
  /** Market data provider error */
  PROVIDER_ERROR = 'PROVIDER_ERROR',
  /** Provider returned nothing for the ticker */
  NO_DATA = 'NO_DATA',
  /** Series too short for a complete row */
  INSUFFICIENT_DATA = 'INSUFFICIENT_DATA',
  /** Risk range computation error */
  ANALYSIS_ERROR = 'ANALYSIS_ERROR',
  /** Output writing error */
  OUTPUT_ERROR = 'OUTPUT_ERROR',
  /** Internal command error */
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

/**
 * Friendly error messages for each error code
 */
export const ERROR_MESSAGES: Record<CommandErrorCode, string> = {
  [CommandErrorCode.INVALID_ARGS]: 'Invalid command arguments provided',
  [CommandErrorCode.CONFIG_ERROR]: 'Failed to load configuration',
  [CommandErrorCode.PROVIDER_ERROR]: 'Failed to fetch market data from provider',
  [CommandErrorCode.NO_DATA]: 'No data returned for ticker.',
  [CommandErrorCode.INSUFFICIENT_DATA]: 'Not enough history to compute a complete risk range',
  [CommandErrorCode.ANALYSIS_ERROR]: 'Risk range computation failed',
  [CommandErrorCode.OUTPUT_ERROR]: 'Failed to write output',
  [CommandErrorCode.INTERNAL_ERROR]: 'Internal command error',
};

/**
 * Command error class
 *
 * Extends Error with structured error codes and context.
 */
export class CommandError extends Error {
  readonly code: CommandErrorCode;
  readonly context: Record<string, unknown> | undefined;
  override readonly cause: Error | undefined;

  constructor(
    code: CommandErrorCode,
    message?: string,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message || ERROR_MESSAGES[code]);

    this.name = 'CommandError';
    this.code = code;
    this.context = context;
    this.cause = cause;

    Error.captureStackTrace(this, CommandError);
  }

  /**
   * Format error for display
   */
  format(verbose: boolean = false): string {
    const lines: string[] = [];

    lines.push(`Error: ${this.message}`);
    lines.push(`Code: ${this.code}`);

    if (this.context && Object.keys(this.context).length > 0) {
      lines.push('Context:');
      for (const [key, value] of Object.entries(this.context)) {
        lines.push(`  ${key}: ${JSON.stringify(value)}`);
      }
    }

    if (verbose && this.cause) {
      lines.push('Caused by:');
      lines.push(`  ${this.cause.message}`);
    }

    if (verbose && this.stack) {
      lines.push('Stack trace:');
      lines.push(this.stack);
    }

    return lines.join('\n');
  }

  /**
   * Convert error to JSON for structured logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      cause: this.cause
        ? {
            name: this.cause.name,
            message: this.cause.message,
          }
        : undefined,
    };
  }
}

/**
 * Create a friendly error message from any error
 */
export function formatCommandError(error: unknown, verbose: boolean = false): string {
  if (error instanceof CommandError) {
    return error.format(verbose);
  }

  if (error instanceof Error) {
    const lines: string[] = [];
    lines.push(`Error: ${error.message}`);

    if (verbose && error.stack) {
      lines.push('Stack trace:');
      lines.push(error.stack);
    }

    return lines.join('\n');
  }

  return `Error: ${String(error)}`;
}

const RISK_BAND_CODES: Record<string, CommandErrorCode> = {
  INVALID_CONFIGURATION: CommandErrorCode.INVALID_ARGS,
  INSUFFICIENT_BARS: CommandErrorCode.INSUFFICIENT_DATA,
  NO_DATA: CommandErrorCode.NO_DATA,
  PROVIDER_ERROR: CommandErrorCode.PROVIDER_ERROR,
};

/**
 * Wrap an error with command error context.
 *
 * Domain errors keep their own message and map to the matching code;
 * anything else gets `fallback` and its friendly message.
 */
export function wrapError(
  error: unknown,
  fallback: CommandErrorCode,
  context?: Record<string, unknown>
): CommandError {
  if (error instanceof CommandError) {
    return error;
  }

  if (isRiskBandError(error)) {
    return new CommandError(RISK_BAND_CODES[error.code] ?? fallback, error.message, context, error);
  }

  const cause = error instanceof Error ? error : new Error(String(error));
  return new CommandError(fallback, ERROR_MESSAGES[fallback], context, cause);
}
