import { describe, it, expect } from 'vitest';
import { NoDataError, ProviderError } from '@riskband/contracts';
import {
  CommandError,
  CommandErrorCode,
  ERROR_MESSAGES,
  formatCommandError,
  wrapError,
} from '../src/commands/errors.js';

describe('CommandError', () => {
  it('falls back to the friendly message for its code', () => {
    const error = new CommandError(CommandErrorCode.OUTPUT_ERROR);

    expect(error.message).toBe('Failed to write output');
    expect(error.name).toBe('CommandError');
  });

  it('formats message, code and context', () => {
    const error = new CommandError(CommandErrorCode.NO_DATA, 'No data returned for ticker.', {
      ticker: 'ZZZZ',
    });

    expect(error.format()).toBe(
      ['Error: No data returned for ticker.', 'Code: NO_DATA', 'Context:', '  ticker: "ZZZZ"'].join('\n')
    );
  });

  it('includes the cause when verbose', () => {
    const error = new CommandError(
      CommandErrorCode.PROVIDER_ERROR,
      undefined,
      undefined,
      new Error('socket hang up')
    );

    expect(error.format(true)).toContain('Caused by:\n  socket hang up');
    expect(error.format(false)).not.toContain('Caused by');
  });

  it('serializes to JSON', () => {
    const error = new CommandError(CommandErrorCode.ANALYSIS_ERROR, 'boom', { ticker: 'AAPL' }, new TypeError('bad'));

    expect(error.toJSON()).toEqual({
      name: 'CommandError',
      code: 'ANALYSIS_ERROR',
      message: 'boom',
      context: { ticker: 'AAPL' },
      cause: { name: 'TypeError', message: 'bad' },
    });
  });
});

describe('wrapError', () => {
  it('maps domain errors to their command codes and keeps the message', () => {
    const noData = wrapError(
      new NoDataError('No data returned for ticker.', { symbol: 'ZZZZ', provider: 'yahoo' }),
      CommandErrorCode.ANALYSIS_ERROR
    );
    const provider = wrapError(
      new ProviderError('Yahoo Finance request failed: timeout', { provider: 'yahoo' }),
      CommandErrorCode.ANALYSIS_ERROR
    );

    expect(noData.code).toBe(CommandErrorCode.NO_DATA);
    expect(noData.message).toBe('No data returned for ticker.');
    expect(provider.code).toBe(CommandErrorCode.PROVIDER_ERROR);
  });

  it('uses the fallback code and message for other errors', () => {
    const wrapped = wrapError(new RangeError('oops'), CommandErrorCode.OUTPUT_ERROR, { ticker: 'AAPL' });

    expect(wrapped.code).toBe(CommandErrorCode.OUTPUT_ERROR);
    expect(wrapped.message).toBe(ERROR_MESSAGES[CommandErrorCode.OUTPUT_ERROR]);
    expect(wrapped.cause?.message).toBe('oops');
    expect(wrapped.context).toEqual({ ticker: 'AAPL' });
  });

  it('returns command errors unchanged', () => {
    const original = new CommandError(CommandErrorCode.INVALID_ARGS);

    expect(wrapError(original, CommandErrorCode.INTERNAL_ERROR)).toBe(original);
  });

  it('wraps non-error values', () => {
    expect(wrapError('text', CommandErrorCode.INTERNAL_ERROR).cause?.message).toBe('text');
  });
});

describe('formatCommandError', () => {
  it('handles plain errors and values', () => {
    expect(formatCommandError(new Error('plain'))).toBe('Error: plain');
    expect(formatCommandError(42)).toBe('Error: 42');
  });
});
