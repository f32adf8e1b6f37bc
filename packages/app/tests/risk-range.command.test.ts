import { PassThrough } from 'node:stream';
import { describe, it, expect } from 'vitest';
import { NoDataError, type PriceSeries } from '@riskband/contracts';
import { createLogger } from '@riskband/logger';
import { CommandErrorCode } from '../src/commands/errors.js';
import {
  parseTickers,
  RiskRangeCommand,
  type RiskRangeCommandOptions,
  type TickerFailure,
  type TickerOutcome,
  type TickerSuccess,
} from '../src/commands/risk-range.command.js';
import { SeriesLoader } from '../src/services/series-loader.js';
import {
  createFlatBars,
  createOscillatingBars,
  createSilentLogger,
  FakeProvider,
} from './helpers.js';

const OPTIONS: RiskRangeCommandOptions = { years: 2, rows: 10, riskRange: {} };

function answer(symbol: string): PriceSeries {
  switch (symbol) {
    case 'GOOD':
    case 'ALSO':
      return createOscillatingBars(80);
    case 'FLAT':
      return createFlatBars(60);
    case 'SHORT':
      return createOscillatingBars(30);
    case 'BOOM':
      throw new Error('socket hang up');
    default:
      throw new NoDataError('No data returned for ticker.', { symbol, provider: 'fake' });
  }
}

function createCommand(provider = new FakeProvider(answer)): RiskRangeCommand {
  const logger = createSilentLogger();
  return new RiskRangeCommand({ loader: new SeriesLoader({ provider, logger }), logger });
}

function successOf(outcome: TickerOutcome | undefined): TickerSuccess {
  if (!outcome?.ok) {
    throw new Error('expected a successful outcome');
  }
  return outcome;
}

function failureOf(outcome: TickerOutcome | undefined): TickerFailure {
  if (!outcome || outcome.ok) {
    throw new Error('expected a failed outcome');
  }
  return outcome;
}

function errorCode(outcome: TickerOutcome | undefined): CommandErrorCode | undefined {
  return outcome && !outcome.ok ? outcome.error.code : undefined;
}

describe('parseTickers', () => {
  it('upper-cases, strips spaces and drops empties and repeats', () => {
    expect(parseTickers(' aapl, msft,,AAPL , b rk ')).toEqual(['AAPL', 'MSFT', 'BRK']);
  });

  it('returns an empty list for blank input', () => {
    expect(parseTickers(' , ,')).toEqual([]);
  });
});

describe('RiskRangeCommand', () => {
  it('rejects an empty ticker list', async () => {
    const result = await createCommand().execute([], OPTIONS);

    expect(result.success).toBe(false);
    expect(result.error?.code).toBe(CommandErrorCode.INVALID_ARGS);
    expect(result.error?.message).toBe('Enter at least one ticker.');
  });

  it('reports the latest row and the requested tail', async () => {
    const result = await createCommand().execute(['GOOD'], OPTIONS);
    const outcome = successOf(result.output.outcomes[0]);

    expect(result.success).toBe(true);
    expect(result.output.failed).toBe(0);
    expect(outcome.bars).toBe(80);
    expect(outcome.result.table).toHaveLength(41);
    expect(outcome.tail).toHaveLength(10);
    expect(outcome.tail[9]?.date).toBe('2024-03-21');
    expect(outcome.summary.date).toBe('2024-03-21');
    expect(outcome.summary.close).toBe(outcome.tail[9]?.Close);
  });

  it('returns the whole table when fewer rows exist than requested', async () => {
    const result = await createCommand().execute(['GOOD'], { ...OPTIONS, rows: 100 });
    const outcome = successOf(result.output.outcomes[0]);

    expect(outcome.tail).toHaveLength(41);
    expect(outcome.tail[0]?.date).toBe('2024-02-10');
  });

  it('keeps going when one ticker fails and preserves input order', async () => {
    const result = await createCommand().execute(['GOOD', 'NOPE', 'ALSO'], OPTIONS);
    const { outcomes, failed } = result.output;

    expect(result.success).toBe(false);
    expect(failed).toBe(1);
    expect(outcomes.map((outcome) => outcome.ticker)).toEqual(['GOOD', 'NOPE', 'ALSO']);
    expect(outcomes.map((outcome) => outcome.ok)).toEqual([true, false, true]);
    expect(errorCode(outcomes[1])).toBe(CommandErrorCode.NO_DATA);
    expect(failureOf(outcomes[1]).error.message).toBe('No data returned for ticker.');
  });

  it('reports a series shorter than the warm-up as insufficient data', async () => {
    const result = await createCommand().execute(['SHORT'], OPTIONS);
    const outcome = result.output.outcomes[0];

    expect(errorCode(outcome)).toBe(CommandErrorCode.INSUFFICIENT_DATA);
    expect(failureOf(outcome).error.message).toBe(
      'Need at least 40 bars for a complete row, got 30'
    );
  });

  it('blames the regime scores when a long series has constant volume', async () => {
    const result = await createCommand().execute(['FLAT'], OPTIONS);
    const outcome = result.output.outcomes[0];

    expect(errorCode(outcome)).toBe(CommandErrorCode.INSUFFICIENT_DATA);
    expect(failureOf(outcome).error.message).toBe(
      'No complete row in 60 bars: the volume or vol-of-vol z-score is never defined ' +
        '(constant volume?)'
    );
  });

  it('logs load and compute timings for each ticker', async () => {
    const stream = new PassThrough();
    const lines: string[] = [];
    stream.on('data', (chunk: Buffer) => {
      lines.push(...chunk.toString('utf-8').split('\n').filter((line) => line.length > 0));
    });
    const logger = createLogger({ level: 'info', json: true, console: false, stream });
    const command = new RiskRangeCommand({
      loader: new SeriesLoader({ provider: new FakeProvider(answer), logger }),
      logger,
    });

    await command.execute(['GOOD'], OPTIONS);
    await new Promise((resolve) => setTimeout(resolve, 20));

    const entries = lines.map((line) => {
      const entry: Record<string, unknown> = JSON.parse(line);
      return entry;
    });
    const computed = entries.find((entry) => entry['message'] === 'Risk range computed');

    expect(computed?.['ticker']).toBe('GOOD');
    expect(computed?.['bars']).toBe(80);
    expect(typeof computed?.['load_ms']).toBe('number');
    expect(typeof computed?.['compute_ms']).toBe('number');
  });

  it('maps invalid overrides to an argument error', async () => {
    const result = await createCommand().execute(['GOOD'], {
      ...OPTIONS,
      riskRange: { z: -1 },
    });

    expect(errorCode(result.output.outcomes[0])).toBe(CommandErrorCode.INVALID_ARGS);
  });

  it('hides unexpected errors behind a friendly message', async () => {
    const result = await createCommand().execute(['BOOM'], OPTIONS);
    const outcome = result.output.outcomes[0];

    expect(errorCode(outcome)).toBe(CommandErrorCode.ANALYSIS_ERROR);
    expect(failureOf(outcome).error.message).toBe('Risk range computation failed');
    expect(failureOf(outcome).error.cause?.message).toBe('socket hang up');
  });

  it('passes the lookback to the provider', async () => {
    const provider = new FakeProvider(answer);
    await createCommand(provider).execute(['GOOD'], { ...OPTIONS, years: 5 });

    expect(provider.calls).toEqual([{ symbol: 'GOOD', years: 5 }]);
  });
});
