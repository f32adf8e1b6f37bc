/**
 * @fileoverview Shared fakes for app tests.
 */

import type {
  DailyBarsParams,
  DailyBarsProvider,
  PriceBar,
  PriceSeries,
  ProviderCapabilities,
} from '@riskband/contracts';
import { createLogger, type Logger } from '@riskband/logger';

/**
 * Logger with no transports.
 */
export function createSilentLogger(): Logger {
  return createLogger({ level: 'error', console: false });
}

/**
 * In-process provider answering from a per-symbol handler.
 */
export class FakeProvider implements DailyBarsProvider {
  readonly calls: DailyBarsParams[] = [];

  constructor(private readonly handler: (symbol: string) => PriceSeries) {}

  capabilities(): ProviderCapabilities {
    return {
      id: 'fake',
      maxLookbackYears: 15,
      requiresAuthentication: false,
      rateLimits: { requestsPerMinute: 1000 },
    };
  }

  async getDailyBars(params: DailyBarsParams): Promise<PriceSeries> {
    this.calls.push(params);
    return this.handler(params.symbol);
  }
}

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Drifting, oscillating daily series starting 2024-01-02.
 */
export function createOscillatingBars(count: number): PriceBar[] {
  const level = (t: number): number => 100 + 5 * Math.sin(t * 0.3) + 0.2 * t;
  const bars: PriceBar[] = [];

  for (let i = 0; i < count; i++) {
    const open = level(i - 0.5);
    const close = level(i);
    bars.push({
      date: new Date(Date.UTC(2024, 0, 2) + i * DAY_MS).toISOString().slice(0, 10),
      open,
      high: Math.max(open, close) + 1 + 0.5 * Math.abs(Math.sin(i)),
      low: Math.min(open, close) - 1 - 0.3 * Math.abs(Math.cos(i)),
      close,
      volume: Math.round(1_000_000 + 50_000 * Math.sin(i * 0.7) + 1_000 * i),
    });
  }
  return bars;
}

/**
 * Flat series; never yields a complete risk range row.
 */
export function createFlatBars(count: number): PriceBar[] {
  return createOscillatingBars(count).map((bar) => ({
    ...bar,
    open: 100,
    high: 101,
    low: 99,
    close: 100,
    volume: 1000,
  }));
}

export function stripAnsi(text: string): string {
  return text.replace(/\u001b\[[0-9;]*m/g, '');
}
