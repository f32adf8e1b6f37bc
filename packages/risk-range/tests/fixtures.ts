/**
 * @fileoverview Deterministic bar series for risk range tests.
 */

import type { PriceBar } from '@riskband/contracts';

const DAY_MS = 24 * 60 * 60 * 1000;
const BASE_TIME = Date.UTC(2024, 0, 2);

/**
 * YYYY-MM-DD for the i-th calendar day after 2024-01-02.
 */
export function dateAt(index: number): string {
  return new Date(BASE_TIME + index * DAY_MS).toISOString().slice(0, 10);
}

/**
 * Flat series: open = close = 100, high = 101, low = 99, volume = 1000.
 */
export function createConstantBars(count: number): PriceBar[] {
  const bars: PriceBar[] = [];
  for (let i = 0; i < count; i++) {
    bars.push({ date: dateAt(i), open: 100, high: 101, low: 99, close: 100, volume: 1000 });
  }
  return bars;
}

/**
 * Drifting, oscillating series with varying volume.
 */
export function createOscillatingBars(count: number): PriceBar[] {
  const bars: PriceBar[] = [];
  const level = (t: number): number => 100 + 5 * Math.sin(t * 0.3) + 0.2 * t;

  for (let i = 0; i < count; i++) {
    const open = level(i - 0.5);
    const close = level(i);
    bars.push({
      date: dateAt(i),
      open,
      high: Math.max(open, close) + 1 + 0.5 * Math.abs(Math.sin(i)),
      low: Math.min(open, close) - 1 - 0.3 * Math.abs(Math.cos(i)),
      close,
      volume: Math.round(1_000_000 + 50_000 * Math.sin(i * 0.7) + 1_000 * i),
    });
  }
  return bars;
}
