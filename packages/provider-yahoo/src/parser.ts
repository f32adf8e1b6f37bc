/**
 * @fileoverview Parser for Yahoo Finance chart responses.
 *
 * Converts the column-oriented chart payload into date-ordered PriceBar rows.
 *
 * @module @riskband/provider-yahoo/parser
 */

import type { PriceBar } from '@riskband/contracts';
import type { ParsedChart, YahooChartResponse } from './types.js';

function isPositivePrice(value: number | null | undefined): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value > 0;
}

function isVolume(value: number | null | undefined): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0;
}

/**
 * Session date (YYYY-MM-DD) of an epoch-seconds timestamp, in exchange time.
 *
 * @example
 * ```typescript
 * toSessionDate(1704205800, -18000); // '2024-01-02'
 * ```
 */
export function toSessionDate(epochSeconds: number, gmtOffsetSeconds = 0): string {
  return new Date((epochSeconds + gmtOffsetSeconds) * 1000).toISOString().slice(0, 10);
}

/**
 * Parses a chart response into daily bars.
 *
 * - Rows with any missing, non-finite or non-positive OHLC value are dropped
 * - Rows with a missing, non-finite or negative volume are dropped
 * - Output is sorted by date; for a repeated date the later row wins
 *
 * A response without a result yields no bars.
 *
 * @example
 * ```typescript
 * const { bars, dropped } = parseChartResponse(response);
 * ```
 */
export function parseChartResponse(response: YahooChartResponse): ParsedChart {
  const result = response.chart?.result?.[0];
  const timestamps = result?.timestamp;
  const quote = result?.indicators?.quote?.[0];

  if (!result || !timestamps || !quote) {
    return { bars: [], dropped: 0 };
  }

  const gmtOffset = result.meta?.gmtoffset ?? 0;
  const byDate = new Map<string, PriceBar>();
  let dropped = 0;

  timestamps.forEach((timestamp, i) => {
    const open = quote.open?.[i];
    const high = quote.high?.[i];
    const low = quote.low?.[i];
    const close = quote.close?.[i];
    const volume = quote.volume?.[i];

    if (
      !isPositivePrice(open) ||
      !isPositivePrice(high) ||
      !isPositivePrice(low) ||
      !isPositivePrice(close) ||
      !isVolume(volume)
    ) {
      dropped++;
      return;
    }

    const date = toSessionDate(timestamp, gmtOffset);
    byDate.set(date, {
      date,
      open,
      high,
      low,
      close,
      volume,
    });
  });

  const bars = [...byDate.values()].sort((a, b) => a.date.localeCompare(b.date));
  return { bars, dropped };
}
