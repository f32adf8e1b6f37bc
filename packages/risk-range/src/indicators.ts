/**
 * @fileoverview Indicator Engine: per-bar returns, three volatility
 * estimators, volume and vol-of-vol regime z-scores, and rates of change.
 *
 * @module @riskband/risk-range/indicators
 */

import type { PriceSeries } from '@riskband/contracts';
import { validateIndicatorOptions } from './config.js';
import { ewmStd, pctChange, rollingMean, rollingStd, rollingZScore } from './rolling.js';
import type { IndicatorOptions, IndicatorRow } from './types.js';

/** Lookback of the momentum measure used by the center tilt. */
export const ROC_LONG_LAG = 20;

const GK_CLOSE_COEFFICIENT = 2 * Math.LN2 - 1;

/**
 * Garman–Klass single-day volatility from one bar's OHLC.
 * Negative variance estimates clamp to zero.
 */
export function garmanKlass(open: number, high: number, low: number, close: number): number {
  const hl = Math.log(high / low);
  const co = Math.log(close / open);
  const variance = 0.5 * hl * hl - GK_CLOSE_COEFFICIENT * co * co;
  return Math.sqrt(Math.max(variance, 0));
}

/**
 * Computes indicator columns for every bar.
 *
 * Output length equals input length and bars keep their order. Positions
 * without enough history carry undefined.
 *
 * @throws {InvalidConfigurationError} If any window is not a positive integer
 *
 * @example
 * ```typescript
 * const rows = computeIndicators(bars, 10, 14, 20, 20);
 * const rows2 = computeIndicators(bars, { halfLife: 10, atrWindow: 14, volWindow: 20, vovWindow: 20 });
 * ```
 */
export function computeIndicators(series: PriceSeries, options: IndicatorOptions): IndicatorRow[];
export function computeIndicators(
  series: PriceSeries,
  halfLife: number,
  atrWindow: number,
  volWindow: number,
  vovWindow: number
): IndicatorRow[];
export function computeIndicators(
  series: PriceSeries,
  optionsOrHalfLife: IndicatorOptions | number,
  atrWindow?: number,
  volWindow?: number,
  vovWindow?: number
): IndicatorRow[] {
  const options: IndicatorOptions =
    typeof optionsOrHalfLife === 'number'
      ? {
          halfLife: optionsOrHalfLife,
          atrWindow: atrWindow ?? Number.NaN,
          volWindow: volWindow ?? Number.NaN,
          vovWindow: vovWindow ?? Number.NaN,
        }
      : optionsOrHalfLife;

  validateIndicatorOptions(options);

  const closes = series.map((bar) => bar.close);
  const volumes = series.map((bar) => bar.volume);

  const ret: Array<number | undefined> = [];
  const logRet: Array<number | undefined> = [];
  const tr: Array<number | undefined> = [];

  let prevClose: number | undefined;
  for (const bar of series) {
    if (prevClose === undefined) {
      ret.push(undefined);
      logRet.push(undefined);
      tr.push(undefined);
    } else {
      ret.push(bar.close / prevClose - 1);
      logRet.push(Math.log(bar.close) - Math.log(prevClose));
      tr.push(
        Math.max(
          bar.high - bar.low,
          Math.abs(bar.high - prevClose),
          Math.abs(bar.low - prevClose)
        )
      );
    }
    prevClose = bar.close;
  }

  const volEwma = ewmStd(logRet, options.halfLife);
  const atr = rollingMean(tr, options.atrWindow);
  const volZ = rollingZScore(volumes, options.volWindow);
  const vov = rollingStd(volEwma, options.vovWindow);
  const vovZ = rollingZScore(vov, options.vovWindow);
  const roc20d = pctChange(closes, ROC_LONG_LAG);

  return series.map((bar, i) => {
    const atrValue = atr[i];
    return {
      date: bar.date,
      open: bar.open,
      high: bar.high,
      low: bar.low,
      close: bar.close,
      volume: bar.volume,
      ret: ret[i],
      logRet: logRet[i],
      volEwma: volEwma[i],
      tr: tr[i],
      atr: atrValue,
      volAtr: atrValue === undefined ? undefined : atrValue / bar.close,
      volGk: garmanKlass(bar.open, bar.high, bar.low, bar.close),
      volZ: volZ[i],
      vov: vov[i],
      vovZ: vovZ[i],
      roc1d: ret[i],
      roc20d: roc20d[i],
    };
  });
}
