/**
 * @fileoverview Risk Range Builder: blends the three volatility estimators,
 * scales the band width by the volume and vol-of-vol regimes, and tilts the
 * band center along recent momentum.
 *
 * @module @riskband/risk-range/risk-range
 */

import { validateBandOptions } from './config.js';
import type { BandOptions, BlendWeights, IndicatorRow, RiskRangeRow } from './types.js';

/**
 * Blend used when every supplied weight is zero.
 */
export const FALLBACK_BLEND_WEIGHTS: Readonly<BlendWeights> = {
  wEwma: 0.5,
  wGk: 0.3,
  wAtr: 0.2,
};

/**
 * Scales weights to sum to 1. All-zero weights fall back to 0.5/0.3/0.2.
 *
 * @example
 * ```typescript
 * normalizeWeights({ wEwma: 2, wGk: 1, wAtr: 1 });
 * // { wEwma: 0.5, wGk: 0.25, wAtr: 0.25 }
 * ```
 */
export function normalizeWeights(weights: BlendWeights): BlendWeights {
  const total = weights.wEwma + weights.wGk + weights.wAtr;
  if (total === 0) {
    return { ...FALLBACK_BLEND_WEIGHTS };
  }
  return {
    wEwma: weights.wEwma / total,
    wGk: weights.wGk / total,
    wAtr: weights.wAtr / total,
  };
}

function bandRow(row: IndicatorRow, options: BandOptions, weights: BlendWeights): RiskRangeRow {
  const { volEwma, volGk, volAtr } = row;

  if (volEwma === undefined || volGk === undefined || volAtr === undefined) {
    return {
      ...row,
      volCombined: undefined,
      widthPct: undefined,
      width: undefined,
      center: undefined,
      upper: undefined,
      lower: undefined,
    };
  }

  const volCombined = weights.wEwma * volEwma + weights.wGk * volGk + weights.wAtr * volAtr;

  // Missing regime scores are neutral
  const volFactor = 1 + options.volAdj * (row.volZ ?? 0);
  const vovFactor = 1 + options.vovAdj * (row.vovZ ?? 0);

  const widthPct = Math.max(0, options.z * volCombined * volFactor * vovFactor);
  const width = widthPct * row.close;
  const center = row.close + options.tiltGamma * (row.roc20d ?? 0) * width;

  return {
    ...row,
    volCombined,
    widthPct,
    width,
    center,
    upper: center + width,
    lower: center - width,
  };
}

/**
 * Builds the risk range band for every indicator row.
 *
 * Rows whose blended volatility is undefined keep undefined band fields.
 *
 * @throws {InvalidConfigurationError} If z is not positive, a weight is
 *   negative, or a value is not finite
 *
 * @example
 * ```typescript
 * const banded = buildRiskRange(rows, {
 *   z: 1.65, wEwma: 0.5, wGk: 0.3, wAtr: 0.2, volAdj: 0.15, vovAdj: 0.1, tiltGamma: 0.1
 * });
 * ```
 */
export function buildRiskRange(rows: readonly IndicatorRow[], options: BandOptions): RiskRangeRow[];
export function buildRiskRange(
  rows: readonly IndicatorRow[],
  z: number,
  wEwma: number,
  wGk: number,
  wAtr: number,
  volAdj: number,
  vovAdj: number,
  tiltGamma: number
): RiskRangeRow[];
export function buildRiskRange(
  rows: readonly IndicatorRow[],
  optionsOrZ: BandOptions | number,
  wEwma?: number,
  wGk?: number,
  wAtr?: number,
  volAdj?: number,
  vovAdj?: number,
  tiltGamma?: number
): RiskRangeRow[] {
  const options: BandOptions =
    typeof optionsOrZ === 'number'
      ? {
          z: optionsOrZ,
          wEwma: wEwma ?? Number.NaN,
          wGk: wGk ?? Number.NaN,
          wAtr: wAtr ?? Number.NaN,
          volAdj: volAdj ?? Number.NaN,
          vovAdj: vovAdj ?? Number.NaN,
          tiltGamma: tiltGamma ?? Number.NaN,
        }
      : optionsOrZ;

  validateBandOptions(options);
  const weights = normalizeWeights(options);

  return rows.map((row) => bandRow(row, options, weights));
}
