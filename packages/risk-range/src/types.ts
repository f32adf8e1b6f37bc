/**
 * @fileoverview Row and option types for the risk range pipeline.
 *
 * Every derived field is `number | undefined`: undefined marks a warm-up
 * position where a rolling or lagged computation has too little history.
 * Undefined means "not ready", never zero.
 *
 * @module @riskband/risk-range/types
 */

import type { PriceBar } from '@riskband/contracts';

/**
 * PriceBar extended with returns, volatility estimators, regime z-scores and
 * momentum measures.
 */
export interface IndicatorRow extends PriceBar {
  /** Simple daily return, close[t]/close[t-1] - 1 */
  readonly ret: number | undefined;
  /** Log daily return, ln close[t] - ln close[t-1] */
  readonly logRet: number | undefined;
  /** Exponentially weighted standard deviation of logRet */
  readonly volEwma: number | undefined;
  /** True range against the previous close */
  readonly tr: number | undefined;
  /** Simple moving average of the true range, price units */
  readonly atr: number | undefined;
  /** atr / close */
  readonly volAtr: number | undefined;
  /** Garman–Klass single-day volatility */
  readonly volGk: number | undefined;
  /** Volume z-score against its rolling mean/std */
  readonly volZ: number | undefined;
  /** Rolling standard deviation of volEwma */
  readonly vov: number | undefined;
  /** z-score of vov against its own rolling mean/std */
  readonly vovZ: number | undefined;
  /** 1-day rate of change (same as ret) */
  readonly roc1d: number | undefined;
  /** 20-day rate of change, close[t]/close[t-20] - 1 */
  readonly roc20d: number | undefined;
}

/**
 * IndicatorRow extended with the blended volatility and the band.
 *
 * @invariant widthPct >= 0 when defined
 * @invariant width = widthPct * close
 * @invariant upper - lower = 2 * width
 */
export interface RiskRangeRow extends IndicatorRow {
  /** Weighted average of volEwma, volGk and volAtr */
  readonly volCombined: number | undefined;
  /** Fractional half-width of the band */
  readonly widthPct: number | undefined;
  /** Half-width in price units */
  readonly width: number | undefined;
  /** Trend-tilted midpoint */
  readonly center: number | undefined;
  readonly upper: number | undefined;
  readonly lower: number | undefined;
}

/**
 * Window and decay settings of the Indicator Engine.
 */
export interface IndicatorOptions {
  /** EWMA half-life in observations */
  halfLife: number;
  /** True range averaging window */
  atrWindow: number;
  /** Volume z-score window */
  volWindow: number;
  /** Vol-of-vol window, used for both the std and its z-score */
  vovWindow: number;
}

/**
 * Blend weights of the three volatility estimators.
 * Any non-negative scale is accepted; weights are normalized to sum to 1.
 */
export interface BlendWeights {
  wEwma: number;
  wGk: number;
  wAtr: number;
}

/**
 * Settings of the Risk Range Builder.
 */
export interface BandOptions extends BlendWeights {
  /** Confidence multiplier applied to the blended volatility */
  z: number;
  /** Sensitivity of the width to the volume z-score */
  volAdj: number;
  /** Sensitivity of the width to the vol-of-vol z-score */
  vovAdj: number;
  /** Signed sensitivity of the center to the 20-day rate of change */
  tiltGamma: number;
}
