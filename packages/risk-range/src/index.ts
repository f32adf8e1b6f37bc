/**
 * @fileoverview Public API of the risk range core.
 * @module @riskband/risk-range
 */

export type {
  IndicatorRow,
  RiskRangeRow,
  IndicatorOptions,
  BlendWeights,
  BandOptions,
} from './types.js';

export type { RiskRangeConfig } from './config.js';
export {
  DEFAULT_RISK_RANGE_CONFIG,
  RISK_RANGE_CONFIG_KEYS,
  validateIndicatorOptions,
  validateBandOptions,
  validateRiskRangeConfig,
  mergeRiskRangeConfig,
} from './config.js';

export type { MaybeSeries } from './rolling.js';
export {
  rollingMean,
  rollingStd,
  rollingZScore,
  ewmStd,
  halfLifeToAlpha,
  pctChange,
} from './rolling.js';

export { computeIndicators, garmanKlass, ROC_LONG_LAG } from './indicators.js';
export { buildRiskRange, normalizeWeights, FALLBACK_BLEND_WEIGHTS } from './risk-range.js';

export type { ProjectedColumn, ProjectedRow, ProjectedTable } from './projection.js';
export { PROJECTED_COLUMNS, projectTable, tailRows } from './projection.js';

export type { RiskRangeResult, LatestSummary } from './pipeline.js';
export { runRiskRange, summarizeLatest, requiredWarmup } from './pipeline.js';
