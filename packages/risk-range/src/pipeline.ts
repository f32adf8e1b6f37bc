/**
 * @fileoverview End-to-end pipeline: series in, banded rows and display
 * table out.
 *
 * @module @riskband/risk-range/pipeline
 */

import type { PriceSeries } from '@riskband/contracts';
import { mergeRiskRangeConfig, type RiskRangeConfig } from './config.js';
import { computeIndicators, ROC_LONG_LAG } from './indicators.js';
import { projectTable, type ProjectedRow, type ProjectedTable } from './projection.js';
import { buildRiskRange } from './risk-range.js';
import type { RiskRangeRow } from './types.js';

/**
 * Result of one pipeline run.
 */
export interface RiskRangeResult {
  /** Effective configuration after merging with defaults */
  config: RiskRangeConfig;
  /** Every input bar with indicator and band fields */
  rows: RiskRangeRow[];
  /** Fully defined display rows */
  table: ProjectedTable;
  /** Last display row, undefined when the table is empty */
  latest: ProjectedRow | undefined;
}

/**
 * Headline numbers of the latest display row. Percent fields are already
 * multiplied by 100.
 */
export interface LatestSummary {
  date: string;
  close: number;
  lower: number;
  upper: number;
  widthPct: number;
  roc1dPct: number;
}

/**
 * First bar index at which a display row can exist for `config`.
 * A series needs at least `requiredWarmup(config) + 1` bars.
 */
export function requiredWarmup(config: RiskRangeConfig): number {
  return Math.max(
    config.atrWindow,
    config.volWindow - 1,
    2 * config.vovWindow - 1,
    ROC_LONG_LAG
  );
}

/**
 * Runs indicators, band construction and projection in one call.
 *
 * @throws {InvalidConfigurationError} If the merged configuration is invalid
 *
 * @example
 * ```typescript
 * const { table, latest } = runRiskRange(bars, { z: 1.96 });
 * ```
 */
export function runRiskRange(
  series: PriceSeries,
  config: Partial<RiskRangeConfig> = {}
): RiskRangeResult {
  const effective = mergeRiskRangeConfig(config);
  const rows = buildRiskRange(computeIndicators(series, effective), effective);
  const table = projectTable(rows);

  return {
    config: effective,
    rows,
    table,
    latest: table[table.length - 1],
  };
}

export function summarizeLatest(result: RiskRangeResult): LatestSummary | undefined {
  const { latest } = result;
  if (!latest) {
    return undefined;
  }
  return {
    date: latest.date,
    close: latest.Close,
    lower: latest.Lower,
    upper: latest.Upper,
    widthPct: latest['Width_%'],
    roc1dPct: latest['ROC_1d_%'],
  };
}
