/**
 * @fileoverview Output Projection: selects, renames and percent-scales the
 * display columns and keeps only fully defined rows.
 *
 * @module @riskband/risk-range/projection
 */

import type { RiskRangeRow } from './types.js';

/**
 * Display columns in output order. Labels ending in `_%` hold fractions
 * multiplied by 100.
 */
export const PROJECTED_COLUMNS = [
  'Open',
  'High',
  'Low',
  'Close',
  'Volume',
  'Upper',
  'Lower',
  'Width',
  'VolZ',
  'VoV_Z',
  'Width_%',
  'Vol_EWMA_%',
  'Vol_GK_%',
  'Vol_ATR_%',
  'Vol_Combined_%',
  'ROC_1d_%',
  'ROC_20d_%',
] as const;

export type ProjectedColumn = (typeof PROJECTED_COLUMNS)[number];

/**
 * One display row, keyed by date, every column defined.
 */
export type ProjectedRow = { readonly date: string } & { readonly [K in ProjectedColumn]: number };

export type ProjectedTable = ProjectedRow[];

const PERCENT = 100;

function projectRow(row: RiskRangeRow): ProjectedRow | undefined {
  const {
    upper,
    lower,
    width,
    volZ,
    vovZ,
    widthPct,
    volEwma,
    volGk,
    volAtr,
    volCombined,
    roc1d,
    roc20d,
  } = row;

  if (
    upper === undefined ||
    lower === undefined ||
    width === undefined ||
    volZ === undefined ||
    vovZ === undefined ||
    widthPct === undefined ||
    volEwma === undefined ||
    volGk === undefined ||
    volAtr === undefined ||
    volCombined === undefined ||
    roc1d === undefined ||
    roc20d === undefined
  ) {
    return undefined;
  }

  return {
    date: row.date,
    Open: row.open,
    High: row.high,
    Low: row.low,
    Close: row.close,
    Volume: row.volume,
    Upper: upper,
    Lower: lower,
    Width: width,
    VolZ: volZ,
    VoV_Z: vovZ,
    'Width_%': widthPct * PERCENT,
    'Vol_EWMA_%': volEwma * PERCENT,
    'Vol_GK_%': volGk * PERCENT,
    'Vol_ATR_%': volAtr * PERCENT,
    'Vol_Combined_%': volCombined * PERCENT,
    'ROC_1d_%': roc1d * PERCENT,
    'ROC_20d_%': roc20d * PERCENT,
  };
}

/**
 * Projects risk range rows onto the display columns, dropping every row
 * with an undefined column. Order is preserved.
 */
export function projectTable(rows: readonly RiskRangeRow[]): ProjectedTable {
  const table: ProjectedTable = [];
  for (const row of rows) {
    const projected = projectRow(row);
    if (projected) {
      table.push(projected);
    }
  }
  return table;
}

/**
 * Last `count` rows of a table, oldest first. Non-positive counts yield an
 * empty table.
 */
export function tailRows<T>(table: readonly T[], count: number): T[] {
  if (count <= 0) {
    return [];
  }
  return table.slice(Math.max(0, table.length - count));
}
