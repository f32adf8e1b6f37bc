/**
 * CSV output for projected risk range tables
 *
 * @module @riskband/app/formatters/csv
 */

import { PROJECTED_COLUMNS, type ProjectedTable } from '@riskband/risk-range';

const EXPONENT_FORM = /^(-?)(\d)(?:\.(\d+))?e([+-]\d+)$/;

/**
 * Number as a plain decimal string, never in exponent notation. The digits
 * are those of the shortest round-trip form, so `Number(formatCsvNumber(v))`
 * is `v` again.
 *
 * @example
 * formatCsvNumber(0.0000001) // '0.0000001'
 * formatCsvNumber(12.5)      // '12.5'
 * formatCsvNumber(1e21)      // '1000000000000000000000'
 */
export function formatCsvNumber(value: number): string {
  const text = String(value);
  const match = EXPONENT_FORM.exec(text);
  if (!match) {
    return text;
  }

  const sign = match[1] ?? '';
  const digits = (match[2] ?? '') + (match[3] ?? '');
  const exponent = Number(match[4]);

  if (exponent < 0) {
    return `${sign}0.${'0'.repeat(-exponent - 1)}${digits}`;
  }

  const point = exponent + 1;
  if (digits.length <= point) {
    return sign + digits.padEnd(point, '0');
  }
  return `${sign}${digits.slice(0, point)}.${digits.slice(point)}`;
}

/**
 * Format a projected table as CSV
 *
 * Header is `Date` followed by the display columns in order; one line per
 * row, newline-terminated.
 *
 * @example
 * const csv = formatCsv(result.table);
 * // Date,Open,High,Low,Close,Volume,Upper,...
 * // 2024-03-01,179.55,180.53,177.38,179.66,73488000,183.93,...
 */
export function formatCsv(table: ProjectedTable): string {
  const header = ['Date', ...PROJECTED_COLUMNS].join(',');
  const lines = table.map((row) =>
    [row.date, ...PROJECTED_COLUMNS.map((column) => formatCsvNumber(row[column]))].join(',')
  );

  return [header, ...lines].join('\n') + '\n';
}

/**
 * CSV file name for a ticker
 */
export function csvFileName(ticker: string): string {
  return `${ticker}_risk_range.csv`;
}
