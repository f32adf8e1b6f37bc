/**
 * Risk range report formatter
 * Text and JSON output with deterministic layout
 */

import { PROJECTED_COLUMNS, type ProjectedColumn, type ProjectedTable } from '@riskband/risk-range';
import type { TickerFailure, TickerSuccess } from '../commands/risk-range.command.js';

export type OutputFormat = 'text' | 'json';

/**
 * How the band is built, printed under each ticker's table.
 */
export const METHOD_CAPTION =
  'Method: Bands = center ± width. Width = Z * CombinedVol * (1 + α·VolZ) * (1 + β·VoV_Z). ' +
  'Center = Close + γ · ROC(20d) · width.';

/**
 * Formatter for per-ticker risk range results
 */
export class RiskRangeFormatter {
  /**
   * Format a successful ticker in the specified format
   */
  format(outcome: TickerSuccess, format: OutputFormat = 'text'): string {
    switch (format) {
      case 'json':
        return this.formatAsJSON(outcome);
      case 'text':
      default:
        return this.formatAsText(outcome);
    }
  }

  /**
   * Headline metrics of the latest complete row
   */
  formatSummary(outcome: TickerSuccess): string {
    const { summary } = outcome;
    const lines: string[] = [];

    lines.push(`Risk Range: ${outcome.ticker} - ${summary.date}`);
    lines.push('='.repeat(50));
    lines.push(`  Close:      ${this.formatPrice(summary.close)}`);
    lines.push(
      `  Risk Range: ${this.formatPrice(summary.lower)} – ${this.formatPrice(summary.upper)}`
    );
    lines.push(`  Width %:    ${summary.widthPct.toFixed(2)}%`);
    lines.push(`  Daily ROC:  ${summary.roc1dPct.toFixed(2)}%`);

    return lines.join('\n');
  }

  /**
   * Box table of the given rows, Date first
   */
  formatTable(rows: ProjectedTable): string {
    const headers = ['Date', ...PROJECTED_COLUMNS];
    const body = rows.map((row) => [
      row.date,
      ...PROJECTED_COLUMNS.map((column) => this.formatCell(column, row[column])),
    ]);

    const widths = headers.map((header, i) =>
      Math.max(header.length, ...body.map((cells) => (cells[i] ?? '').length))
    );

    const rule = (left: string, mid: string, right: string): string =>
      left + widths.map((width) => '─'.repeat(width + 2)).join(mid) + right;
    const line = (cells: string[], alignNumbers: boolean): string =>
      '│ ' +
      cells
        .map((cell, i) => {
          const width = widths[i] ?? cell.length;
          return alignNumbers && i > 0 ? cell.padStart(width) : cell.padEnd(width);
        })
        .join(' │ ') +
      ' │';

    const lines: string[] = [];
    lines.push(rule('┌', '┬', '┐'));
    lines.push(line(headers, false));
    lines.push(rule('├', '┼', '┤'));
    for (const cells of body) {
      lines.push(line(cells, true));
    }
    lines.push(rule('└', '┴', '┘'));

    return lines.join('\n');
  }

  /**
   * Plain object form of a successful ticker
   */
  toJSON(outcome: TickerSuccess): Record<string, unknown> {
    return {
      ticker: outcome.ticker,
      bars: outcome.bars,
      summary: outcome.summary,
      config: outcome.result.config,
      rows: outcome.tail,
    };
  }

  /**
   * One-line failure message
   */
  formatFailure(outcome: TickerFailure): string {
    return `Error for ${outcome.ticker}: ${outcome.error.message}`;
  }

  private formatAsText(outcome: TickerSuccess): string {
    return [
      this.formatSummary(outcome),
      '',
      this.formatTable(outcome.tail),
      '',
      METHOD_CAPTION,
    ].join('\n');
  }

  private formatAsJSON(outcome: TickerSuccess): string {
    return JSON.stringify(this.toJSON(outcome), null, 2);
  }

  private formatCell(column: ProjectedColumn, value: number): string {
    return column === 'Volume' ? String(Math.round(value)) : value.toFixed(2);
  }

  private formatPrice(price: number): string {
    return price.toFixed(2);
  }
}
