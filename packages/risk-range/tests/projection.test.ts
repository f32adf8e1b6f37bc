/**
 * @fileoverview Output Projection tests.
 */

import { describe, it, expect } from 'vitest';
import { PROJECTED_COLUMNS, projectTable, tailRows } from '../src/projection.js';
import type { RiskRangeRow } from '../src/types.js';
import { dateAt } from './fixtures.js';

function createBandRow(index: number, overrides: Partial<RiskRangeRow> = {}): RiskRangeRow {
  return {
    date: dateAt(index),
    open: 100,
    high: 102,
    low: 98,
    close: 101,
    volume: 5000,
    ret: 0.01,
    logRet: Math.log(1.01),
    volEwma: 0.012,
    tr: 4,
    atr: 3.5,
    volAtr: 3.5 / 101,
    volGk: 0.015,
    volZ: 0.8,
    vov: 0.002,
    vovZ: -0.4,
    roc1d: 0.01,
    roc20d: 0.05,
    volCombined: 0.014,
    widthPct: 0.025,
    width: 2.525,
    center: 101.0125,
    upper: 103.5375,
    lower: 98.4875,
    ...overrides,
  };
}

describe('PROJECTED_COLUMNS', () => {
  it('lists the display columns in output order', () => {
    expect(PROJECTED_COLUMNS).toEqual([
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
    ]);
  });
});

describe('projectTable', () => {
  it('renames columns and copies price fields unchanged', () => {
    const [row] = projectTable([createBandRow(0)]);

    expect(row?.date).toBe(dateAt(0));
    expect(row?.Open).toBe(100);
    expect(row?.High).toBe(102);
    expect(row?.Low).toBe(98);
    expect(row?.Close).toBe(101);
    expect(row?.Volume).toBe(5000);
    expect(row?.Upper).toBe(103.5375);
    expect(row?.Lower).toBe(98.4875);
    expect(row?.Width).toBe(2.525);
    expect(row?.VolZ).toBe(0.8);
    expect(row?.VoV_Z).toBe(-0.4);
  });

  it('multiplies fractional columns by 100', () => {
    const source = createBandRow(0);
    const [row] = projectTable([source]);
    const pairs: Array<[number | undefined, number | undefined]> = [
      [row?.['Width_%'], source.widthPct],
      [row?.['Vol_EWMA_%'], source.volEwma],
      [row?.['Vol_GK_%'], source.volGk],
      [row?.['Vol_ATR_%'], source.volAtr],
      [row?.['Vol_Combined_%'], source.volCombined],
      [row?.['ROC_1d_%'], source.roc1d],
      [row?.['ROC_20d_%'], source.roc20d],
    ];

    for (const [percent, fraction] of pairs) {
      expect((percent ?? Number.NaN) / 100).toBeCloseTo(fraction ?? Number.NaN, 12);
    }
  });

  it('drops rows with any undefined column and keeps order', () => {
    const table = projectTable([
      createBandRow(0, { vovZ: undefined }),
      createBandRow(1),
      createBandRow(2, { upper: undefined }),
      createBandRow(3),
      createBandRow(4, { roc20d: undefined }),
    ]);

    expect(table.map((row) => row.date)).toEqual([dateAt(1), dateAt(3)]);
  });

  it('yields an empty table when no row is complete', () => {
    expect(projectTable([createBandRow(0, { volZ: undefined })])).toEqual([]);
  });
});

describe('tailRows', () => {
  const rows = [1, 2, 3, 4, 5];

  it('returns the last n rows oldest first', () => {
    expect(tailRows(rows, 2)).toEqual([4, 5]);
  });

  it('returns everything when n exceeds the length', () => {
    expect(tailRows(rows, 60)).toEqual([1, 2, 3, 4, 5]);
  });

  it('returns nothing for a non-positive n', () => {
    expect(tailRows(rows, 0)).toEqual([]);
  });
});
