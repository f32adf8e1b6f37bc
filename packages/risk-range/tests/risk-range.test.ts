/**
 * @fileoverview Risk Range Builder tests.
 */

import { describe, it, expect } from 'vitest';
import { isInvalidConfigurationError } from '@riskband/contracts';
import { buildRiskRange, normalizeWeights } from '../src/risk-range.js';
import type { BandOptions, IndicatorRow } from '../src/types.js';
import { dateAt } from './fixtures.js';

const OPTIONS: BandOptions = {
  z: 1.65,
  wEwma: 0.5,
  wGk: 0.3,
  wAtr: 0.2,
  volAdj: 0.15,
  vovAdj: 0.1,
  tiltGamma: 0.1,
};

function createIndicatorRow(overrides: Partial<IndicatorRow> = {}): IndicatorRow {
  return {
    date: dateAt(0),
    open: 100,
    high: 101,
    low: 99,
    close: 100,
    volume: 1000,
    ret: 0,
    logRet: 0,
    volEwma: 0.01,
    tr: 2,
    atr: 3,
    volAtr: 0.03,
    volGk: 0.02,
    volZ: 0,
    vovZ: 0,
    vov: 0.001,
    roc1d: 0,
    roc20d: 0,
    ...overrides,
  };
}

function expectThrowsInvalidConfiguration(fn: () => unknown): void {
  let caught: unknown;
  try {
    fn();
  } catch (error) {
    caught = error;
  }
  expect(isInvalidConfigurationError(caught)).toBe(true);
}

describe('normalizeWeights', () => {
  it('scales weights to sum to one', () => {
    expect(normalizeWeights({ wEwma: 2, wGk: 1, wAtr: 1 })).toEqual({ wEwma: 0.5, wGk: 0.25, wAtr: 0.25 });
  });

  it('falls back to the default blend when every weight is zero', () => {
    expect(normalizeWeights({ wEwma: 0, wGk: 0, wAtr: 0 })).toEqual({ wEwma: 0.5, wGk: 0.3, wAtr: 0.2 });
  });
});

describe('buildRiskRange', () => {
  it('blends the estimators and centers the band on the close without momentum', () => {
    const [row] = buildRiskRange([createIndicatorRow()], OPTIONS);

    expect(row?.volCombined).toBeCloseTo(0.017, 12);
    expect(row?.widthPct).toBeCloseTo(1.65 * 0.017, 12);
    expect(row?.width).toBeCloseTo(2.805, 10);
    expect(row?.center).toBe(100);
    expect(row?.upper).toBeCloseTo(102.805, 10);
    expect(row?.lower).toBeCloseTo(97.195, 10);
  });

  it('treats missing regime scores as neutral', () => {
    const [scored] = buildRiskRange([createIndicatorRow()], OPTIONS);
    const [missing] = buildRiskRange([createIndicatorRow({ volZ: undefined, vovZ: undefined })], OPTIONS);

    expect(missing?.widthPct).toBe(scored?.widthPct);
    expect(missing?.center).toBe(scored?.center);
  });

  it('scales the width by the volume and vol-of-vol regimes', () => {
    const [neutral] = buildRiskRange([createIndicatorRow()], OPTIONS);
    const [stressed] = buildRiskRange([createIndicatorRow({ volZ: 2, vovZ: -1 })], OPTIONS);

    expect(stressed?.widthPct).toBeCloseTo((neutral?.widthPct ?? Number.NaN) * 1.3 * 0.9, 12);
  });

  it('clamps a negative width to zero', () => {
    const [row] = buildRiskRange([createIndicatorRow({ volZ: -10 })], OPTIONS);

    expect(row?.widthPct).toBe(0);
    expect(row?.width).toBe(0);
    expect(row?.upper).toBe(100);
    expect(row?.lower).toBe(100);
  });

  it('tilts the center along the 20-day rate of change', () => {
    const [up] = buildRiskRange([createIndicatorRow({ roc20d: 0.1 })], OPTIONS);
    const [down] = buildRiskRange([createIndicatorRow({ roc20d: 0.1 })], { ...OPTIONS, tiltGamma: -0.1 });
    const width = up?.width ?? Number.NaN;

    expect(up?.center).toBeCloseTo(100 + 0.01 * width, 12);
    expect(down?.center).toBeCloseTo(100 - 0.01 * width, 12);
    expect((up?.upper ?? 0) - (up?.lower ?? 0)).toBeCloseTo(2 * width, 10);
  });

  it('leaves the band undefined when any estimator is undefined', () => {
    const [row] = buildRiskRange([createIndicatorRow({ volAtr: undefined })], OPTIONS);

    expect(row?.volCombined).toBeUndefined();
    expect(row?.widthPct).toBeUndefined();
    expect(row?.width).toBeUndefined();
    expect(row?.center).toBeUndefined();
    expect(row?.upper).toBeUndefined();
    expect(row?.lower).toBeUndefined();
  });

  it('behaves like the default blend when every weight is zero', () => {
    const rows = [createIndicatorRow(), createIndicatorRow({ volZ: 1.2, roc20d: -0.05 })];

    expect(buildRiskRange(rows, { ...OPTIONS, wEwma: 0, wGk: 0, wAtr: 0 })).toEqual(
      buildRiskRange(rows, OPTIONS)
    );
  });

  it('normalizes weights of any scale', () => {
    const rows = [createIndicatorRow({ volZ: 0.7 })];
    const scaled = buildRiskRange(rows, { ...OPTIONS, wEwma: 5, wGk: 3, wAtr: 2 });
    const unit = buildRiskRange(rows, OPTIONS);

    expect(scaled[0]?.widthPct).toBeCloseTo(unit[0]?.widthPct ?? Number.NaN, 12);
  });

  it('accepts positional settings', () => {
    const rows = [createIndicatorRow({ volZ: 0.4, vovZ: 1.1, roc20d: 0.03 })];

    expect(buildRiskRange(rows, 1.65, 0.5, 0.3, 0.2, 0.15, 0.1, 0.1)).toEqual(buildRiskRange(rows, OPTIONS));
  });

  it('rejects a non-positive z', () => {
    expectThrowsInvalidConfiguration(() => buildRiskRange([], { ...OPTIONS, z: 0 }));
    expectThrowsInvalidConfiguration(() => buildRiskRange([], { ...OPTIONS, z: -1.65 }));
  });

  it('rejects negative weights', () => {
    expectThrowsInvalidConfiguration(() => buildRiskRange([], { ...OPTIONS, wGk: -0.1 }));
  });

  it('rejects non-finite adjustments', () => {
    expectThrowsInvalidConfiguration(() => buildRiskRange([], { ...OPTIONS, tiltGamma: Number.POSITIVE_INFINITY }));
  });
});
