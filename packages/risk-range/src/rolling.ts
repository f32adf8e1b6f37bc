/**
 * @fileoverview Rolling-window and exponentially weighted statistics over
 * series that may contain undefined (warm-up) positions.
 *
 * @module @riskband/risk-range/rolling
 */

/**
 * A numeric series where undefined marks a missing value.
 */
export type MaybeSeries = ReadonlyArray<number | undefined>;

/**
 * A standard deviation at or below this fraction of the window mean is
 * treated as zero, so float residue on a flat window does not yield huge z-scores.
 */
const ZERO_STD_TOLERANCE = 1e-12;

/**
 * Returns the `window` values ending at `end`, or undefined if the window
 * reaches before the series start or contains a missing value.
 */
function windowAt(values: MaybeSeries, end: number, window: number): number[] | undefined {
  if (end + 1 < window) {
    return undefined;
  }

  const slice: number[] = [];
  for (let i = end - window + 1; i <= end; i++) {
    const value = values[i];
    if (value === undefined) {
      return undefined;
    }
    slice.push(value);
  }
  return slice;
}

function mean(values: readonly number[]): number {
  let sum = 0;
  for (const value of values) {
    sum += value;
  }
  return sum / values.length;
}

/**
 * Rolling arithmetic mean. Position t is defined only when the `window`
 * values ending at t are all defined.
 */
export function rollingMean(values: MaybeSeries, window: number): Array<number | undefined> {
  return values.map((_, i) => {
    const slice = windowAt(values, i, window);
    return slice ? mean(slice) : undefined;
  });
}

/**
 * Rolling sample standard deviation (n - 1 denominator).
 * A window of one value has no sample deviation and yields undefined.
 */
export function rollingStd(values: MaybeSeries, window: number): Array<number | undefined> {
  return values.map((_, i) => {
    const slice = windowAt(values, i, window);
    if (!slice || slice.length < 2) {
      return undefined;
    }

    const m = mean(slice);
    let squares = 0;
    for (const value of slice) {
      squares += (value - m) ** 2;
    }
    return Math.sqrt(squares / (slice.length - 1));
  });
}

/**
 * Rolling z-score: (x - mean) / std over the trailing window.
 *
 * Undefined when the window is incomplete or the window's standard deviation
 * is zero.
 */
export function rollingZScore(values: MaybeSeries, window: number): Array<number | undefined> {
  const means = rollingMean(values, window);
  const stds = rollingStd(values, window);

  return values.map((value, i) => {
    const m = means[i];
    const s = stds[i];
    if (value === undefined || m === undefined || s === undefined) {
      return undefined;
    }
    if (s <= ZERO_STD_TOLERANCE * Math.max(1, Math.abs(m))) {
      return undefined;
    }
    return (value - m) / s;
  });
}

/**
 * Smoothing factor for a half-life expressed in observations.
 *
 * @example
 * ```typescript
 * halfLifeToAlpha(1); // 0.5
 * ```
 */
export function halfLifeToAlpha(halfLife: number): number {
  return 1 - Math.pow(0.5, 1 / halfLife);
}

/**
 * Exponentially weighted standard deviation around an exponentially
 * weighted mean.
 *
 * Recursive form with smoothing factor alpha:
 *   m_t = m_{t-1} + alpha * (x_t - m_{t-1})
 *   v_t = (1 - alpha) * (v_{t-1} + alpha * (x_t - m_{t-1})^2)
 *
 * The state is seeded by the first defined value (m = x, v = 0), so the
 * output is 0 there and defined from then on. Later missing inputs yield
 * undefined and leave the state untouched.
 */
export function ewmStd(values: MaybeSeries, halfLife: number): Array<number | undefined> {
  const alpha = halfLifeToAlpha(halfLife);
  let m: number | undefined;
  let v = 0;

  return values.map((value) => {
    if (value === undefined) {
      return undefined;
    }
    if (m === undefined) {
      m = value;
      v = 0;
      return 0;
    }

    const delta = value - m;
    m += alpha * delta;
    v = (1 - alpha) * (v + alpha * delta * delta);
    return Math.sqrt(v);
  });
}

/**
 * Ratio change over `lag` observations: x[t] / x[t - lag] - 1.
 */
export function pctChange(values: readonly number[], lag: number): Array<number | undefined> {
  return values.map((value, i) => {
    const base = i >= lag ? values[i - lag] : undefined;
    return base === undefined ? undefined : value / base - 1;
  });
}
