/**
 * @fileoverview Performance timing utilities for measuring operation durations
 * Uses high-resolution timers (performance.now()) for accurate measurements
 */

/**
 * Performance timer for measuring operation durations
 */
export interface PerfTimer {
  /** Start time in milliseconds (high-resolution) */
  readonly startTime: number;

  /** Elapsed milliseconds since the timer started */
  elapsed(): number;

  /** Stop the timer and return the final duration in milliseconds */
  stop(): number;

  isRunning(): boolean;
}

interface TimerState {
  startTime: number;
  endTime: number | null;
}

/**
 * Create a new performance timer
 *
 * @example
 * ```typescript
 * const timer = startTimer();
 * const series = await provider.getDailyBars({ symbol: 'AAPL', years: 2 });
 * logger.info('Bars loaded', { duration_ms: timer.stop(), count: series.length });
 * ```
 */
export function startTimer(): PerfTimer {
  const state: TimerState = {
    startTime: performance.now(),
    endTime: null,
  };

  return {
    get startTime() {
      return state.startTime;
    },

    elapsed(): number {
      const endTime = state.endTime ?? performance.now();
      return Math.round(endTime - state.startTime);
    },

    stop(): number {
      if (state.endTime === null) {
        state.endTime = performance.now();
      }
      return Math.round(state.endTime - state.startTime);
    },

    isRunning(): boolean {
      return state.endTime === null;
    },
  };
}

/**
 * Measure the duration of a synchronous function
 *
 * @example
 * ```typescript
 * const { result, duration_ms } = measureSync(() => runRiskRange(series, config));
 * logger.debug('Pipeline finished', { duration_ms, rows: result.table.length });
 * ```
 */
export function measureSync<T>(fn: () => T): { result: T; duration_ms: number } {
  const timer = startTimer();
  const result = fn();
  const duration_ms = timer.stop();
  return { result, duration_ms };
}

/**
 * Measure the duration of an async function
 */
export async function measureAsync<T>(
  fn: () => Promise<T>
): Promise<{ result: T; duration_ms: number }> {
  const timer = startTimer();
  const result = await fn();
  const duration_ms = timer.stop();
  return { result, duration_ms };
}
