/**
 * Window primitives shared by the indicators.
 *
 * Every function returns a series index-aligned with its input. A position is
 * `null` until a full window of present values is available; partial windows are
 * never averaged.
 */

import type { IndicatorSeries } from '@/types/market';

function assertWindow(window: number): void {
  if (!Number.isInteger(window) || window < 1) {
    throw new RangeError(`window must be a positive integer, got ${window}`);
  }
}

function rollingReduce(
  values: ReadonlyArray<number | null>,
  window: number,
  reduce: (slice: number[]) => number
): IndicatorSeries {
  assertWindow(window);
  const result: IndicatorSeries = new Array<number | null>(values.length).fill(null);

  for (let i = window - 1; i < values.length; i++) {
    const slice: number[] = [];
    for (let j = i - window + 1; j <= i; j++) {
      const v = values[j];
      if (v === null) break;
      slice.push(v);
    }
    if (slice.length === window) {
      result[i] = reduce(slice);
    }
  }

  return result;
}

/**
 * Simple Moving Average: arithmetic mean of the last `window` values.
 */
export function sma(values: ReadonlyArray<number | null>, window: number): IndicatorSeries {
  return rollingReduce(values, window, (slice) => {
    let sum = 0;
    for (const v of slice) sum += v;
    return sum / window;
  });
}

export function rollingMin(values: ReadonlyArray<number | null>, window: number): IndicatorSeries {
  return rollingReduce(values, window, (slice) => Math.min(...slice));
}

export function rollingMax(values: ReadonlyArray<number | null>, window: number): IndicatorSeries {
  return rollingReduce(values, window, (slice) => Math.max(...slice));
}

/**
 * Exponential Moving Average seeded with the first value (no SMA warm-up).
 *
 * EMA[i] = EMA[i-1] + α·(x[i] - EMA[i-1]), α = 2 / (span + 1), which equals
 * x[i]·α + EMA[i-1]·(1 - α) and leaves a constant series exactly unchanged.
 */
export function ema(values: ReadonlyArray<number>, span: number): number[] {
  assertWindow(span);
  const alpha = 2 / (span + 1);
  const result: number[] = [];

  let prev: number | null = null;
  for (const value of values) {
    const next: number = prev === null ? value : prev + alpha * (value - prev);
    result.push(next);
    prev = next;
  }

  return result;
}
