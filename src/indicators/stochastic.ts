/**
 * Stochastic Oscillator
 * %K = 100 · (close - lowest low) / (highest high - lowest low)
 * %D = SMA of %K
 */

import type { IndicatorSeries } from '@/types/market';
import { rollingMax, rollingMin, sma } from './rolling';

export interface StochasticSeries {
  k: IndicatorSeries;
  d: IndicatorSeries;
}

export interface StochasticInput {
  high: ReadonlyArray<number>;
  low: ReadonlyArray<number>;
  close: ReadonlyArray<number>;
}

export function calculateStochastic(
  input: StochasticInput,
  period: number = 14,
  smoothing: number = 3
): StochasticSeries {
  const lowest = rollingMin(input.low, period);
  const highest = rollingMax(input.high, period);

  const k: IndicatorSeries = input.close.map((close, i) => {
    const low = lowest[i];
    const high = highest[i];
    // A flat range has no defined %K.
    if (low === null || high === null || high === low) return null;
    return (100 * (close - low)) / (high - low);
  });

  return { k, d: sma(k, smoothing) };
}
