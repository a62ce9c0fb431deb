/**
 * Relative Strength Index with simple rolling averages of gains and losses.
 * Values range from 0-100:
 * - RSI > 70: overbought
 * - RSI < 30: oversold
 */

import type { IndicatorSeries } from '@/types/market';
import { clamp } from '@/utils/numeric';
import { sma } from './rolling';

export const RSI_FLAT = 50;
export const RSI_MAX = 100;

/**
 * RSI from an average gain and loss.
 * No losses means RSI 100; no movement at all means 50.
 */
export function rsiFromAverages(avgGain: number, avgLoss: number): number {
  if (avgLoss === 0) {
    return avgGain === 0 ? RSI_FLAT : RSI_MAX;
  }
  const rs = avgGain / avgLoss;
  return clamp(100 - 100 / (1 + rs), 0, 100);
}

/**
 * First defined at index `period`: the averages need `period` deltas and the
 * first bar has none.
 */
export function calculateRSI(closes: ReadonlyArray<number>, period: number = 14): IndicatorSeries {
  const gains: Array<number | null> = [];
  const losses: Array<number | null> = [];

  for (let i = 0; i < closes.length; i++) {
    if (i === 0) {
      gains.push(null);
      losses.push(null);
      continue;
    }
    const delta = closes[i] - closes[i - 1];
    gains.push(Math.max(delta, 0));
    losses.push(Math.max(-delta, 0));
  }

  const avgGain = sma(gains, period);
  const avgLoss = sma(losses, period);

  return avgGain.map((gain, i) => {
    const loss = avgLoss[i];
    if (gain === null || loss === null) return null;
    return rsiFromAverages(gain, loss);
  });
}
