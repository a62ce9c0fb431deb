/**
 * Moving Average Convergence Divergence
 * - MACD line: fast EMA - slow EMA
 * - Signal line: EMA of the MACD line
 * - Histogram: MACD - Signal
 */

import { ema } from './rolling';

export interface MACDSeries {
  macd: number[];
  signal: number[];
  histogram: number[];
}

export function calculateMACD(
  closes: ReadonlyArray<number>,
  fastSpan: number = 12,
  slowSpan: number = 26,
  signalSpan: number = 9
): MACDSeries {
  const fast = ema(closes, fastSpan);
  const slow = ema(closes, slowSpan);
  const macd = fast.map((value, i) => value - slow[i]);
  const signal = ema(macd, signalSpan);
  const histogram = macd.map((value, i) => value - signal[i]);

  return { macd, signal, histogram };
}
