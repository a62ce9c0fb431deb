/**
 * Crossover Detector
 *
 * Classifies the single most recent transition between two index-aligned series:
 * a crossing happens when the order of the last two points flips strictly.
 */

import type { IndicatorSeries } from '@/types/market';
import { DEFAULT_ANALYSIS_CONFIG } from '@/core/config';

export type CrossType = 'GoldenCross' | 'DeathCross' | 'None';
export type MacdCrossover = 'Bullish' | 'Bearish' | 'None';
export type CrossDirection = 'up' | 'down' | 'none';

export interface CrossoverResult {
  crossType: CrossType;
  macdCrossover: MacdCrossover;
}

export interface CrossoverInput {
  smaShort: IndicatorSeries;
  smaLong: IndicatorSeries;
  macd: IndicatorSeries;
  signal: IndicatorSeries;
}

/**
 * Direction in which `fast` crossed `slow` between the second-to-last and last
 * points. Any missing point means no crossing.
 */
export function detectCross(fast: IndicatorSeries, slow: IndicatorSeries): CrossDirection {
  const n = Math.min(fast.length, slow.length);
  if (n < 2) return 'none';

  const prevFast = fast[n - 2];
  const prevSlow = slow[n - 2];
  const lastFast = fast[n - 1];
  const lastSlow = slow[n - 1];
  if (prevFast === null || prevSlow === null || lastFast === null || lastSlow === null) {
    return 'none';
  }

  if (prevFast < prevSlow && lastFast > lastSlow) return 'up';
  if (prevFast > prevSlow && lastFast < lastSlow) return 'down';
  return 'none';
}

/**
 * @param barCount number of bars behind the series; the moving-average cross is
 *   only reported with at least `minHistory` bars.
 */
export function detectCrossovers(
  input: CrossoverInput,
  barCount: number,
  minHistory: number = DEFAULT_ANALYSIS_CONFIG.indicators.smaLongWindow
): CrossoverResult {
  let crossType: CrossType = 'None';
  if (barCount >= minHistory) {
    const direction = detectCross(input.smaShort, input.smaLong);
    if (direction === 'up') crossType = 'GoldenCross';
    else if (direction === 'down') crossType = 'DeathCross';
  }

  const macdDirection = detectCross(input.macd, input.signal);
  const macdCrossover: MacdCrossover =
    macdDirection === 'up' ? 'Bullish' : macdDirection === 'down' ? 'Bearish' : 'None';

  return { crossType, macdCrossover };
}
