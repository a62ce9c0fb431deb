/**
 * Indicator Engine
 * Computes every indicator series for a normalized PriceSeries.
 */

import type { IndicatorSeries, PriceSeries } from '@/types/market';
import { DEFAULT_ANALYSIS_CONFIG, type IndicatorConfig } from '@/core/config';
import { lastValue } from '@/utils/numeric';
import { sma } from './rolling';
import { calculateRSI } from './rsi';
import { calculateMACD } from './macd';
import { calculateStochastic } from './stochastic';

export { sma, ema, rollingMin, rollingMax } from './rolling';
export { calculateRSI, rsiFromAverages } from './rsi';
export { calculateMACD, type MACDSeries } from './macd';
export { calculateStochastic, type StochasticSeries } from './stochastic';

export interface IndicatorSet {
  smaShort: IndicatorSeries;
  smaLong: IndicatorSeries;
  rsi: IndicatorSeries;
  macd: IndicatorSeries;
  signal: IndicatorSeries;
  histogram: IndicatorSeries;
  stochK: IndicatorSeries;
  stochD: IndicatorSeries;
}

export type LatestIndicators = { [K in keyof IndicatorSet]: number | null } & {
  close: number | null;
  date: string | null;
};

export function computeIndicators(
  series: PriceSeries,
  config: IndicatorConfig = DEFAULT_ANALYSIS_CONFIG.indicators
): IndicatorSet {
  const close = series.map((bar) => bar.close);
  const high = series.map((bar) => bar.high);
  const low = series.map((bar) => bar.low);

  const { macd, signal, histogram } = calculateMACD(
    close,
    config.macdFastSpan,
    config.macdSlowSpan,
    config.macdSignalSpan
  );
  const stochastic = calculateStochastic(
    { high, low, close },
    config.stochasticPeriod,
    config.stochasticSmoothing
  );

  return {
    smaShort: sma(close, config.smaShortWindow),
    smaLong: sma(close, config.smaLongWindow),
    rsi: calculateRSI(close, config.rsiPeriod),
    macd,
    signal,
    histogram,
    stochK: stochastic.k,
    stochD: stochastic.d,
  };
}

export function latestIndicators(series: PriceSeries, indicators: IndicatorSet): LatestIndicators {
  const lastBar = series.length > 0 ? series[series.length - 1] : null;
  return {
    date: lastBar?.date ?? null,
    close: lastBar?.close ?? null,
    smaShort: lastValue(indicators.smaShort),
    smaLong: lastValue(indicators.smaLong),
    rsi: lastValue(indicators.rsi),
    macd: lastValue(indicators.macd),
    signal: lastValue(indicators.signal),
    histogram: lastValue(indicators.histogram),
    stochK: lastValue(indicators.stochK),
    stochD: lastValue(indicators.stochD),
  };
}
