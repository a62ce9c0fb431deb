/**
 * Long-horizon price movement over the supplied history.
 */

import type { PriceSeries } from '@/types/market';
import { DEFAULT_ANALYSIS_CONFIG, type PriceMovementConfig } from '@/core/config';
import { safeDivide } from '@/utils/numeric';

export type PriceTrend = 'significant_growth' | 'limited_or_decline';

export type PriceMovement =
  | { status: 'no_data' }
  | {
      status: 'measured';
      startDate: string;
      endDate: string;
      startPrice: number;
      endPrice: number;
      changePct: number | null;
      trend: PriceTrend | null;
    };

export function analyzePriceMovement(
  series: PriceSeries,
  config: PriceMovementConfig = DEFAULT_ANALYSIS_CONFIG.priceMovement
): PriceMovement {
  if (series.length === 0) return { status: 'no_data' };

  const first = series[0];
  const last = series[series.length - 1];
  const ratio = safeDivide(last.close - first.close, first.close);
  const changePct = ratio === null ? null : ratio * 100;

  return {
    status: 'measured',
    startDate: first.date,
    endDate: last.date,
    startPrice: first.close,
    endPrice: last.close,
    changePct,
    trend:
      changePct === null
        ? null
        : changePct > config.growthThresholdPct
          ? 'significant_growth'
          : 'limited_or_decline',
  };
}
