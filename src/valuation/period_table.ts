/**
 * Builds the per-period valuation table from a fundamentals snapshot.
 */

import type { FinancialPeriod, FundamentalsSnapshot, PriceSeries } from '@/types/market';
import { compareDates, daysBetween } from '@/core/time';
import { toFiniteNumber } from '@/utils/numeric';
import { calculateValuationRow, type ValuationRow } from './ratios';

/**
 * Close of the first bar dated on or after `periodEnd`, provided it falls within
 * `maxLagDays` of it; `null` otherwise. Expects a normalized (chronological) series.
 */
export function resolvePeriodClosePrice(
  periodEnd: string,
  series: PriceSeries,
  maxLagDays: number
): number | null {
  const bar = series.find((b) => compareDates(b.date, periodEnd) >= 0);
  if (!bar) return null;
  const lag = daysBetween(periodEnd, bar.date);
  if (lag === null || lag > maxLagDays) return null;
  return toFiniteNumber(bar.close);
}

/** Newest first, truncated to `maxPeriods`. */
export function selectRecentPeriods(
  periods: ReadonlyArray<FinancialPeriod>,
  maxPeriods: number
): FinancialPeriod[] {
  return [...periods]
    .sort((a, b) => compareDates(b.periodEnd, a.periodEnd))
    .slice(0, maxPeriods);
}

/**
 * Each period is computed on its own; a sparse period only yields a sparse row.
 * The period's own price and share count win over the resolved price and the
 * snapshot-level share count.
 */
export function buildValuationTable(
  fundamentals: FundamentalsSnapshot,
  priceHistory: PriceSeries,
  options: { maxPeriods: number; maxPriceLagDays: number }
): ValuationRow[] {
  return selectRecentPeriods(fundamentals.periods, options.maxPeriods).map((period) => {
    const closePrice =
      toFiniteNumber(period.periodClosePrice) ??
      resolvePeriodClosePrice(period.periodEnd, priceHistory, options.maxPriceLagDays);
    const sharesOutstanding =
      toFiniteNumber(period.sharesOutstanding) ?? toFiniteNumber(fundamentals.sharesOutstanding);

    return calculateValuationRow(period, { closePrice, sharesOutstanding });
  });
}
