/**
 * PriceSeries normalization: chronological order, one bar per date, usable prices.
 */

import type { Bar, PriceSeries } from '@/types/market';
import { compareDates, isValidDateString } from '@/core/time';

export interface SeriesIssues {
  reordered: boolean;
  duplicateDates: number;
  droppedBars: number;
}

export interface NormalizedSeries {
  series: PriceSeries;
  issues: SeriesIssues;
}

function isUsableBar(bar: Bar): boolean {
  return (
    isValidDateString(bar.date) &&
    Number.isFinite(bar.close) &&
    Number.isFinite(bar.high) &&
    Number.isFinite(bar.low)
  );
}

/**
 * Sorts by date, keeps the last bar supplied for a repeated date, and drops bars
 * without a valid date or a finite close/high/low.
 */
export function normalizePriceSeries(bars: ReadonlyArray<Bar>): NormalizedSeries {
  const usable = bars.filter(isUsableBar);
  const droppedBars = bars.length - usable.length;

  let reordered = false;
  for (let i = 1; i < usable.length; i++) {
    if (compareDates(usable[i - 1].date, usable[i].date) > 0) {
      reordered = true;
      break;
    }
  }

  const byDate = new Map<string, Bar>();
  for (const bar of usable) {
    byDate.set(bar.date, bar);
  }
  const duplicateDates = usable.length - byDate.size;

  const series = [...byDate.values()].sort((a, b) => compareDates(a.date, b.date));

  return { series, issues: { reordered, duplicateDates, droppedBars } };
}

export function hasIssues(issues: SeriesIssues): boolean {
  return issues.reordered || issues.duplicateDates > 0 || issues.droppedBars > 0;
}
