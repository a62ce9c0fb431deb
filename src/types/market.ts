/**
 * Market data shapes consumed by the analysis engine.
 * Missing figures are always `null`, never 0.
 */

export interface Bar {
  date: string; // yyyy-MM-dd
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

/** Chronological bars with strictly increasing dates. */
export type PriceSeries = Bar[];

/** Index-aligned with a PriceSeries; `null` where the lookback is incomplete. */
export type IndicatorSeries = Array<number | null>;

export interface FinancialPeriod {
  periodEnd: string; // fiscal year-end, yyyy-MM-dd
  netIncome: number | null;
  totalDebt: number | null;
  totalEquity: number | null;
  totalRevenue: number | null;
  cashFromOps: number | null;
  capitalExpenditures: number | null; // usually <= 0
  sharesOutstanding?: number | null;
  periodClosePrice?: number | null;
}

/** Point-in-time quote fields, passed through to the report unmodified. */
export interface QuoteSnapshot {
  marketCap: number | null;
  peRatio: number | null;
  eps: number | null;
  dividendYield: number | null;
  high52Week: number | null;
  low52Week: number | null;
}

export interface FundamentalsSnapshot {
  periods: FinancialPeriod[];
  sharesOutstanding: number | null;
  quote: QuoteSnapshot;
}

export interface ScoredHeadline {
  title: string;
  url: string | null;
  polarity: number;
}

export interface DateRange {
  start: string;
  end: string;
}

export const EMPTY_QUOTE: QuoteSnapshot = {
  marketCap: null,
  peRatio: null,
  eps: null,
  dividendYield: null,
  high52Week: null,
  low52Week: null,
};
