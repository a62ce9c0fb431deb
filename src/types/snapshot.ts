/**
 * Snapshot document: price history, fundamentals and scored headlines for one
 * or more securities, as validated by schemas/security_snapshot.v1.schema.json.
 */

export interface SnapshotBar {
  date: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

export interface SnapshotPeriod {
  periodEnd: string;
  netIncome?: number | null;
  totalDebt?: number | null;
  totalEquity?: number | null;
  totalRevenue?: number | null;
  cashFromOps?: number | null;
  capitalExpenditures?: number | null;
  sharesOutstanding?: number | null;
  periodClosePrice?: number | null;
}

export interface SnapshotQuote {
  marketCap?: number | null;
  peRatio?: number | null;
  eps?: number | null;
  dividendYield?: number | null;
  high52Week?: number | null;
  low52Week?: number | null;
}

export interface SnapshotFundamentals {
  sharesOutstanding?: number | null;
  quote?: SnapshotQuote;
  periods: SnapshotPeriod[];
}

export interface SnapshotHeadline {
  title: string;
  url?: string | null;
  polarity: number;
}

export interface SecuritySnapshot {
  symbol: string;
  bars: SnapshotBar[];
  fundamentals?: SnapshotFundamentals | null;
  headlines?: SnapshotHeadline[];
}

export interface SnapshotDocument {
  asOf?: string;
  securities: SecuritySnapshot[];
}
