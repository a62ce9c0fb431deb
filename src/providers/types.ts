/**
 * Collaborator interfaces that supply the analysis engine with data.
 *
 * The engine never fetches anything itself; a provider hides where bars,
 * statements and scored headlines come from (a snapshot file, an HTTP API, ...).
 */

import type { Bar, DateRange, FundamentalsSnapshot, ScoredHeadline } from '@/types/market';

export interface PriceHistoryProvider {
  getPriceHistory(symbol: string, range: DateRange): Promise<Bar[]>;
}

export interface FundamentalsProvider {
  /** Up to five fiscal years plus a point-in-time share count and quote. */
  getFundamentals(symbol: string): Promise<FundamentalsSnapshot | null>;
}

export interface HeadlineSentimentProvider {
  /** One polarity score in [-1, 1] per headline, scored upstream. */
  getHeadlines(symbol: string): Promise<ScoredHeadline[]>;
}

export interface DataSources {
  prices: PriceHistoryProvider;
  fundamentals: FundamentalsProvider;
  headlines: HeadlineSentimentProvider;
}

export class ProviderError extends Error {
  constructor(
    message: string,
    public provider: string,
    public symbol: string,
    public method: string,
    cause?: Error
  ) {
    super(message, { cause });
    this.name = 'ProviderError';
  }
}
