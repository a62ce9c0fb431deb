/**
 * Provider backed by a validated snapshot document (see schemas/).
 * Implements all three collaborator interfaces from one file.
 */

import { readFile } from 'fs/promises';
import type {
  Bar,
  DateRange,
  FinancialPeriod,
  FundamentalsSnapshot,
  ScoredHeadline,
} from '@/types/market';
import type { SecuritySnapshot, SnapshotDocument, SnapshotFundamentals } from '@/types/snapshot';
import { compareDates } from '@/core/time';
import { validateSnapshotOrThrow } from '@/validation/ajv_instance';
import { createChildLogger } from '@/utils/logger';
import {
  ProviderError,
  type DataSources,
  type FundamentalsProvider,
  type HeadlineSentimentProvider,
  type PriceHistoryProvider,
} from './types';

const logger = createChildLogger('snapshot_provider');

function mapFundamentals(data: SnapshotFundamentals): FundamentalsSnapshot {
  const quote = data.quote ?? {};
  const periods: FinancialPeriod[] = data.periods.map((p) => ({
    periodEnd: p.periodEnd,
    netIncome: p.netIncome ?? null,
    totalDebt: p.totalDebt ?? null,
    totalEquity: p.totalEquity ?? null,
    totalRevenue: p.totalRevenue ?? null,
    cashFromOps: p.cashFromOps ?? null,
    capitalExpenditures: p.capitalExpenditures ?? null,
    sharesOutstanding: p.sharesOutstanding ?? null,
    periodClosePrice: p.periodClosePrice ?? null,
  }));

  return {
    periods,
    sharesOutstanding: data.sharesOutstanding ?? null,
    quote: {
      marketCap: quote.marketCap ?? null,
      peRatio: quote.peRatio ?? null,
      eps: quote.eps ?? null,
      dividendYield: quote.dividendYield ?? null,
      high52Week: quote.high52Week ?? null,
      low52Week: quote.low52Week ?? null,
    },
  };
}

export class SnapshotProvider
  implements PriceHistoryProvider, FundamentalsProvider, HeadlineSentimentProvider
{
  private readonly securities = new Map<string, SecuritySnapshot>();
  private requestCount = 0;

  constructor(document: SnapshotDocument) {
    for (const security of document.securities) {
      this.securities.set(security.symbol.toUpperCase(), security);
    }
  }

  static async fromFile(path: string): Promise<SnapshotProvider> {
    const raw = await readFile(path, 'utf-8');
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new Error(`snapshot_invalid_json: ${path} (${reason})`);
    }
    const document = validateSnapshotOrThrow(parsed, path);
    logger.info({ path, securities: document.securities.length }, 'Snapshot loaded');
    return new SnapshotProvider(document);
  }

  symbols(): string[] {
    return [...this.securities.keys()];
  }

  getRequestCount(): number {
    return this.requestCount;
  }

  private lookup(symbol: string, method: string): SecuritySnapshot {
    this.requestCount++;
    const security = this.securities.get(symbol.toUpperCase());
    if (!security) {
      throw new ProviderError(`No snapshot data for ${symbol}`, 'snapshot', symbol, method);
    }
    return security;
  }

  async getPriceHistory(symbol: string, range: DateRange): Promise<Bar[]> {
    const security = this.lookup(symbol, 'getPriceHistory');
    return security.bars
      .filter((bar) => compareDates(bar.date, range.start) >= 0 && compareDates(bar.date, range.end) <= 0)
      .map((bar) => ({ ...bar }));
  }

  async getFundamentals(symbol: string): Promise<FundamentalsSnapshot | null> {
    const security = this.lookup(symbol, 'getFundamentals');
    return security.fundamentals ? mapFundamentals(security.fundamentals) : null;
  }

  async getHeadlines(symbol: string): Promise<ScoredHeadline[]> {
    const security = this.lookup(symbol, 'getHeadlines');
    return (security.headlines ?? []).map((h) => ({
      title: h.title,
      url: h.url ?? null,
      polarity: h.polarity,
    }));
  }

  asDataSources(): DataSources {
    return { prices: this, fundamentals: this, headlines: this };
  }
}
