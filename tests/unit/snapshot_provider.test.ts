import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { SnapshotProvider } from '@/providers/snapshot_provider';
import { ProviderError } from '@/providers/types';
import { SnapshotValidationError } from '@/validation/ajv_instance';
import type { SnapshotDocument } from '@/types/snapshot';
import { makeBars } from '../helpers/market';

const snapshot: SnapshotDocument = {
  securities: [
    {
      symbol: 'acme',
      bars: makeBars([10, 11, 12, 13, 14], { start: '2025-01-01' }),
      fundamentals: {
        sharesOutstanding: 100,
        quote: { peRatio: 18 },
        periods: [{ periodEnd: '2024-12-31', netIncome: 200 }],
      },
      headlines: [
        { title: 'First', polarity: 0.3, url: 'https://example.com/a' },
        { title: 'Second', polarity: -0.1 },
      ],
    },
    { symbol: 'BETA', bars: [] },
  ],
};

describe('SnapshotProvider', () => {
  it('keys securities by upper-case symbol', () => {
    expect(new SnapshotProvider(snapshot).symbols()).toEqual(['ACME', 'BETA']);
  });

  it('filters bars to the inclusive range', async () => {
    const provider = new SnapshotProvider(snapshot);
    const bars = await provider.getPriceHistory('ACME', { start: '2025-01-02', end: '2025-01-04' });

    expect(bars.map((b) => b.close)).toEqual([11, 12, 13]);
  });

  it('fills missing fundamentals fields with null', async () => {
    const fundamentals = await new SnapshotProvider(snapshot).getFundamentals('acme');

    expect(fundamentals).toEqual({
      periods: [
        {
          periodEnd: '2024-12-31',
          netIncome: 200,
          totalDebt: null,
          totalEquity: null,
          totalRevenue: null,
          cashFromOps: null,
          capitalExpenditures: null,
          sharesOutstanding: null,
          periodClosePrice: null,
        },
      ],
      sharesOutstanding: 100,
      quote: {
        marketCap: null,
        peRatio: 18,
        eps: null,
        dividendYield: null,
        high52Week: null,
        low52Week: null,
      },
    });
  });

  it('returns null fundamentals and no headlines when the snapshot has none', async () => {
    const provider = new SnapshotProvider(snapshot);

    expect(await provider.getFundamentals('BETA')).toBeNull();
    expect(await provider.getHeadlines('BETA')).toEqual([]);
  });

  it('maps headlines', async () => {
    const headlines = await new SnapshotProvider(snapshot).getHeadlines('ACME');

    expect(headlines).toEqual([
      { title: 'First', url: 'https://example.com/a', polarity: 0.3 },
      { title: 'Second', url: null, polarity: -0.1 },
    ]);
  });

  it('rejects unknown symbols', async () => {
    const provider = new SnapshotProvider(snapshot);

    await expect(provider.getHeadlines('ZZZ')).rejects.toBeInstanceOf(ProviderError);
    await expect(provider.getHeadlines('ZZZ')).rejects.toThrow('No snapshot data for ZZZ');
    expect(provider.getRequestCount()).toBe(2);
  });
});

describe('SnapshotProvider.fromFile', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'snapshot-'));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('loads a validated snapshot', async () => {
    const path = join(tempDir, 'snapshot.json');
    writeFileSync(path, JSON.stringify(snapshot));

    const provider = await SnapshotProvider.fromFile(path);
    expect(provider.symbols()).toEqual(['ACME', 'BETA']);
  });

  it('rejects malformed JSON', async () => {
    const path = join(tempDir, 'broken.json');
    writeFileSync(path, '{"securities": [');

    await expect(SnapshotProvider.fromFile(path)).rejects.toThrow(`snapshot_invalid_json: ${path}`);
  });

  it('rejects a snapshot that fails the schema', async () => {
    const path = join(tempDir, 'invalid.json');
    writeFileSync(path, JSON.stringify({ securities: [{ symbol: 'ACME' }] }));

    await expect(SnapshotProvider.fromFile(path)).rejects.toBeInstanceOf(SnapshotValidationError);
  });

  it('loads the bundled sample snapshot', async () => {
    const provider = await SnapshotProvider.fromFile('data/sample_snapshot.json');
    expect(provider.symbols()).toEqual(['ACME', 'BETA']);
  });
});
