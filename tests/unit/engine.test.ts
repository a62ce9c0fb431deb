import { describe, expect, it } from 'vitest';
import { analyzeSecurity } from '@/analysis/engine';
import { DEFAULT_ANALYSIS_CONFIG } from '@/core/config';
import { EMPTY_QUOTE, type FundamentalsSnapshot } from '@/types/market';
import { goldenCrossCloses, makeBars, makePeriod } from '../helpers/market';

function fundamentals(overrides: Partial<FundamentalsSnapshot> = {}): FundamentalsSnapshot {
  return {
    periods: [],
    sharesOutstanding: 100,
    quote: { ...EMPTY_QUOTE, peRatio: 12 },
    ...overrides,
  };
}

describe('analyzeSecurity', () => {
  it('produces an empty but complete analysis without data', () => {
    const result = analyzeSecurity({ symbol: 'NONE', bars: [], fundamentals: null, polarities: [] });

    expect(result.asOf).toBeNull();
    expect(result.barCount).toBe(0);
    expect(result.crossovers).toEqual({ crossType: 'None', macdCrossover: 'None' });
    expect(result.recommendation.technicalSignal).toBe('HOLD');
    expect(result.recommendation.overall).toBe('HOLD/WAIT');
    expect(result.valuation).toEqual([]);
    expect(result.quality.verdict.status).toBe('insufficient_data');
    expect(result.qualityNarrative.headline).toBe('Insufficient financial data to evaluate NONE.');
    expect(result.sentiment.status).toBe('no_headlines');
    expect(result.priceMovement).toEqual({ status: 'no_data' });
    expect(result.quote).toEqual(EMPTY_QUOTE);
    expect(result.summary.fundamental).toEqual(['P/E ratio is average or high.']);
  });

  it('buys on a golden cross with positive news', () => {
    const bars = makeBars(goldenCrossCloses());
    const result = analyzeSecurity({
      symbol: 'ACME',
      bars,
      fundamentals: fundamentals(),
      polarities: [0.2],
    });

    expect(result.barCount).toBe(201);
    expect(result.asOf).toBe(bars[200].date);
    expect(result.crossovers.crossType).toBe('GoldenCross');
    expect(result.recommendation).toMatchObject({
      technicalSignal: 'BUY',
      overall: 'BUY',
      optionSuggestion: 'CONSIDER_CALLS',
    });
    expect(result.latest.close).toBe(1000);
    expect(result.latest.smaLong).toBeCloseTo(102.05, 6);
    expect(result.summary.fundamental).toEqual([
      'P/E ratio suggests the stock might be undervalued.',
    ]);
  });

  it('prices the five most recent periods from the long history', () => {
    const longHistory = [
      ...makeBars([20], { start: '2020-12-31' }),
      ...makeBars([20], { start: '2021-12-31' }),
      ...makeBars([20], { start: '2022-12-31' }),
      ...makeBars([30], { start: '2023-12-31' }),
      ...makeBars([40, 41], { start: '2024-12-31' }),
    ];
    const periods = [2019, 2020, 2021, 2022, 2023, 2024].map((year) =>
      makePeriod({ periodEnd: `${year}-12-31`, netIncome: 300 })
    );

    const result = analyzeSecurity({
      symbol: 'ACME',
      bars: makeBars([40, 41], { start: '2024-12-31' }),
      longHistory,
      fundamentals: fundamentals({ periods }),
      polarities: [],
    });

    expect(result.valuation.map((row) => [row.periodEnd, row.closePrice])).toEqual([
      ['2024-12-31', 40],
      ['2023-12-31', 30],
      ['2022-12-31', 20],
      ['2021-12-31', 20],
      ['2020-12-31', 20],
    ]);
    expect(result.quality.periods.map((p) => p.passed)).toEqual([false, false, true, true, true]);
    expect(result.quality.verdict).toEqual({
      status: 'evaluated',
      periodsEvaluated: 5,
      periodsPassing: 3,
      overallPass: true,
    });
    expect(result.qualityNarrative.headline).toBe(
      'ACME met the quality criteria across the last 5 years.'
    );
    expect(result.priceMovement).toMatchObject({
      status: 'measured',
      startDate: '2020-12-31',
      startPrice: 20,
      endPrice: 41,
      trend: 'significant_growth',
    });
  });

  it('does not price a fiscal year from a much later bar', () => {
    const result = analyzeSecurity({
      symbol: 'ACME',
      bars: makeBars([40], { start: '2024-06-03' }),
      fundamentals: fundamentals({
        periods: [makePeriod({ periodEnd: '2016-12-31', netIncome: 300 })],
      }),
      polarities: [],
    });

    expect(result.valuation[0].closePrice).toBeNull();
    expect(result.quality.periods[0].failedChecks).toEqual(['pe', 'pb', 'ps']);
    expect(result.quality.verdict.overallPass).toBe(false);
  });

  it('normalizes the price series before computing anything', () => {
    const bars = makeBars([10, 11, 12]);
    const result = analyzeSecurity({
      symbol: 'ACME',
      bars: [bars[2], bars[0], bars[1], bars[1]],
      fundamentals: null,
      polarities: [],
    });

    expect(result.barCount).toBe(3);
    expect(result.asOf).toBe('2024-01-03');
    expect(result.seriesIssues).toEqual({ reordered: true, duplicateDates: 1, droppedBars: 0 });
  });

  it('applies a custom configuration', () => {
    const config = {
      ...DEFAULT_ANALYSIS_CONFIG,
      decision: { ...DEFAULT_ANALYSIS_CONFIG.decision, overallBuyMinSentiment: 0.5 },
    };
    const result = analyzeSecurity(
      { symbol: 'ACME', bars: makeBars(goldenCrossCloses()), fundamentals: null, polarities: [0.2] },
      config
    );

    expect(result.recommendation.technicalSignal).toBe('BUY');
    expect(result.recommendation.overall).toBe('HOLD/WAIT');
    expect(result.recommendation.optionSuggestion).toBe('CONSIDER_CALLS');
  });
});
