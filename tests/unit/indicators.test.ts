import { describe, expect, it } from 'vitest';
import {
  calculateMACD,
  calculateRSI,
  calculateStochastic,
  computeIndicators,
  ema,
  latestIndicators,
  rollingMax,
  rollingMin,
  rsiFromAverages,
  sma,
} from '@/indicators';
import { makeBars } from '../helpers/market';

describe('sma', () => {
  it('averages the last `window` values and leaves the warm-up empty', () => {
    expect(sma([1, 2, 3, 4, 5], 3)).toEqual([null, null, 2, 3, 4]);
  });

  it('does not average a window that contains a missing value', () => {
    expect(sma([1, null, 3, 4, 5], 2)).toEqual([null, null, null, 3.5, 4.5]);
  });

  it('reproduces the 50 and 200 bar averages exactly', () => {
    const closes = Array.from({ length: 250 }, (_, i) => i + 1);
    const indicators = computeIndicators(makeBars(closes));

    expect(indicators.smaShort[48]).toBeNull();
    expect(indicators.smaShort[49]).toBe(25.5);
    expect(indicators.smaShort[249]).toBe(225.5);
    expect(indicators.smaLong[198]).toBeNull();
    expect(indicators.smaLong[199]).toBe(100.5);
    expect(indicators.smaLong.slice(0, 199).every((v) => v === null)).toBe(true);
  });

  it('rejects a non-positive window', () => {
    expect(() => sma([1, 2, 3], 0)).toThrow(RangeError);
  });
});

describe('rolling min/max', () => {
  it('tracks the extremes of each full window', () => {
    expect(rollingMin([5, 3, 4, 1], 2)).toEqual([null, 3, 3, 1]);
    expect(rollingMax([5, 3, 4, 1], 2)).toEqual([null, 5, 4, 4]);
  });
});

describe('ema', () => {
  it('seeds with the first value', () => {
    expect(ema([10, 20, 30], 3)).toEqual([10, 15, 22.5]);
  });

  it('stays exactly on a constant series', () => {
    const values = new Array<number>(60).fill(101.37);
    expect(ema(values, 12).every((v) => v === 101.37)).toBe(true);
  });
});

describe('calculateRSI', () => {
  it('is undefined until `period` deltas exist', () => {
    const closes = Array.from({ length: 20 }, (_, i) => 10 + i);
    const rsi = calculateRSI(closes, 14);

    expect(rsi.slice(0, 14).every((v) => v === null)).toBe(true);
    expect(rsi[14]).not.toBeNull();
  });

  it('returns exactly 50 on a flat series', () => {
    const rsi = calculateRSI(new Array<number>(20).fill(10), 14);
    expect(rsi.slice(14)).toEqual([50, 50, 50, 50, 50, 50]);
  });

  it('clamps to 100 when there are no losses', () => {
    const rsi = calculateRSI(Array.from({ length: 16 }, (_, i) => 10 + i), 14);
    expect(rsi[15]).toBe(100);
  });

  it('drops to 0 when there are no gains', () => {
    const rsi = calculateRSI(Array.from({ length: 16 }, (_, i) => 100 - i), 14);
    expect(rsi[15]).toBe(0);
  });

  it('uses simple averages of gains and losses', () => {
    // gains [2, 0], losses [0, 1] -> RS = 1 / 0.5 = 2
    const rsi = calculateRSI([10, 12, 11], 2);
    expect(rsi[0]).toBeNull();
    expect(rsi[1]).toBeNull();
    expect(rsi[2]).toBeCloseTo(66.6667, 4);
  });

  it('stays within [0, 100]', () => {
    const closes = Array.from({ length: 120 }, (_, i) => 50 + 10 * Math.sin(i / 4) + (i % 7));
    const defined = calculateRSI(closes, 14).filter((v): v is number => v !== null);

    expect(defined).toHaveLength(106);
    expect(defined.every((v) => v >= 0 && v <= 100)).toBe(true);
  });

  it('handles the zero-loss boundary explicitly', () => {
    expect(rsiFromAverages(0, 0)).toBe(50);
    expect(rsiFromAverages(1.5, 0)).toBe(100);
    expect(rsiFromAverages(1, 1)).toBe(50);
  });
});

describe('calculateMACD', () => {
  it('is zero on a constant series', () => {
    const { macd, signal, histogram } = calculateMACD(new Array<number>(40).fill(25));
    expect(macd.every((v) => v === 0)).toBe(true);
    expect(signal.every((v) => v === 0)).toBe(true);
    expect(histogram.every((v) => v === 0)).toBe(true);
  });

  it('is defined from the first bar', () => {
    const { macd, signal } = calculateMACD([10, 11, 12]);
    expect(macd[0]).toBe(0);
    expect(signal[0]).toBe(0);
    expect(macd[1]).toBeGreaterThan(0);
  });
});

describe('calculateStochastic', () => {
  it('computes %K over the high/low range and %D as its average', () => {
    const { k, d } = calculateStochastic(
      {
        high: [10, 11, 12, 13],
        low: [8, 9, 10, 11],
        close: [9, 10, 11, 13],
      },
      3,
      2
    );

    expect(k).toEqual([null, null, 75, 100]);
    expect(d).toEqual([null, null, null, 87.5]);
  });

  it('has no %K when the range is flat', () => {
    const flat = new Array<number>(20).fill(42);
    const { k, d } = calculateStochastic({ high: flat, low: flat, close: flat }, 14, 3);

    expect(k.every((v) => v === null)).toBe(true);
    expect(d.every((v) => v === null)).toBe(true);
  });
});

describe('latestIndicators', () => {
  it('reports the last value of each series', () => {
    const bars = makeBars(new Array<number>(30).fill(10));
    const latest = latestIndicators(bars, computeIndicators(bars));

    expect(latest.date).toBe('2024-01-30');
    expect(latest.close).toBe(10);
    expect(latest.rsi).toBe(50);
    expect(latest.macd).toBe(0);
    expect(latest.smaShort).toBeNull();
    // close ± 1 gives a 2-wide range, close sits in the middle
    expect(latest.stochK).toBe(50);
    expect(latest.stochD).toBe(50);
  });

  it('is empty for an empty series', () => {
    const latest = latestIndicators([], computeIndicators([]));
    expect(latest.date).toBeNull();
    expect(latest.rsi).toBeNull();
  });
});
