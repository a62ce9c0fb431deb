/**
 * Analysis Engine
 *
 * Composes the pure components for one security:
 *   prices -> indicators -> crossovers -> decision (with sentiment)
 *   fundamentals + prices -> valuation table -> quality verdict + narrative
 *
 * Synchronous and free of I/O; every input is supplied by the caller.
 */

import type {
  Bar,
  FundamentalsSnapshot,
  QuoteSnapshot,
} from '@/types/market';
import { EMPTY_QUOTE } from '@/types/market';
import { DEFAULT_ANALYSIS_CONFIG, type AnalysisConfig } from '@/core/config';
import {
  computeIndicators,
  latestIndicators,
  type IndicatorSet,
  type LatestIndicators,
} from '@/indicators';
import { detectCrossovers, type CrossoverResult } from '@/signals/crossover';
import {
  buildRecommendation,
  decideTechnicalSignal,
  type Recommendation,
} from '@/signals/decision';
import { buildValuationTable } from '@/valuation/period_table';
import type { ValuationRow } from '@/valuation/ratios';
import { scoreQuality, type QualityReport } from '@/quality/scorer';
import { buildQualityNarrative, type QualityNarrative } from '@/quality/narrative';
import { aggregateSentiment, type SentimentResult } from '@/sentiment/aggregate';
import { normalizePriceSeries, type SeriesIssues } from './price_series';
import { analyzePriceMovement, type PriceMovement } from './price_movement';
import { buildSummary, type AnalysisSummary } from './summary';

export interface SecurityInput {
  symbol: string;
  /** Analysis window for indicators and crossovers. */
  bars: ReadonlyArray<Bar>;
  /** Longer history for period-end prices and price movement; defaults to `bars`. */
  longHistory?: ReadonlyArray<Bar>;
  fundamentals: FundamentalsSnapshot | null;
  polarities: ReadonlyArray<number>;
}

export interface SecurityAnalysis {
  symbol: string;
  asOf: string | null;
  barCount: number;
  seriesIssues: SeriesIssues;
  indicators: IndicatorSet;
  latest: LatestIndicators;
  crossovers: CrossoverResult;
  valuation: ValuationRow[];
  quality: QualityReport;
  qualityNarrative: QualityNarrative;
  sentiment: SentimentResult;
  recommendation: Recommendation;
  summary: AnalysisSummary;
  priceMovement: PriceMovement;
  quote: QuoteSnapshot;
}

export function analyzeSecurity(
  input: SecurityInput,
  config: AnalysisConfig = DEFAULT_ANALYSIS_CONFIG
): SecurityAnalysis {
  const { series, issues } = normalizePriceSeries(input.bars);
  const longHistory = input.longHistory
    ? normalizePriceSeries(input.longHistory).series
    : series;

  // Technical
  const indicators = computeIndicators(series, config.indicators);
  const crossovers = detectCrossovers(indicators, series.length, config.indicators.smaLongWindow);
  const technical = decideTechnicalSignal(crossovers);

  // Fundamental
  const valuation = input.fundamentals
    ? buildValuationTable(input.fundamentals, longHistory, config.quality)
    : [];
  const quality = scoreQuality(valuation, config.quality);
  const quote = input.fundamentals?.quote ?? EMPTY_QUOTE;

  // Qualitative
  const sentiment = aggregateSentiment(input.polarities, config.sentiment);
  const recommendation = buildRecommendation(technical, sentiment, config.decision);

  return {
    symbol: input.symbol,
    asOf: series.length > 0 ? series[series.length - 1].date : null,
    barCount: series.length,
    seriesIssues: issues,
    indicators,
    latest: latestIndicators(series, indicators),
    crossovers,
    valuation,
    quality,
    qualityNarrative: buildQualityNarrative(quality.verdict, input.symbol, config.quality.thresholds),
    sentiment,
    recommendation,
    summary: buildSummary(quote, sentiment, recommendation, config.decision),
    priceMovement: analyzePriceMovement(longHistory, config.priceMovement),
    quote,
  };
}
