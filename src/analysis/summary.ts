/**
 * Summary report: short statements for a presentation layer to render.
 */

import type { QuoteSnapshot } from '@/types/market';
import { DEFAULT_ANALYSIS_CONFIG, type DecisionConfig } from '@/core/config';
import type { SentimentResult } from '@/sentiment/aggregate';
import type { Recommendation } from '@/signals/decision';

export interface AnalysisSummary {
  fundamental: string[];
  sentiment: string;
  technical: string;
  decisionNotes: string[];
  overall: string;
  optionSuggestion: string;
}

export function describeValuation(
  quote: QuoteSnapshot,
  config: DecisionConfig = DEFAULT_ANALYSIS_CONFIG.decision
): string[] {
  if (quote.peRatio !== null && quote.peRatio < config.undervaluedMaxPe) {
    return ['P/E ratio suggests the stock might be undervalued.'];
  }
  return ['P/E ratio is average or high.'];
}

export function describeSentiment(sentiment: SentimentResult): string {
  const tone =
    sentiment.status === 'scored' && sentiment.averagePolarity > 0 ? 'positive' : 'neutral/negative';
  return `News sentiment is ${tone}.`;
}

export function describeOptionSuggestion(recommendation: Recommendation): string {
  return recommendation.optionSuggestion === 'CONSIDER_CALLS'
    ? 'Bullish technicals with positive news sentiment: call options may be worth considering.'
    : 'No strong signal to buy call options at this time.';
}

export function buildSummary(
  quote: QuoteSnapshot,
  sentiment: SentimentResult,
  recommendation: Recommendation,
  config: DecisionConfig = DEFAULT_ANALYSIS_CONFIG.decision
): AnalysisSummary {
  return {
    fundamental: describeValuation(quote, config),
    sentiment: describeSentiment(sentiment),
    technical: `Technical analysis suggests: ${recommendation.technicalSignal}.`,
    decisionNotes: recommendation.notes,
    overall: `Overall recommendation: ${recommendation.overall}`,
    optionSuggestion: describeOptionSuggestion(recommendation),
  };
}
