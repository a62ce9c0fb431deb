/**
 * Decision Rule
 *
 * Bullish conditions are checked before bearish ones, so a golden cross together
 * with a bearish MACD crossover still reads as BUY.
 */

import { DEFAULT_ANALYSIS_CONFIG, type DecisionConfig } from '@/core/config';
import type { SentimentResult } from '@/sentiment/aggregate';
import type { CrossoverResult } from './crossover';

export type TechnicalSignal = 'BUY' | 'SELL' | 'HOLD';
export type OverallRecommendation = 'BUY' | 'HOLD/WAIT';
export type OptionSuggestion = 'CONSIDER_CALLS' | 'NO_SIGNAL';

export interface TechnicalDecision {
  signal: TechnicalSignal;
  notes: string[];
}

export interface Recommendation {
  technicalSignal: TechnicalSignal;
  overall: OverallRecommendation;
  optionSuggestion: OptionSuggestion;
  notes: string[];
}

export function decideTechnicalSignal(crossovers: CrossoverResult): TechnicalDecision {
  if (crossovers.crossType === 'GoldenCross' || crossovers.macdCrossover === 'Bullish') {
    return { signal: 'BUY', notes: ['Bullish technical signals detected.'] };
  }
  if (crossovers.crossType === 'DeathCross' || crossovers.macdCrossover === 'Bearish') {
    return { signal: 'SELL', notes: ['Bearish technical signals detected.'] };
  }
  return { signal: 'HOLD', notes: ['No strong technical signals detected.'] };
}

function sentimentAbove(sentiment: SentimentResult, threshold: number): boolean {
  return sentiment.status === 'scored' && sentiment.averagePolarity > threshold;
}

/**
 * The overall BUY needs sentiment strictly above `overallBuyMinSentiment` (0);
 * the call-option suggestion uses the stricter `optionCallMinSentiment` (0.05).
 */
export function buildRecommendation(
  technical: TechnicalDecision,
  sentiment: SentimentResult,
  config: DecisionConfig = DEFAULT_ANALYSIS_CONFIG.decision
): Recommendation {
  const isBuy = technical.signal === 'BUY';

  return {
    technicalSignal: technical.signal,
    overall: isBuy && sentimentAbove(sentiment, config.overallBuyMinSentiment) ? 'BUY' : 'HOLD/WAIT',
    optionSuggestion:
      isBuy && sentimentAbove(sentiment, config.optionCallMinSentiment)
        ? 'CONSIDER_CALLS'
        : 'NO_SIGNAL',
    notes: technical.notes,
  };
}
