/**
 * Sentiment Aggregator
 * Reduces per-headline polarity scores ([-1, 1]) to one average and a label.
 */

import { DEFAULT_ANALYSIS_CONFIG, type SentimentConfig } from '@/core/config';
import { mean, toFiniteNumber } from '@/utils/numeric';

export type SentimentLabel = 'Positive' | 'Neutral' | 'Negative';

export type SentimentResult =
  | {
      status: 'no_headlines';
      averagePolarity: null;
      label: null;
      headlineCount: 0;
    }
  | {
      status: 'scored';
      averagePolarity: number;
      label: SentimentLabel;
      headlineCount: number;
    };

export const NO_HEADLINES: SentimentResult = {
  status: 'no_headlines',
  averagePolarity: null,
  label: null,
  headlineCount: 0,
};

export function labelForPolarity(
  average: number,
  config: SentimentConfig = DEFAULT_ANALYSIS_CONFIG.sentiment
): SentimentLabel {
  if (average > config.positiveThreshold) return 'Positive';
  if (average < config.negativeThreshold) return 'Negative';
  return 'Neutral';
}

/**
 * Non-finite scores are dropped; if nothing is left the result is `no_headlines`,
 * which is distinct from a genuine average of 0.
 */
export function aggregateSentiment(
  polarities: ReadonlyArray<number>,
  config: SentimentConfig = DEFAULT_ANALYSIS_CONFIG.sentiment
): SentimentResult {
  const scores = polarities
    .map((p) => toFiniteNumber(p))
    .filter((p): p is number => p !== null);

  const averagePolarity = mean(scores);
  if (averagePolarity === null) return NO_HEADLINES;

  return {
    status: 'scored',
    averagePolarity,
    label: labelForPolarity(averagePolarity, config),
    headlineCount: scores.length,
  };
}
