/**
 * Plain-language interpretation of a quality verdict.
 */

import { DEFAULT_ANALYSIS_CONFIG, type QualityThresholds } from '@/core/config';
import type { QualityVerdict } from './scorer';

export interface QualityNarrative {
  headline: string;
  points: string[];
  conclusion: string | null;
}

export function buildQualityNarrative(
  verdict: QualityVerdict,
  symbol: string,
  thresholds: QualityThresholds = DEFAULT_ANALYSIS_CONFIG.quality.thresholds
): QualityNarrative {
  if (verdict.status === 'insufficient_data') {
    return {
      headline: `Insufficient financial data to evaluate ${symbol}.`,
      points: [],
      conclusion: null,
    };
  }

  const { periodsEvaluated, periodsPassing, overallPass: strong } = verdict;
  const years = periodsEvaluated === 1 ? 'year' : 'years';

  return {
    headline: strong
      ? `${symbol} met the quality criteria across the last ${periodsEvaluated} ${years}.`
      : `${symbol} shows mixed or weak results across the last ${periodsEvaluated} ${years}.`,
    points: [
      `Qualifying years: ${periodsPassing} of ${periodsEvaluated} met every quality and valuation criterion.`,
      `Net income: ${strong ? 'mostly positive' : 'variable or negative'}.`,
      `Return on equity: ${strong ? 'strong' : 'inconsistent'} (target above ${thresholds.minRoe}%).`,
      `Profit margin: ${strong ? 'healthy' : 'below target'} (target above ${thresholds.minProfitMargin}%).`,
      `Debt/Equity: ${strong ? 'low' : 'relatively high'} leverage (target below ${thresholds.maxDebtToEquity}).`,
      `Valuation (P/E, P/B, P/S, P/FCF): ${strong ? 'attractive' : 'mixed or high'} against the thresholds.`,
    ],
    conclusion: strong
      ? 'Fundamentals and valuation look strong over the evaluated period.'
      : 'Fundamentals or valuation show weaknesses over the evaluated period.',
  };
}
