/**
 * Quality Scorer
 *
 * A period passes only when every check passes. A missing value fails its check,
 * except P/FCF, where a missing value is accepted.
 */

import { DEFAULT_ANALYSIS_CONFIG, type QualityConfig, type QualityThresholds } from '@/core/config';
import type { ValuationRow } from '@/valuation/ratios';

export type QualityCheckKey =
  | 'netIncome'
  | 'roe'
  | 'profitMargin'
  | 'debtToEquity'
  | 'pe'
  | 'pb'
  | 'ps'
  | 'pfcf';

export interface QualityCheck {
  key: QualityCheckKey;
  label: string;
  value: number | null;
  passed: boolean;
}

export interface PeriodQuality {
  periodEnd: string;
  passed: boolean;
  checks: QualityCheck[];
  failedChecks: QualityCheckKey[];
}

export type QualityVerdict =
  | {
      status: 'insufficient_data';
      periodsEvaluated: 0;
      periodsPassing: 0;
      overallPass: null;
    }
  | {
      status: 'evaluated';
      periodsEvaluated: number;
      periodsPassing: number;
      overallPass: boolean;
    };

export interface QualityReport {
  verdict: QualityVerdict;
  periods: PeriodQuality[];
}

export type QualityInput = Pick<ValuationRow, 'periodEnd' | QualityCheckKey>;

function above(
  key: QualityCheckKey,
  label: string,
  value: number | null,
  threshold: number
): QualityCheck {
  return { key, label, value, passed: value !== null && value > threshold };
}

function below(
  key: QualityCheckKey,
  label: string,
  value: number | null,
  threshold: number,
  allowMissing: boolean = false
): QualityCheck {
  const passed = value === null ? allowMissing : value < threshold;
  return { key, label, value, passed };
}

export function evaluatePeriod(
  row: QualityInput,
  thresholds: QualityThresholds = DEFAULT_ANALYSIS_CONFIG.quality.thresholds
): PeriodQuality {
  const checks: QualityCheck[] = [
    above('netIncome', `Net income > ${thresholds.minNetIncome}`, row.netIncome, thresholds.minNetIncome),
    above('roe', `ROE > ${thresholds.minRoe}%`, row.roe, thresholds.minRoe),
    above(
      'profitMargin',
      `Profit margin > ${thresholds.minProfitMargin}%`,
      row.profitMargin,
      thresholds.minProfitMargin
    ),
    below(
      'debtToEquity',
      `Debt/Equity < ${thresholds.maxDebtToEquity}`,
      row.debtToEquity,
      thresholds.maxDebtToEquity
    ),
    below('pe', `P/E < ${thresholds.maxPe}`, row.pe, thresholds.maxPe),
    below('pb', `P/B < ${thresholds.maxPb}`, row.pb, thresholds.maxPb),
    below('ps', `P/S < ${thresholds.maxPs}`, row.ps, thresholds.maxPs),
    below('pfcf', `P/FCF < ${thresholds.maxPfcf} (or unavailable)`, row.pfcf, thresholds.maxPfcf, true),
  ];

  const failedChecks = checks.filter((c) => !c.passed).map((c) => c.key);

  return {
    periodEnd: row.periodEnd,
    passed: failedChecks.length === 0,
    checks,
    failedChecks,
  };
}

export function aggregateVerdict(
  periodsEvaluated: number,
  periodsPassing: number,
  passRatio: number = DEFAULT_ANALYSIS_CONFIG.quality.passRatio
): QualityVerdict {
  if (periodsEvaluated === 0) {
    return { status: 'insufficient_data', periodsEvaluated: 0, periodsPassing: 0, overallPass: null };
  }
  return {
    status: 'evaluated',
    periodsEvaluated,
    periodsPassing,
    overallPass: periodsPassing >= passRatio * periodsEvaluated,
  };
}

export function scoreQuality(
  rows: ReadonlyArray<QualityInput>,
  config: QualityConfig = DEFAULT_ANALYSIS_CONFIG.quality
): QualityReport {
  const periods = rows.map((row) => evaluatePeriod(row, config.thresholds));
  const periodsPassing = periods.filter((p) => p.passed).length;

  return {
    verdict: aggregateVerdict(periods.length, periodsPassing, config.passRatio),
    periods,
  };
}
