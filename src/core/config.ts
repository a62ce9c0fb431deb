/**
 * Analysis configuration loader.
 *
 * Reads `config/analysis.json` (or the file named by ANALYSIS_CONFIG) and merges it
 * over the built-in defaults. Keys in the file are snake_case; anything missing or
 * not a usable number keeps its default.
 */

import { existsSync, readFileSync } from 'fs';
import { isAbsolute, join } from 'path';
import { getEnvConfig } from './env';
import { createChildLogger } from '@/utils/logger';

const logger = createChildLogger('analysis_config');

export interface IndicatorConfig {
  smaShortWindow: number;
  smaLongWindow: number;
  rsiPeriod: number;
  macdFastSpan: number;
  macdSlowSpan: number;
  macdSignalSpan: number;
  stochasticPeriod: number;
  stochasticSmoothing: number;
}

export interface QualityThresholds {
  minNetIncome: number;
  minRoe: number;
  minProfitMargin: number;
  maxDebtToEquity: number;
  maxPe: number;
  maxPb: number;
  maxPs: number;
  maxPfcf: number;
}

export interface QualityConfig {
  thresholds: QualityThresholds;
  passRatio: number;
  maxPeriods: number;
  /** Days after a period end within which a bar may stand in for its close. */
  maxPriceLagDays: number;
}

export interface SentimentConfig {
  positiveThreshold: number;
  negativeThreshold: number;
}

export interface DecisionConfig {
  overallBuyMinSentiment: number;
  optionCallMinSentiment: number;
  undervaluedMaxPe: number;
}

export interface PriceMovementConfig {
  growthThresholdPct: number;
}

export interface PipelineConfig {
  analysisYears: number;
  longHistoryYears: number;
  throttleMs: number;
}

export interface AnalysisConfig {
  indicators: IndicatorConfig;
  quality: QualityConfig;
  sentiment: SentimentConfig;
  decision: DecisionConfig;
  priceMovement: PriceMovementConfig;
  pipeline: PipelineConfig;
}

export const DEFAULT_ANALYSIS_CONFIG: AnalysisConfig = {
  indicators: {
    smaShortWindow: 50,
    smaLongWindow: 200,
    rsiPeriod: 14,
    macdFastSpan: 12,
    macdSlowSpan: 26,
    macdSignalSpan: 9,
    stochasticPeriod: 14,
    stochasticSmoothing: 3,
  },
  quality: {
    thresholds: {
      minNetIncome: 0,
      minRoe: 15,
      minProfitMargin: 10,
      maxDebtToEquity: 0.5,
      maxPe: 20,
      maxPb: 3,
      maxPs: 4,
      maxPfcf: 20,
    },
    passRatio: 0.6,
    maxPeriods: 5,
    maxPriceLagDays: 10,
  },
  sentiment: {
    positiveThreshold: 0.05,
    negativeThreshold: -0.05,
  },
  decision: {
    overallBuyMinSentiment: 0,
    optionCallMinSentiment: 0.05,
    undervaluedMaxPe: 15,
  },
  priceMovement: {
    growthThresholdPct: 20,
  },
  pipeline: {
    analysisYears: 3,
    longHistoryYears: 10,
    throttleMs: 0,
  },
};

function asRecord(value: unknown): Record<string, unknown> | null {
  if (!value || typeof value !== 'object' || Array.isArray(value)) return null;
  return Object.fromEntries(Object.entries(value));
}

function pickNumber(data: Record<string, unknown> | null, key: string, fallback: number): number {
  const raw = data?.[key];
  if (raw === undefined) return fallback;
  if (typeof raw === 'number' && Number.isFinite(raw)) return raw;
  logger.warn({ key, value: raw }, 'Ignoring non-numeric config value');
  return fallback;
}

function pickWindow(data: Record<string, unknown> | null, key: string, fallback: number): number {
  const value = pickNumber(data, key, fallback);
  if (Number.isInteger(value) && value >= 1) return value;
  logger.warn({ key, value }, 'Ignoring window that is not a positive integer');
  return fallback;
}

function mergeIndicators(base: IndicatorConfig, raw: unknown): IndicatorConfig {
  const data = asRecord(raw);
  if (!data) return base;
  return {
    smaShortWindow: pickWindow(data, 'sma_short_window', base.smaShortWindow),
    smaLongWindow: pickWindow(data, 'sma_long_window', base.smaLongWindow),
    rsiPeriod: pickWindow(data, 'rsi_period', base.rsiPeriod),
    macdFastSpan: pickWindow(data, 'macd_fast_span', base.macdFastSpan),
    macdSlowSpan: pickWindow(data, 'macd_slow_span', base.macdSlowSpan),
    macdSignalSpan: pickWindow(data, 'macd_signal_span', base.macdSignalSpan),
    stochasticPeriod: pickWindow(data, 'stochastic_period', base.stochasticPeriod),
    stochasticSmoothing: pickWindow(data, 'stochastic_smoothing', base.stochasticSmoothing),
  };
}

function mergeQuality(base: QualityConfig, raw: unknown): QualityConfig {
  const data = asRecord(raw);
  if (!data) return base;
  const thresholds = asRecord(data.thresholds);
  const passRatio = pickNumber(data, 'pass_ratio', base.passRatio);
  const maxPriceLagDays = pickNumber(data, 'max_price_lag_days', base.maxPriceLagDays);

  return {
    thresholds: {
      minNetIncome: pickNumber(thresholds, 'min_net_income', base.thresholds.minNetIncome),
      minRoe: pickNumber(thresholds, 'min_roe', base.thresholds.minRoe),
      minProfitMargin: pickNumber(thresholds, 'min_profit_margin', base.thresholds.minProfitMargin),
      maxDebtToEquity: pickNumber(thresholds, 'max_debt_to_equity', base.thresholds.maxDebtToEquity),
      maxPe: pickNumber(thresholds, 'max_pe', base.thresholds.maxPe),
      maxPb: pickNumber(thresholds, 'max_pb', base.thresholds.maxPb),
      maxPs: pickNumber(thresholds, 'max_ps', base.thresholds.maxPs),
      maxPfcf: pickNumber(thresholds, 'max_pfcf', base.thresholds.maxPfcf),
    },
    passRatio: passRatio > 0 && passRatio <= 1 ? passRatio : base.passRatio,
    maxPeriods: pickWindow(data, 'max_periods', base.maxPeriods),
    maxPriceLagDays:
      Number.isInteger(maxPriceLagDays) && maxPriceLagDays >= 0
        ? maxPriceLagDays
        : base.maxPriceLagDays,
  };
}

function mergeSentiment(base: SentimentConfig, raw: unknown): SentimentConfig {
  const data = asRecord(raw);
  if (!data) return base;
  return {
    positiveThreshold: pickNumber(data, 'positive_threshold', base.positiveThreshold),
    negativeThreshold: pickNumber(data, 'negative_threshold', base.negativeThreshold),
  };
}

function mergeDecision(base: DecisionConfig, raw: unknown): DecisionConfig {
  const data = asRecord(raw);
  if (!data) return base;
  return {
    overallBuyMinSentiment: pickNumber(data, 'overall_buy_min_sentiment', base.overallBuyMinSentiment),
    optionCallMinSentiment: pickNumber(data, 'option_call_min_sentiment', base.optionCallMinSentiment),
    undervaluedMaxPe: pickNumber(data, 'undervalued_max_pe', base.undervaluedMaxPe),
  };
}

function mergePriceMovement(base: PriceMovementConfig, raw: unknown): PriceMovementConfig {
  const data = asRecord(raw);
  if (!data) return base;
  return {
    growthThresholdPct: pickNumber(data, 'growth_threshold_pct', base.growthThresholdPct),
  };
}

function mergePipeline(base: PipelineConfig, raw: unknown): PipelineConfig {
  const data = asRecord(raw);
  if (!data) return base;
  const throttleMs = pickNumber(data, 'throttle_ms', base.throttleMs);
  return {
    analysisYears: pickWindow(data, 'analysis_years', base.analysisYears),
    longHistoryYears: pickWindow(data, 'long_history_years', base.longHistoryYears),
    throttleMs: throttleMs >= 0 ? throttleMs : base.throttleMs,
  };
}

export function mergeAnalysisConfig(
  raw: unknown,
  base: AnalysisConfig = DEFAULT_ANALYSIS_CONFIG
): AnalysisConfig {
  const data = asRecord(raw);
  if (!data) return base;
  return {
    indicators: mergeIndicators(base.indicators, data.indicators),
    quality: mergeQuality(base.quality, data.quality),
    sentiment: mergeSentiment(base.sentiment, data.sentiment),
    decision: mergeDecision(base.decision, data.decision),
    priceMovement: mergePriceMovement(base.priceMovement, data.price_movement),
    pipeline: mergePipeline(base.pipeline, data.pipeline),
  };
}

function resolveConfigPath(projectRoot: string): string {
  const override = getEnvConfig().analysisConfigPath;
  if (override) {
    return isAbsolute(override) ? override : join(projectRoot, override);
  }
  return join(projectRoot, 'config', 'analysis.json');
}

function loadRawConfig(path: string): unknown {
  if (!existsSync(path)) {
    logger.debug({ path }, 'No analysis config file, using defaults');
    return null;
  }

  const json = readFileSync(path, 'utf-8');
  try {
    return JSON.parse(json);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`config_invalid_json: ${path} (${reason})`);
  }
}

let cachedConfig: AnalysisConfig | null = null;

export function getAnalysisConfig(): AnalysisConfig {
  if (!cachedConfig) {
    const path = resolveConfigPath(process.cwd());
    cachedConfig = mergeAnalysisConfig(loadRawConfig(path));
    logger.debug({ path }, 'Analysis config loaded');
  }
  return cachedConfig;
}

export function resetAnalysisConfig(): void {
  cachedConfig = null;
}
