/**
 * Batch runner
 *
 * Fetches each symbol's inputs through the providers and runs the engine once per
 * symbol. Symbols share no state; a provider failure is confined to its symbol.
 */

import type { DateRange } from '@/types/market';
import type { DataSources } from '@/providers/types';
import { getAnalysisConfig, type AnalysisConfig } from '@/core/config';
import { compareDates, today, yearsBefore } from '@/core/time';
import { RequestThrottler } from '@/utils/throttler';
import { createChildLogger } from '@/utils/logger';
import { analyzeSecurity, type SecurityAnalysis, type SecurityInput } from './engine';

const logger = createChildLogger('batch_runner');

export interface AnalyzeOptions {
  /** Analysis window start (yyyy-MM-dd); defaults to `analysisYears` before `end`. */
  start?: string;
  /** Defaults to today. */
  end?: string;
  config?: AnalysisConfig;
  throttler?: RequestThrottler;
}

export type SymbolOutcome =
  | { symbol: string; ok: true; analysis: SecurityAnalysis }
  | { symbol: string; ok: false; error: string };

export interface AnalysisRanges {
  analysis: DateRange;
  longHistory: DateRange;
}

export function resolveRanges(
  options: Pick<AnalyzeOptions, 'start' | 'end'>,
  config: AnalysisConfig
): AnalysisRanges {
  const end = options.end ?? today();
  const start = options.start ?? yearsBefore(end, config.pipeline.analysisYears);
  const longStart = yearsBefore(end, config.pipeline.longHistoryYears);

  return {
    analysis: { start, end },
    longHistory: { start: compareDates(start, longStart) < 0 ? start : longStart, end },
  };
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

async function withFallback<T>(
  task: Promise<T>,
  fallback: T,
  context: { symbol: string; source: string }
): Promise<T> {
  try {
    return await task;
  } catch (error) {
    logger.warn({ ...context, error: describeError(error) }, 'Provider call failed, continuing without it');
    return fallback;
  }
}

export async function fetchSecurityInput(
  symbol: string,
  sources: DataSources,
  ranges: AnalysisRanges,
  throttler: RequestThrottler
): Promise<SecurityInput> {
  const [bars, longHistory, fundamentals, headlines] = await Promise.all([
    throttler.schedule(() => sources.prices.getPriceHistory(symbol, ranges.analysis)),
    throttler.schedule(() => sources.prices.getPriceHistory(symbol, ranges.longHistory)),
    withFallback(
      throttler.schedule(() => sources.fundamentals.getFundamentals(symbol)),
      null,
      { symbol, source: 'fundamentals' }
    ),
    withFallback(
      throttler.schedule(() => sources.headlines.getHeadlines(symbol)),
      [],
      { symbol, source: 'headlines' }
    ),
  ]);

  return {
    symbol,
    bars,
    longHistory,
    fundamentals,
    polarities: headlines.map((h) => h.polarity),
  };
}

export async function analyzeSymbols(
  symbols: string[],
  sources: DataSources,
  options: AnalyzeOptions = {}
): Promise<SymbolOutcome[]> {
  const config = options.config ?? getAnalysisConfig();
  const throttler = options.throttler ?? new RequestThrottler(config.pipeline.throttleMs);
  const ranges = resolveRanges(options, config);

  logger.info({ symbols: symbols.length, ranges }, 'Starting analysis batch');

  const outcomes = await Promise.all(
    symbols.map(async (symbol): Promise<SymbolOutcome> => {
      try {
        const input = await fetchSecurityInput(symbol, sources, ranges, throttler);
        if (input.bars.length === 0) {
          logger.warn({ symbol }, 'No price data in the analysis window');
        }
        const analysis = analyzeSecurity(input, config);
        logger.info(
          {
            symbol,
            bars: analysis.barCount,
            technicalSignal: analysis.recommendation.technicalSignal,
            overall: analysis.recommendation.overall,
            quality: analysis.quality.verdict.status,
          },
          'Symbol analyzed'
        );
        return { symbol, ok: true, analysis };
      } catch (error) {
        logger.error({ symbol, error: describeError(error) }, 'Symbol analysis failed');
        return { symbol, ok: false, error: describeError(error) };
      }
    })
  );

  const failed = outcomes.filter((o) => !o.ok).length;
  logger.info(
    { analyzed: outcomes.length - failed, failed, providerCalls: throttler.getStats() },
    'Analysis batch complete'
  );

  return outcomes;
}
