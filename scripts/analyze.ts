/**
 * Analyze securities from a snapshot file
 *
 * Usage: npx tsx scripts/analyze.ts --input data/sample_snapshot.json [--symbol ACME,BETA]
 *        [--start 2024-01-01] [--end 2025-12-31] [--output out/analysis.json] [--full]
 */

import './load_env';
import { dirname, resolve } from 'path';
import { mkdirSync, writeFileSync } from 'fs';
import { getEnvConfig } from '../src/core/env';
import { getAnalysisConfig } from '../src/core/config';
import { isValidDateString } from '../src/core/time';
import { SnapshotProvider } from '../src/providers/snapshot_provider';
import { analyzeSymbols, type SymbolOutcome } from '../src/analysis/batch';
import { createChildLogger } from '../src/utils/logger';

const logger = createChildLogger('analyze_cli');

interface AnalyzeCliArgs {
  input: string | null;
  symbols: string[];
  start?: string;
  end?: string;
  output: string | null;
  full: boolean;
}

function readArg(name: string): string | undefined {
  const eqArg = process.argv.find((arg) => arg.startsWith(`--${name}=`));
  if (eqArg) return eqArg.slice(name.length + 3);
  const posIndex = process.argv.findIndex((arg) => arg === `--${name}`);
  return posIndex >= 0 ? process.argv[posIndex + 1] : undefined;
}

function readDateArg(name: string): string | undefined {
  const value = readArg(name);
  if (value !== undefined && !isValidDateString(value)) {
    throw new Error(`--${name} must be a yyyy-MM-dd date, got "${value}"`);
  }
  return value;
}

function parseCliArgs(): AnalyzeCliArgs {
  const symbolsRaw = readArg('symbol') ?? '';
  return {
    input: readArg('input') ?? getEnvConfig().snapshotFile,
    symbols: symbolsRaw
      .split(',')
      .map((s) => s.trim().toUpperCase())
      .filter((s) => s.length > 0),
    start: readDateArg('start'),
    end: readDateArg('end'),
    output: readArg('output') ?? null,
    full: process.argv.includes('--full'),
  };
}

function toPrintable(outcome: SymbolOutcome, full: boolean): unknown {
  if (!outcome.ok || full) return outcome;
  const { indicators: _indicators, ...analysis } = outcome.analysis;
  return { ...outcome, analysis };
}

function printSummary(outcomes: SymbolOutcome[], outputPath: string): void {
  console.log('\n' + '='.repeat(50));
  console.log('Analysis Complete');
  console.log('='.repeat(50));
  for (const outcome of outcomes) {
    if (!outcome.ok) {
      console.log(`  ${outcome.symbol.padEnd(8)} FAILED: ${outcome.error}`);
      continue;
    }
    const { recommendation, quality, sentiment } = outcome.analysis;
    const verdict =
      quality.verdict.status === 'insufficient_data'
        ? 'insufficient data'
        : `${quality.verdict.periodsPassing}/${quality.verdict.periodsEvaluated} periods`;
    console.log(
      `  ${outcome.symbol.padEnd(8)} ${recommendation.technicalSignal.padEnd(5)} ` +
        `overall=${recommendation.overall.padEnd(9)} quality=${verdict} ` +
        `sentiment=${sentiment.label ?? 'no headlines'}`
    );
  }
  console.log(`\nOutput: ${outputPath}`);
  console.log('='.repeat(50) + '\n');
}

async function main(): Promise<void> {
  const args = parseCliArgs();
  if (!args.input) {
    throw new Error('Missing --input <snapshot.json> (or SNAPSHOT_FILE)');
  }

  const config = getAnalysisConfig();
  const provider = await SnapshotProvider.fromFile(resolve(process.cwd(), args.input));
  const symbols = args.symbols.length > 0 ? args.symbols : provider.symbols();
  logger.info({ symbols, input: args.input }, 'Analyzing snapshot');

  const outcomes = await analyzeSymbols(symbols, provider.asDataSources(), {
    start: args.start,
    end: args.end,
    config,
  });

  const json = JSON.stringify(outcomes.map((o) => toPrintable(o, args.full)), null, 2);
  if (args.output) {
    const outputPath = resolve(process.cwd(), args.output);
    mkdirSync(dirname(outputPath), { recursive: true });
    writeFileSync(outputPath, json + '\n');
    printSummary(outcomes, outputPath);
  } else {
    process.stdout.write(json + '\n');
  }

  if (outcomes.some((o) => !o.ok)) {
    process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  logger.error({ error }, 'Analysis run failed');
  console.error('Analysis run failed:', error);
  process.exitCode = 1;
});
