/**
 * Environment variable handling with validation
 */

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'silent';
export type NodeEnv = 'development' | 'production' | 'test';

export interface EnvConfig {
  logLevel: LogLevel;
  nodeEnv: NodeEnv;
  analysisConfigPath: string | null;
  snapshotFile: string | null;
}

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'silent'];
const NODE_ENVS: readonly NodeEnv[] = ['development', 'production', 'test'];

function getEnvVar(name: string): string | undefined {
  const value = process.env[name]?.trim();
  return value ? value : undefined;
}

function pickOption<T extends string>(raw: string, options: readonly T[], fallback: T): T {
  return options.find((option) => option === raw) ?? fallback;
}

export function loadEnvConfig(): EnvConfig {
  const logLevel = pickOption(getEnvVar('LOG_LEVEL') || 'info', LOG_LEVELS, 'info');
  const nodeEnv = pickOption(getEnvVar('NODE_ENV') || 'development', NODE_ENVS, 'development');

  return {
    logLevel,
    nodeEnv,
    analysisConfigPath: getEnvVar('ANALYSIS_CONFIG') ?? null,
    snapshotFile: getEnvVar('SNAPSHOT_FILE') ?? null,
  };
}

let cachedConfig: EnvConfig | null = null;

export function getEnvConfig(): EnvConfig {
  if (!cachedConfig) {
    cachedConfig = loadEnvConfig();
  }
  return cachedConfig;
}

export function resetEnvConfig(): void {
  cachedConfig = null;
}
