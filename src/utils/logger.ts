/**
 * Pino logging. Development runs print pretty lines to stderr so stdout stays
 * free for report output; production and test runs emit JSON.
 */

import pino, { type Logger } from 'pino';
import { getEnvConfig } from '@/core/env';

const redactPaths = [
  'apiKey',
  'api_key',
  'authorization',
  'password',
  'secret',
  'token',
  '*.apiKey',
  '*.api_key',
  '*.token',
  'headers.authorization',
];

function createRootLogger(): Logger {
  const { logLevel, nodeEnv } = getEnvConfig();

  return pino({
    name: 'equity-signal-engine',
    level: logLevel,
    redact: {
      paths: redactPaths,
      censor: '[REDACTED]',
    },
    serializers: {
      error: pino.stdSerializers.err,
    },
    transport:
      nodeEnv === 'development'
        ? {
            target: 'pino-pretty',
            options: {
              colorize: true,
              ignore: 'pid,hostname',
              destination: 2,
            },
          }
        : undefined,
  });
}

export const logger = createRootLogger();

export function createChildLogger(module: string): Logger {
  return logger.child({ module });
}
