/**
 * Logging with Pino - API keys are redacted
 */

import pino, { type Logger } from 'pino';

const redactPaths = [
  'apiKey',
  'apikey',
  'api_key',
  'alphaVantageApiKey',
  'finnhubApiKey',
  'authorization',
  'Authorization',
  'token',
  '*.apiKey',
  '*.apikey',
  '*.api_key',
  '*.token',
  'headers.authorization',
  'headers.Authorization',
];

const usePrettyTransport =
  process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test';

export const logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  redact: {
    paths: redactPaths,
    censor: '[REDACTED]',
  },
  transport: usePrettyTransport
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          ignore: 'pid,hostname',
        },
      }
    : undefined,
});

export type { Logger };

export function createChildLogger(name: string): Logger {
  return logger.child({ module: name });
}

/**
 * Masks credential query parameters so request URLs can be logged.
 */
export function maskUrlSecrets(url: string): string {
  return url.replace(/([?&](?:apikey|token)=)[^&]*/gi, '$1[REDACTED]');
}
