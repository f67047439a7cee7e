/**
 * Environment variable handling with validation
 * API keys are never logged or exposed
 */

import { MissingCredentialError } from './errors';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';
export type NodeEnv = 'development' | 'production' | 'test';

export interface EnvConfig {
  alphaVantageApiKey: string;
  finnhubApiKey: string | null;
  cacheDir: string;
  logLevel: LogLevel;
  nodeEnv: NodeEnv;
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];
const NODE_ENVS: readonly NodeEnv[] = ['development', 'production', 'test'];

export const DEFAULT_CACHE_DIR = '.cache/alphavantage';

function getEnvVar(
  env: NodeJS.ProcessEnv,
  name: string
): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function requireEnvVar(env: NodeJS.ProcessEnv, name: string): string {
  const value = getEnvVar(env, name);
  if (!value) {
    throw new MissingCredentialError(name);
  }
  return value;
}

function pickOne<T extends string>(
  raw: string | undefined,
  allowed: readonly T[],
  fallback: T
): T {
  return allowed.find((candidate) => candidate === raw) ?? fallback;
}

export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  return {
    alphaVantageApiKey: requireEnvVar(env, 'ALPHAVANTAGE_API_KEY'),
    finnhubApiKey: getEnvVar(env, 'FINNHUB_API_KEY') ?? null,
    cacheDir: getEnvVar(env, 'SCREENER_CACHE_DIR') ?? DEFAULT_CACHE_DIR,
    logLevel: pickOne(getEnvVar(env, 'LOG_LEVEL'), LOG_LEVELS, 'info'),
    nodeEnv: pickOne(env.NODE_ENV, NODE_ENVS, 'development'),
  };
}

let cachedConfig: EnvConfig | null = null;

export function getEnvConfig(): EnvConfig {
  if (!cachedConfig) {
    cachedConfig = loadEnvConfig();
  }
  return cachedConfig;
}
