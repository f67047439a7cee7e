/**
 * Per-run context: everything the screening pipeline needs, built once
 * from config and environment and passed explicitly.
 */

import { resolve } from 'path';
import type { AppConfig } from './config';
import type { EnvConfig } from './env';
import { daysToMs } from './time';
import { ResponseCache } from '@/data/cache/response_cache';
import { createAlphaVantageClient, type AlphaVantageClient } from '@/providers/alphavantage/client';
import { createFinnhubClient, type FinnhubClient } from '@/providers/finnhub/client';
import { QuoteWindow } from '@/providers/finnhub/quote_window';
import { buildPriceSources, PriceResolver } from '@/providers/price_chain';
import type { FetchLike } from '@/providers/types';
import type { GateThresholds } from '@/scoring/gate';
import type { DcfSettings } from '@/scoring/valuation';
import { createChildLogger } from '@/utils/logger';
import { systemClock, type Clock } from '@/utils/throttler';
import { getSchemaValidators, type SchemaValidators } from '@/validation/ajv_instance';

const logger = createChildLogger('context');

export interface ScreenContext {
  config: AppConfig;
  client: AlphaVantageClient;
  finnhub: FinnhubClient | null;
  cache: ResponseCache;
  prices: PriceResolver;
  thresholds: GateThresholds;
  valuation: DcfSettings;
  validators: SchemaValidators;
  clock: Clock;
}

export interface ScreenContextOverrides {
  fetchImpl?: FetchLike;
  clock?: Clock;
  useCache?: boolean;
  cacheDir?: string;
}

export function createScreenContext(
  config: AppConfig,
  env: Pick<EnvConfig, 'alphaVantageApiKey' | 'finnhubApiKey' | 'cacheDir'>,
  overrides: ScreenContextOverrides = {}
): ScreenContext {
  const clock = overrides.clock ?? systemClock;
  const transport = overrides.fetchImpl ? { fetchImpl: overrides.fetchImpl } : {};

  const client = createAlphaVantageClient(env.alphaVantageApiKey, config.fetcher, {
    ...transport,
    clock,
  });

  const finnhub = env.finnhubApiKey
    ? createFinnhubClient(env.finnhubApiKey, {
        ...transport,
        clock,
        limiter: new QuoteWindow(60, clock),
      })
    : null;

  const cacheDir = resolve(config.projectRoot, overrides.cacheDir ?? env.cacheDir);
  const cache = new ResponseCache({
    dir: cacheDir,
    ttlMs: {
      fundamentals: daysToMs(config.cacheTtl.fundamentals_ttl_days),
      overview: daysToMs(config.cacheTtl.overview_ttl_days),
    },
    enabled: overrides.useCache ?? true,
    now: () => clock.now(),
  });

  const prices = new PriceResolver(
    buildPriceSources(config.universe.price_sources, { alphaVantage: client, finnhub })
  );

  logger.debug(
    { cacheDir, cacheEnabled: cache.isEnabled(), priceSources: prices.getSourceIds() },
    'Screen context created'
  );

  return {
    config,
    client,
    finnhub,
    cache,
    prices,
    thresholds: config.gate,
    valuation: config.valuation,
    validators: getSchemaValidators(config.schemasDir),
    clock,
  };
}
