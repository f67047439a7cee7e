/**
 * Price fallback chain.
 *
 * Each source either finds a quote, passes to the next source with a note,
 * or reports throttling, which ends the lookup for the whole batch.
 */

import type { PriceSourceId } from '@/core/config';
import { normalizeDailySeries, normalizeGlobalQuote } from '@/data/statements/normalizer';
import type { PriceQuote } from '@/types/screening';
import { createChildLogger } from '@/utils/logger';
import { normalizeSymbol } from '@/utils/values';
import type { AlphaVantageClient } from './alphavantage/client';
import type { FinnhubClient } from './finnhub/client';
import type { FetchOutcome } from './types';

const logger = createChildLogger('price_chain');

export type PriceLookup =
  | { kind: 'found'; quote: PriceQuote }
  | { kind: 'next'; note: string }
  | { kind: 'throttled'; message: string };

export interface PriceSource {
  readonly id: PriceSourceId;
  lookup(symbol: string): Promise<PriceLookup>;
}

export type PriceResolution =
  | { kind: 'found'; quote: PriceQuote; notes: string[] }
  | { kind: 'throttled'; source: PriceSourceId; message: string; notes: string[] }
  | { kind: 'missing'; notes: string[] };

function describeMiss(id: PriceSourceId, outcome: FetchOutcome<unknown>): string {
  switch (outcome.kind) {
    case 'empty':
      return `${id}: ${outcome.reason} (${outcome.detail})`;
    case 'fatal':
      return `${id}: failed after ${outcome.attempts} attempts (${outcome.error.message})`;
    case 'throttled':
      return `${id}: throttled (${outcome.message})`;
    case 'ok':
      return `${id}: no usable price`;
  }
}

export class FinnhubQuoteSource implements PriceSource {
  readonly id = 'finnhub_quote' as const;

  constructor(private readonly client: FinnhubClient) {}

  async lookup(symbol: string): Promise<PriceLookup> {
    const outcome = await this.client.fetchQuote(symbol);
    // A Finnhub throttle only costs this source; Alpha Vantage can still answer.
    if (outcome.kind !== 'ok') {
      return { kind: 'next', note: describeMiss(this.id, outcome) };
    }
    const { c, dp, t } = outcome.data;
    if (c === null || c <= 0) {
      return { kind: 'next', note: `${this.id}: no usable price` };
    }
    return {
      kind: 'found',
      quote: {
        symbol,
        price: c,
        changePercent: dp,
        asOf: t !== null ? new Date(t * 1000).toISOString() : null,
        source: this.id,
      },
    };
  }
}

export class AlphaVantageDailySource implements PriceSource {
  readonly id = 'av_daily_adjusted' as const;

  constructor(private readonly client: AlphaVantageClient) {}

  async lookup(symbol: string): Promise<PriceLookup> {
    const outcome = await this.client.getDailyAdjusted(symbol);
    if (outcome.kind === 'throttled') return outcome;
    if (outcome.kind !== 'ok') {
      return { kind: 'next', note: describeMiss(this.id, outcome) };
    }

    const bars = normalizeDailySeries(outcome.data);
    const last = bars[bars.length - 1];
    if (!last || last.close === null || last.close <= 0) {
      return { kind: 'next', note: `${this.id}: no usable close` };
    }

    let changePercent: number | null = null;
    const prev = bars[bars.length - 2];
    if (prev) {
      const lastClose = last.adjustedClose ?? last.close;
      const prevClose = prev.adjustedClose ?? prev.close;
      if (prevClose !== null && prevClose !== 0) {
        changePercent = (lastClose / prevClose - 1) * 100;
      }
    }

    return {
      kind: 'found',
      quote: { symbol, price: last.close, changePercent, asOf: last.date, source: this.id },
    };
  }
}

export class AlphaVantageGlobalQuoteSource implements PriceSource {
  readonly id = 'av_global_quote' as const;

  constructor(private readonly client: AlphaVantageClient) {}

  async lookup(symbol: string): Promise<PriceLookup> {
    const outcome = await this.client.getGlobalQuote(symbol);
    if (outcome.kind === 'throttled') return outcome;
    if (outcome.kind !== 'ok') {
      return { kind: 'next', note: describeMiss(this.id, outcome) };
    }

    const quote = normalizeGlobalQuote(outcome.data);
    if (!quote || quote.price === null || quote.price <= 0) {
      return { kind: 'next', note: `${this.id}: no usable price` };
    }
    return {
      kind: 'found',
      quote: {
        symbol,
        price: quote.price,
        changePercent: quote.changePercent,
        asOf: quote.latestTradingDay,
        source: this.id,
      },
    };
  }
}

export class PriceResolver {
  constructor(private readonly sources: readonly PriceSource[]) {}

  getSourceIds(): PriceSourceId[] {
    return this.sources.map((s) => s.id);
  }

  async resolve(rawSymbol: string): Promise<PriceResolution> {
    const symbol = normalizeSymbol(rawSymbol);
    const notes: string[] = [];

    for (const source of this.sources) {
      const result = await source.lookup(symbol);
      if (result.kind === 'found') {
        logger.debug({ symbol, source: source.id, price: result.quote.price }, 'Price resolved');
        return { kind: 'found', quote: result.quote, notes };
      }
      if (result.kind === 'throttled') {
        logger.warn({ symbol, source: source.id }, 'Price lookup throttled');
        return { kind: 'throttled', source: source.id, message: result.message, notes };
      }
      notes.push(result.note);
    }

    logger.warn({ symbol, notes }, 'No price source produced a quote');
    return { kind: 'missing', notes };
  }
}

export interface PriceSourceClients {
  alphaVantage: AlphaVantageClient;
  finnhub: FinnhubClient | null;
}

/**
 * Builds sources in the configured order. `finnhub_quote` is skipped when
 * no Finnhub client is configured.
 */
export function buildPriceSources(
  ids: readonly PriceSourceId[],
  clients: PriceSourceClients
): PriceSource[] {
  const sources: PriceSource[] = [];
  for (const id of ids) {
    switch (id) {
      case 'finnhub_quote':
        if (clients.finnhub) {
          sources.push(new FinnhubQuoteSource(clients.finnhub));
        } else {
          logger.debug('FINNHUB_API_KEY not set, skipping finnhub_quote');
        }
        break;
      case 'av_daily_adjusted':
        sources.push(new AlphaVantageDailySource(clients.alphaVantage));
        break;
      case 'av_global_quote':
        sources.push(new AlphaVantageGlobalQuoteSource(clients.alphaVantage));
        break;
    }
  }
  return sources;
}
