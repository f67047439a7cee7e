/**
 * Finnhub API Client
 * Used as a quote source ahead of Alpha Vantage so price lookups do not
 * spend the Alpha Vantage quota. Rate-limited with exponential backoff.
 */

import { ProviderError, toError } from '@/core/errors';
import { createChildLogger, maskUrlSecrets } from '@/utils/logger';
import { systemClock, type Clock } from '@/utils/throttler';
import { isRecord, normalizeSymbol, toNullableNumber, type UnknownRecord } from '@/utils/values';
import { defaultFetch, emptyOutcome, type FetchLike, type FetchOutcome } from '../types';
import { QuoteWindow } from './quote_window';
import type { FinnhubQuote } from './types';

const logger = createChildLogger('finnhub');

const BASE_URL = 'https://finnhub.io/api/v1';

export interface FinnhubClientOptions {
  apiKey: string;
  baseUrl?: string;
  maxRetries?: number;
  initialBackoffMs?: number;
  timeoutMs?: number;
  fetchImpl?: FetchLike;
  clock?: Clock;
  limiter?: QuoteWindow;
}

function parseBody(body: string): FetchOutcome<UnknownRecord> {
  let data: unknown;
  try {
    data = JSON.parse(body);
  } catch (error) {
    logger.warn({ error: toError(error).message }, 'Finnhub returned invalid JSON');
    return emptyOutcome('malformed', 'response is not valid JSON');
  }
  if (!isRecord(data)) {
    return emptyOutcome('malformed', 'response is not a JSON object');
  }
  return { kind: 'ok', data };
}

export class FinnhubClient {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly maxRetries: number;
  private readonly initialBackoffMs: number;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly clock: Clock;
  private readonly limiter: QuoteWindow;
  private requestCount = 0;

  constructor(options: FinnhubClientOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl ?? BASE_URL;
    this.maxRetries = options.maxRetries ?? 3;
    this.initialBackoffMs = options.initialBackoffMs ?? 1000;
    this.timeoutMs = options.timeoutMs ?? 15_000;
    this.fetchImpl = options.fetchImpl ?? defaultFetch;
    this.clock = options.clock ?? systemClock;
    this.limiter = options.limiter ?? new QuoteWindow(60, this.clock);
  }

  getRequestCount(): number {
    return this.requestCount;
  }

  private async fetchWithRetry(
    endpoint: string,
    params: Record<string, string | number> = {}
  ): Promise<FetchOutcome<UnknownRecord>> {
    const url = new URL(`${this.baseUrl}${endpoint}`);
    url.searchParams.set('token', this.apiKey);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, String(value));
    }
    const symbol = typeof params.symbol === 'string' ? params.symbol : null;

    let lastError: Error | null = null;
    let rateLimited = false;

    for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
      await this.limiter.acquire();
      let body: string | null = null;
      try {
        logger.debug({ url: maskUrlSecrets(url.toString()) }, 'Finnhub request');
        const response = await this.fetchImpl(url.toString(), {
          signal: AbortSignal.timeout(this.timeoutMs),
        });
        this.requestCount++;

        if (response.status === 429) {
          rateLimited = true;
          lastError = new Error('Finnhub API error: 429');
        } else if (response.status >= 400 && response.status < 500) {
          // Client errors other than 429 will not change on retry
          const cause = new Error(`Finnhub API error: ${response.status}`);
          logger.warn({ endpoint, symbol, status: response.status }, 'Finnhub rejected request');
          return {
            kind: 'fatal',
            error: new ProviderError(cause.message, 'finnhub', symbol, endpoint, cause),
            attempts: attempt + 1,
          };
        } else if (!response.ok) {
          rateLimited = false;
          lastError = new Error(`Finnhub API error: ${response.status}`);
        } else {
          body = await response.text();
        }
      } catch (error) {
        rateLimited = false;
        lastError = toError(error);
      }

      if (body !== null) {
        return parseBody(body);
      }

      if (attempt < this.maxRetries) {
        const backoffMs = this.initialBackoffMs * Math.pow(2, attempt);
        logger.warn(
          { attempt, backoffMs, error: lastError?.message },
          rateLimited ? 'Rate limited by Finnhub, backing off' : 'Finnhub request failed, retrying'
        );
        await this.clock.sleep(backoffMs);
      }
    }

    if (rateLimited) {
      return { kind: 'throttled', message: 'Finnhub rate limit (HTTP 429)' };
    }
    const cause = lastError ?? new Error('Finnhub request failed after retries');
    return {
      kind: 'fatal',
      error: new ProviderError(cause.message, 'finnhub', symbol, endpoint, cause),
      attempts: this.maxRetries + 1,
    };
  }

  async fetchQuote(symbol: string): Promise<FetchOutcome<FinnhubQuote>> {
    const outcome = await this.fetchWithRetry('/quote', { symbol: normalizeSymbol(symbol) });
    if (outcome.kind !== 'ok') return outcome;

    const q = outcome.data;
    const quote: FinnhubQuote = {
      c: toNullableNumber(q.c),
      d: toNullableNumber(q.d),
      dp: toNullableNumber(q.dp),
      h: toNullableNumber(q.h),
      l: toNullableNumber(q.l),
      o: toNullableNumber(q.o),
      pc: toNullableNumber(q.pc),
      t: toNullableNumber(q.t),
    };
    if (!quote.c || !quote.t) {
      return emptyOutcome('no_data', 'Finnhub has no quote for symbol');
    }
    return { kind: 'ok', data: quote };
  }
}

export function createFinnhubClient(
  apiKey: string,
  overrides: Partial<Omit<FinnhubClientOptions, 'apiKey'>> = {}
): FinnhubClient {
  return new FinnhubClient({ apiKey, ...overrides });
}
