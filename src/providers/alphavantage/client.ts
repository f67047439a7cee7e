/**
 * Alpha Vantage API client
 *
 * One client owns one pacing clock: every query function shares it, and
 * calls are serialized in FIFO order. Transport failures (network errors,
 * timeouts, 5xx) are retried with linear backoff; throttle responses are
 * never retried and come back as a `throttled` outcome.
 */

import type { FetcherConfig } from '@/core/config';
import { MissingCredentialError, ProviderError, toError } from '@/core/errors';
import { secondsToMs } from '@/core/time';
import { createChildLogger, maskUrlSecrets } from '@/utils/logger';
import { RequestThrottler, systemClock, type Clock } from '@/utils/throttler';
import { parseCsvTable } from '@/utils/csv';
import { isRecord, normalizeSymbol, type UnknownRecord } from '@/utils/values';
import {
  defaultFetch,
  emptyOutcome,
  type FetchLike,
  type FetchOutcome,
} from '../types';
import {
  DAILY_SERIES_KEY,
  GLOBAL_QUOTE_KEY,
  type AlphaVantageFunction,
  type ListingQuery,
  type OutputSize,
} from './types';

const logger = createChildLogger('alphavantage');

const PROVIDER = 'alphavantage';

export interface AlphaVantageClientOptions {
  apiKey: string;
  baseUrl?: string;
  pauseMs?: number;
  timeoutMs?: number;
  maxRetries?: number;
  maxBackoffMs?: number;
  fetchImpl?: FetchLike;
  clock?: Clock;
}

const DEFAULTS = {
  baseUrl: 'https://www.alphavantage.co/query',
  pauseMs: 12_000,
  timeoutMs: 15_000,
  maxRetries: 3,
  maxBackoffMs: 30_000,
};

const THROTTLE_INFO_PATTERN = /rate limit|call frequency|requests per (minute|day)/i;

/**
 * Returns the provider's throttle message when the payload is a rate-limit
 * notice, otherwise null.
 */
export function detectThrottle(payload: UnknownRecord): string | null {
  if ('Note' in payload) {
    return String(payload.Note);
  }
  const info = payload.Information;
  if (typeof info === 'string' && THROTTLE_INFO_PATTERN.test(info)) {
    return info;
  }
  return null;
}

function looksLikeJson(body: string): boolean {
  return body.startsWith('{') || body.startsWith('[');
}

function truncate(text: string, max = 160): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

class RetryableResponseError extends Error {
  constructor(public readonly status: number) {
    super(`HTTP ${status}`);
    this.name = 'RetryableResponseError';
  }
}

export class AlphaVantageClient {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly pauseMs: number;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly maxBackoffMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly clock: Clock;
  private readonly throttler: RequestThrottler;
  private requestCount = 0;

  constructor(options: AlphaVantageClientOptions) {
    if (!options.apiKey || !options.apiKey.trim()) {
      throw new MissingCredentialError('ALPHAVANTAGE_API_KEY');
    }
    this.apiKey = options.apiKey.trim();
    this.baseUrl = options.baseUrl ?? DEFAULTS.baseUrl;
    this.pauseMs = options.pauseMs ?? DEFAULTS.pauseMs;
    this.timeoutMs = options.timeoutMs ?? DEFAULTS.timeoutMs;
    this.maxRetries = options.maxRetries ?? DEFAULTS.maxRetries;
    this.maxBackoffMs = options.maxBackoffMs ?? DEFAULTS.maxBackoffMs;
    this.fetchImpl = options.fetchImpl ?? defaultFetch;
    this.clock = options.clock ?? systemClock;
    this.throttler = new RequestThrottler(this.pauseMs, this.clock);
  }

  /** Number of HTTP requests sent, retries included. */
  getRequestCount(): number {
    return this.requestCount;
  }

  /**
   * Issues one query function and returns the response body. Only the
   * transport layer is interpreted here (timeouts, 5xx, HTTP 429).
   */
  async fetch(
    fn: AlphaVantageFunction,
    params: Record<string, string> = {}
  ): Promise<FetchOutcome<string>> {
    const url = this.buildUrl(fn, params);
    const symbol = params.symbol ?? null;

    try {
      return await this.throttler.schedule(() => this.sendWithRetry(url, fn, symbol));
    } catch (error) {
      const cause = toError(error);
      const attempts = this.maxRetries + 1;
      logger.error(
        { fn, symbol, attempts, error: cause.message },
        'Alpha Vantage request failed after retries'
      );
      return {
        kind: 'fatal',
        error: new ProviderError(
          `Network error after ${attempts} attempts: ${cause.message}`,
          PROVIDER,
          symbol,
          fn,
          cause
        ),
        attempts,
      };
    }
  }

  /** Fetches a JSON query function and classifies the envelope. */
  async fetchJson(
    fn: AlphaVantageFunction,
    params: Record<string, string> = {}
  ): Promise<FetchOutcome<UnknownRecord>> {
    const outcome = await this.fetch(fn, params);
    if (outcome.kind !== 'ok') return outcome;
    return this.classifyJson(fn, params.symbol ?? null, outcome.data);
  }

  async getOverview(symbol: string): Promise<FetchOutcome<UnknownRecord>> {
    const outcome = await this.fetchJson('OVERVIEW', { symbol: normalizeSymbol(symbol) });
    if (outcome.kind === 'ok' && !('Symbol' in outcome.data) && !('Name' in outcome.data)) {
      return emptyOutcome('no_data', 'overview has neither Symbol nor Name');
    }
    return outcome;
  }

  getIncomeStatement(symbol: string): Promise<FetchOutcome<UnknownRecord>> {
    return this.fetchJson('INCOME_STATEMENT', { symbol: normalizeSymbol(symbol) });
  }

  getBalanceSheet(symbol: string): Promise<FetchOutcome<UnknownRecord>> {
    return this.fetchJson('BALANCE_SHEET', { symbol: normalizeSymbol(symbol) });
  }

  getCashFlow(symbol: string): Promise<FetchOutcome<UnknownRecord>> {
    return this.fetchJson('CASH_FLOW', { symbol: normalizeSymbol(symbol) });
  }

  getEarnings(symbol: string): Promise<FetchOutcome<UnknownRecord>> {
    return this.fetchJson('EARNINGS', { symbol: normalizeSymbol(symbol) });
  }

  async getDailyAdjusted(
    symbol: string,
    outputSize: OutputSize = 'compact'
  ): Promise<FetchOutcome<UnknownRecord>> {
    const outcome = await this.fetchJson('TIME_SERIES_DAILY_ADJUSTED', {
      symbol: normalizeSymbol(symbol),
      outputsize: outputSize,
    });
    if (outcome.kind !== 'ok') return outcome;

    const series = outcome.data[DAILY_SERIES_KEY];
    if (!isRecord(series) || Object.keys(series).length === 0) {
      return emptyOutcome('no_data', `missing "${DAILY_SERIES_KEY}"`);
    }
    return outcome;
  }

  async getGlobalQuote(symbol: string): Promise<FetchOutcome<UnknownRecord>> {
    const outcome = await this.fetchJson('GLOBAL_QUOTE', { symbol: normalizeSymbol(symbol) });
    if (outcome.kind !== 'ok') return outcome;

    const quote = outcome.data[GLOBAL_QUOTE_KEY];
    if (!isRecord(quote) || Object.keys(quote).length === 0) {
      return emptyOutcome('no_data', `missing "${GLOBAL_QUOTE_KEY}"`);
    }
    return outcome;
  }

  /**
   * LISTING_STATUS is the one CSV endpoint. Throttle notices and errors
   * still arrive as JSON, so the body is sniffed first.
   */
  async getListingStatus(
    query: ListingQuery = { state: 'active' }
  ): Promise<FetchOutcome<Array<Record<string, string>>>> {
    const params: Record<string, string> = {};
    if (query.state) params.state = query.state;
    if (query.date) params.date = query.date;

    const outcome = await this.fetch('LISTING_STATUS', params);
    if (outcome.kind !== 'ok') return outcome;

    const body = outcome.data.trim();
    if (looksLikeJson(body)) {
      const classified = this.classifyJson('LISTING_STATUS', null, body);
      if (classified.kind === 'throttled' || classified.kind === 'empty') {
        return classified;
      }
      return emptyOutcome('malformed', 'expected CSV, got JSON');
    }

    const table = parseCsvTable(body);
    if (table.headers.length < 2) {
      logger.warn({ headers: table.headers }, 'Listing CSV has fewer than two columns');
      return emptyOutcome('malformed', 'listing CSV has fewer than two columns');
    }
    if (table.rows.length === 0) {
      return emptyOutcome('no_data', 'listing CSV has no rows');
    }
    return { kind: 'ok', data: table.rows };
  }

  private buildUrl(fn: AlphaVantageFunction, params: Record<string, string>): string {
    const url = new URL(this.baseUrl);
    url.searchParams.set('function', fn);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value);
    }
    url.searchParams.set('apikey', this.apiKey);
    return url.toString();
  }

  private async sendWithRetry(
    url: string,
    fn: AlphaVantageFunction,
    symbol: string | null
  ): Promise<FetchOutcome<string>> {
    let lastError: Error | null = null;

    for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
      if (attempt > 0) {
        const backoffMs = Math.min(this.pauseMs * attempt, this.maxBackoffMs);
        logger.warn(
          { fn, symbol, attempt, backoffMs, error: lastError?.message },
          'Alpha Vantage request failed, retrying'
        );
        await this.clock.sleep(backoffMs);
      }

      try {
        logger.debug({ fn, symbol, url: maskUrlSecrets(url) }, 'Alpha Vantage request');
        this.requestCount++;
        const response = await this.fetchImpl(url, {
          signal: AbortSignal.timeout(this.timeoutMs),
        });

        if (response.status >= 500) {
          throw new RetryableResponseError(response.status);
        }

        const body = await response.text();
        this.throttler.markCompleted();

        if (response.status === 429) {
          logger.warn({ fn, symbol }, 'Throttled by Alpha Vantage (HTTP 429)');
          return { kind: 'throttled', message: truncate(body || 'HTTP 429') };
        }
        if (!response.ok) {
          return emptyOutcome('malformed', `HTTP ${response.status}`);
        }
        return { kind: 'ok', data: body };
      } catch (error) {
        lastError = toError(error);
      }
    }

    throw lastError ?? new Error('Alpha Vantage request failed after retries');
  }

  private classifyJson(
    fn: AlphaVantageFunction,
    symbol: string | null,
    body: string
  ): FetchOutcome<UnknownRecord> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(body);
    } catch (error) {
      logger.warn(
        { fn, symbol, error: toError(error).message },
        'Alpha Vantage returned a non-JSON body'
      );
      return emptyOutcome('malformed', 'response is not valid JSON');
    }

    if (!isRecord(parsed)) {
      return emptyOutcome('malformed', 'response is not a JSON object');
    }

    const throttleMessage = detectThrottle(parsed);
    if (throttleMessage !== null) {
      logger.warn({ fn, symbol, note: truncate(throttleMessage) }, 'Throttled by Alpha Vantage');
      return { kind: 'throttled', message: throttleMessage };
    }

    const errorMessage = parsed['Error Message'];
    if (typeof errorMessage === 'string') {
      logger.debug({ fn, symbol, error: errorMessage }, 'Alpha Vantage reported no data');
      return emptyOutcome('no_data', truncate(errorMessage));
    }

    const information = parsed.Information;
    if (typeof information === 'string') {
      logger.warn({ fn, symbol, information: truncate(information) }, 'Alpha Vantage notice');
      return emptyOutcome('malformed', truncate(information));
    }

    if (Object.keys(parsed).length === 0) {
      return emptyOutcome('no_data', 'empty response');
    }

    return { kind: 'ok', data: parsed };
  }
}

export function createAlphaVantageClient(
  apiKey: string,
  settings: FetcherConfig,
  overrides: Partial<Pick<AlphaVantageClientOptions, 'fetchImpl' | 'clock'>> = {}
): AlphaVantageClient {
  return new AlphaVantageClient({
    apiKey,
    baseUrl: settings.base_url,
    pauseMs: secondsToMs(settings.pause_seconds),
    timeoutMs: secondsToMs(settings.timeout_seconds),
    maxRetries: settings.max_retries,
    maxBackoffMs: secondsToMs(settings.max_backoff_seconds),
    ...overrides,
  });
}
