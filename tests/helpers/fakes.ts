import type { FetchLike, ResponseLike } from '@/providers/types';
import type { Clock } from '@/utils/throttler';

export interface FakeClock extends Clock {
  sleeps: number[];
  advance(ms: number): void;
}

/** Clock whose `sleep` advances time instantly. */
export function makeClock(start: number = Date.UTC(2024, 5, 3, 14, 0, 0)): FakeClock {
  let current = start;
  const sleeps: number[] = [];
  return {
    sleeps,
    now: () => current,
    sleep: async (ms: number) => {
      sleeps.push(ms);
      current += ms;
    },
    advance: (ms: number) => {
      current += ms;
    },
  };
}

export type FakeReply = { status?: number; body: unknown } | Error;

export function reply(body: unknown, status: number = 200): FakeReply {
  return { status, body };
}

function toResponse(r: Exclude<FakeReply, Error>): ResponseLike {
  const status = r.status ?? 200;
  const text = typeof r.body === 'string' ? r.body : JSON.stringify(r.body);
  return {
    status,
    ok: status >= 200 && status < 300,
    text: async () => text,
  };
}

export interface FakeTransport {
  fetchImpl: FetchLike;
  calls: URL[];
  /** Query functions (Alpha Vantage) or paths (Finnhub) in call order. */
  functions(): string[];
}

/**
 * Routes each request through `handler`. The handler sees the parsed URL
 * and how many times the same route was called before.
 */
export function makeTransport(
  handler: (url: URL, attempt: number) => FakeReply
): FakeTransport {
  const calls: URL[] = [];
  const attempts = new Map<string, number>();

  const fetchImpl: FetchLike = async (rawUrl) => {
    const url = new URL(rawUrl);
    calls.push(url);
    const key = `${url.pathname}|${url.searchParams.get('function') ?? ''}|${url.searchParams.get('symbol') ?? ''}`;
    const attempt = attempts.get(key) ?? 0;
    attempts.set(key, attempt + 1);

    const result = handler(url, attempt);
    if (result instanceof Error) throw result;
    return toResponse(result);
  };

  return {
    fetchImpl,
    calls,
    functions: () =>
      calls.map((url) => url.searchParams.get('function') ?? url.pathname.split('/').pop() ?? ''),
  };
}

/** Alpha Vantage style routing by `function` and `symbol`. */
export function routeByFunction(
  routes: Record<string, FakeReply | ((symbol: string, attempt: number) => FakeReply)>
): (url: URL, attempt: number) => FakeReply {
  return (url, attempt) => {
    const fn = url.searchParams.get('function') ?? url.pathname;
    const route = routes[fn];
    if (route === undefined) return reply({});
    return typeof route === 'function'
      ? route(url.searchParams.get('symbol') ?? '', attempt)
      : route;
  };
}
