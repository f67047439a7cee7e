/**
 * Shared types for market data providers.
 *
 * Provider calls never throw for data problems. They resolve to a tagged
 * outcome so callers can tell "no data" from "stop the batch" from a
 * transport failure that survived every retry.
 */
import type { ProviderError } from '@/core/errors';

export type EmptyReason = 'no_data' | 'malformed';

export type FetchOutcome<T> =
  | { kind: 'ok'; data: T }
  | { kind: 'empty'; reason: EmptyReason; detail: string }
  | { kind: 'throttled'; message: string }
  | { kind: 'fatal'; error: ProviderError; attempts: number };

export interface ResponseLike {
  status: number;
  ok: boolean;
  text(): Promise<string>;
}

export type FetchLike = (url: string, init: { signal: AbortSignal }) => Promise<ResponseLike>;

export const defaultFetch: FetchLike = (url, init) => fetch(url, init);

export function emptyOutcome(reason: EmptyReason, detail: string): FetchOutcome<never> {
  return { kind: 'empty', reason, detail };
}
