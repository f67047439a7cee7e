/**
 * On-disk response cache
 *
 * One JSON file per (kind, symbol) holding the write time and the payload.
 * Reads and writes never throw: IO, parse and shape failures are logged and
 * degrade to a miss or a skipped write.
 */

import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from 'fs';
import { join } from 'path';
import { isOlderThan, toIsoTimestamp } from '@/core/time';
import { toError } from '@/core/errors';
import { createChildLogger } from '@/utils/logger';
import { isRecord, normalizeSymbol } from '@/utils/values';

const logger = createChildLogger('response_cache');

export type CacheKind = 'fundamentals' | 'overview';

export type PayloadGuard<T> = (value: unknown) => value is T;

export interface ResponseCacheOptions {
  dir: string;
  ttlMs: Record<CacheKind, number>;
  enabled?: boolean;
  now?: () => number;
}

interface CacheEnvelope {
  written_at: number;
  kind: CacheKind;
  key: string;
  payload: unknown;
}

export class ResponseCache {
  private readonly dir: string;
  private readonly ttlMs: Record<CacheKind, number>;
  private readonly enabled: boolean;
  private readonly now: () => number;

  constructor(options: ResponseCacheOptions) {
    this.dir = options.dir;
    this.ttlMs = options.ttlMs;
    this.enabled = options.enabled ?? true;
    this.now = options.now ?? Date.now;
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  pathFor(kind: CacheKind, key: string): string {
    const safeKey = normalizeSymbol(key).replace(/[^A-Z0-9._-]/g, '_');
    return join(this.dir, `${kind}_${safeKey}.json`);
  }

  /** Returns the payload if present, fresh and shaped as `guard` expects. */
  get<T>(kind: CacheKind, key: string, guard: PayloadGuard<T>): T | null {
    if (!this.enabled) return null;

    const path = this.pathFor(kind, key);
    if (!existsSync(path)) {
      logger.debug({ kind, key }, 'Cache miss');
      return null;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(path, 'utf-8'));
    } catch (error) {
      logger.warn({ kind, key, path, error: toError(error).message }, 'Unreadable cache entry');
      return null;
    }

    if (!isRecord(parsed) || typeof parsed.written_at !== 'number') {
      logger.warn({ kind, key, path }, 'Cache entry has no write timestamp');
      return null;
    }

    const ttlMs = this.ttlMs[kind];
    if (isOlderThan(parsed.written_at, ttlMs, this.now())) {
      logger.debug(
        { kind, key, writtenAt: toIsoTimestamp(parsed.written_at) },
        'Cache entry expired'
      );
      return null;
    }

    const payload = parsed.payload;
    try {
      if (guard(payload)) {
        logger.debug({ kind, key }, 'Cache hit');
        return payload;
      }
    } catch (error) {
      logger.warn({ kind, key, path, error: toError(error).message }, 'Cache shape check could not run');
      return null;
    }

    logger.warn({ kind, key, path }, 'Cache entry failed shape check');
    return null;
  }

  /** Last write wins. Returns false when the write was skipped or failed. */
  put(kind: CacheKind, key: string, payload: unknown): boolean {
    if (!this.enabled) return false;

    const path = this.pathFor(kind, key);
    const envelope: CacheEnvelope = {
      written_at: this.now(),
      kind,
      key: normalizeSymbol(key),
      payload,
    };

    try {
      mkdirSync(this.dir, { recursive: true });
      const tmpPath = `${path}.${process.pid}.tmp`;
      writeFileSync(tmpPath, JSON.stringify(envelope), 'utf-8');
      renameSync(tmpPath, path);
      return true;
    } catch (error) {
      logger.warn({ kind, key, path, error: toError(error).message }, 'Cache write failed');
      return false;
    }
  }
}
