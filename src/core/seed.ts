/**
 * Content hashing for run records
 */

import { createHash } from 'crypto';

export function deterministicHash(input: string): string {
  return createHash('sha256').update(input).digest('hex');
}

export function contentHash(content: unknown): string {
  return deterministicHash(stableStringify(content));
}

export function stableStringify(obj: unknown): string {
  if (obj === null || typeof obj !== 'object') {
    return JSON.stringify(obj) ?? 'null';
  }

  if (Array.isArray(obj)) {
    return '[' + obj.map(stableStringify).join(',') + ']';
  }

  const entries = Object.entries(obj)
    .filter(([, value]) => value !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  const pairs = entries.map(
    ([key, value]) => JSON.stringify(key) + ':' + stableStringify(value)
  );
  return '{' + pairs.join(',') + '}';
}
