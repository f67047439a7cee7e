/**
 * Time utilities for consistent date handling
 */

import { format, isValid, parse } from 'date-fns';

export function formatDate(date: Date): string {
  return format(date, 'yyyy-MM-dd');
}

export function getRunId(date: Date, hash: string): string {
  return `${formatDate(date)}__${hash.substring(0, 8)}`;
}

/**
 * Parses a fiscal period end. Accepts a full ISO date (`2023-09-30`) or a
 * bare year (`2023`, read as Dec 31). Returns `yyyy-MM-dd` or null.
 */
export function parsePeriodEnd(value: unknown): string | null {
  if (typeof value === 'number' && Number.isInteger(value)) {
    return parsePeriodEnd(String(value));
  }
  if (typeof value !== 'string') return null;

  const trimmed = value.trim();
  if (/^\d{4}$/.test(trimmed)) {
    return `${trimmed}-12-31`;
  }
  if (!/^\d{4}-\d{2}-\d{2}/.test(trimmed)) return null;

  const strict = parse(trimmed.slice(0, 10), 'yyyy-MM-dd', new Date());
  if (!isValid(strict)) return null;
  return formatDate(strict);
}

export function isOlderThan(writtenAtMs: number, ttlMs: number, nowMs: number): boolean {
  return nowMs - writtenAtMs > ttlMs;
}

export function toIsoTimestamp(ms: number): string {
  return new Date(ms).toISOString();
}

export function daysToMs(days: number): number {
  return days * 24 * 60 * 60 * 1000;
}

export function secondsToMs(seconds: number): number {
  return seconds * 1000;
}
