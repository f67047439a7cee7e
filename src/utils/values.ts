/**
 * Narrowing helpers for untyped provider and config payloads.
 */

export type UnknownRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function toNullableNumber(value: unknown): number | null {
  if (value === null || value === undefined) return null;
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string' && value.trim()) {
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

/** Parses `"1.2345%"` style values; plain numbers are accepted too. */
export function toNullablePercent(value: unknown): number | null {
  if (typeof value === 'string') {
    return toNullableNumber(value.replace('%', ''));
  }
  return toNullableNumber(value);
}

export function toNullableString(value: unknown): string | null {
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  if (!trimmed || trimmed === 'None' || trimmed === '-') return null;
  return trimmed;
}

export function pickNumber(data: UnknownRecord, keys: readonly string[]): number | null {
  for (const key of keys) {
    const num = toNullableNumber(data[key]);
    if (num !== null) return num;
  }
  return null;
}

export function pickString(data: UnknownRecord, keys: readonly string[]): string | null {
  for (const key of keys) {
    const str = toNullableString(data[key]);
    if (str !== null) return str;
  }
  return null;
}

export function normalizeSymbol(symbol: string): string {
  return symbol.trim().toUpperCase();
}
