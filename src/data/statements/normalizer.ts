/**
 * Converts raw provider payloads into canonical series.
 *
 * Nothing in here throws: a missing envelope yields an empty series, a
 * record without a parseable period end is dropped, and a field that is
 * absent or non-numeric becomes null.
 */

import { parsePeriodEnd } from '@/core/time';
import { DAILY_SERIES_KEY, GLOBAL_QUOTE_KEY } from '@/providers/alphavantage/types';
import type {
  CompanyOverview,
  GlobalQuote,
  NormalizedSeries,
  PriceBar,
  StatementFieldMap,
  StatementKind,
  StatementRecord,
} from '@/types/fundamentals';
import {
  isRecord,
  pickNumber,
  pickString,
  toNullableNumber,
  toNullablePercent,
  toNullableString,
} from '@/utils/values';
import {
  GLOBAL_QUOTE_FIELDS,
  OVERVIEW_NUMERIC_FIELDS,
  OVERVIEW_TEXT_FIELDS,
  PRICE_BAR_FIELDS,
  STATEMENT_SCHEMAS,
  type StatementSchema,
} from './schema_map';

function byPeriodEnd<F extends string>(a: StatementRecord<F>, b: StatementRecord<F>): number {
  return a.periodEnd < b.periodEnd ? -1 : a.periodEnd > b.periodEnd ? 1 : 0;
}

export function normalizeStatement<K extends StatementKind>(
  raw: unknown,
  kind: K
): NormalizedSeries<StatementFieldMap[K]> {
  const schema: StatementSchema<StatementFieldMap[K]> = STATEMENT_SCHEMAS[kind];
  if (!isRecord(raw)) return [];

  const reports = raw[schema.envelopeKey];
  if (!Array.isArray(reports)) return [];

  const records: NormalizedSeries<StatementFieldMap[K]> = [];
  for (const report of reports) {
    if (!isRecord(report)) continue;

    const periodEnd = parsePeriodEnd(report[schema.dateKey]);
    if (!periodEnd) continue;

    const values: Partial<Record<StatementFieldMap[K], number | null>> = {};
    for (const mapping of schema.fields) {
      values[mapping.field] = pickNumber(report, mapping.vendorKeys);
    }

    records.push({
      periodEnd,
      currency: schema.currencyKey ? toNullableString(report[schema.currencyKey]) : null,
      values,
    });
  }

  return records.sort(byPeriodEnd);
}

/** Returns null unless the payload names the company (`Symbol` or `Name`). */
export function normalizeOverview(raw: unknown): CompanyOverview | null {
  if (!isRecord(raw)) return null;

  const text = (field: keyof typeof OVERVIEW_TEXT_FIELDS) =>
    pickString(raw, OVERVIEW_TEXT_FIELDS[field]);
  const num = (field: keyof typeof OVERVIEW_NUMERIC_FIELDS) =>
    pickNumber(raw, OVERVIEW_NUMERIC_FIELDS[field]);

  const symbol = text('symbol');
  const name = text('name');
  if (symbol === null && name === null) return null;

  return {
    symbol: symbol?.toUpperCase() ?? null,
    name,
    exchange: text('exchange'),
    currency: text('currency'),
    sector: text('sector'),
    industry: text('industry'),
    sharesOutstanding: num('sharesOutstanding'),
    marketCap: num('marketCap'),
    ebitda: num('ebitda'),
    peRatio: num('peRatio'),
    psRatio: num('psRatio'),
    pbRatio: num('pbRatio'),
    dividendYield: num('dividendYield'),
    beta: num('beta'),
  };
}

/** Daily bars, oldest first. */
export function normalizeDailySeries(raw: unknown): PriceBar[] {
  if (!isRecord(raw)) return [];
  const series = raw[DAILY_SERIES_KEY];
  if (!isRecord(series)) return [];

  const bars: PriceBar[] = [];
  for (const [dateKey, row] of Object.entries(series)) {
    const date = parsePeriodEnd(dateKey);
    if (!date || !isRecord(row)) continue;

    const field = (key: keyof typeof PRICE_BAR_FIELDS) => toNullableNumber(row[PRICE_BAR_FIELDS[key]]);
    bars.push({
      date,
      open: field('open'),
      high: field('high'),
      low: field('low'),
      close: field('close'),
      adjustedClose: field('adjustedClose'),
      volume: field('volume'),
      dividendAmount: field('dividendAmount'),
      splitCoefficient: field('splitCoefficient'),
    });
  }

  return bars.sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
}

export function normalizeGlobalQuote(raw: unknown): GlobalQuote | null {
  if (!isRecord(raw)) return null;
  const quote = raw[GLOBAL_QUOTE_KEY];
  if (!isRecord(quote) || Object.keys(quote).length === 0) return null;

  const symbol = toNullableString(quote[GLOBAL_QUOTE_FIELDS.symbol]);
  return {
    symbol: symbol?.toUpperCase() ?? null,
    price: toNullableNumber(quote[GLOBAL_QUOTE_FIELDS.price]),
    previousClose: toNullableNumber(quote[GLOBAL_QUOTE_FIELDS.previousClose]),
    changePercent: toNullablePercent(quote[GLOBAL_QUOTE_FIELDS.changePercent]),
    latestTradingDay: parsePeriodEnd(quote[GLOBAL_QUOTE_FIELDS.latestTradingDay]),
  };
}

// Series accessors

export function latestValue<F extends string>(
  series: NormalizedSeries<F>,
  field: F
): number | null {
  const last = series[series.length - 1];
  return last ? last.values[field] ?? null : null;
}

export function priorValue<F extends string>(
  series: NormalizedSeries<F>,
  field: F
): number | null {
  const prior = series[series.length - 2];
  return prior ? prior.values[field] ?? null : null;
}

export function fieldValues<F extends string>(
  series: NormalizedSeries<F>,
  field: F
): Array<number | null> {
  return series.map((record) => record.values[field] ?? null);
}
