/**
 * Screening pipeline: price -> fundamentals -> metrics -> DCF -> gate.
 *
 * Symbols are processed sequentially. A throttle anywhere stops the batch;
 * every symbol that was reached still gets a verdict.
 */

import type { ScreenContext } from '@/core/context';
import { loadFundamentals } from '@/data/fundamentals';
import type { FundamentalsBundle } from '@/types/fundamentals';
import type { PriceQuote } from '@/types/screening';
import type { RankedSymbol, SymbolScreenResult, SymbolScreenStatus } from '@/types/screen_run';
import { createChildLogger } from '@/utils/logger';
import { normalizeSymbol } from '@/utils/values';
import { calculateMagicFormula } from './formulas/magic_formula';
import { calculatePiotroski, mapBundleToPiotroski } from './formulas/piotroski';
import { evaluateGate } from './gate';
import { computeMetrics, emptyMetrics } from './metrics';
import { dcf } from './valuation';

const logger = createChildLogger('screen');

export interface RankOutcome {
  ranked: RankedSymbol[];
  /** Quotes resolved while ranking, reused when screening. */
  quotes: Map<string, PriceQuote>;
  halted: boolean;
  haltReason: string | null;
}

export type ScreenSymbolOutcome =
  | { kind: 'screened'; result: SymbolScreenResult }
  | { kind: 'throttled'; message: string };

export interface ScreenSymbolOptions {
  /** A quote already resolved by the caller; `null` means no price is known. */
  price?: PriceQuote | null;
}

export interface BatchOutcome {
  results: SymbolScreenResult[];
  halted: boolean;
  haltReason: string | null;
  unprocessed: string[];
}

function compareRanked(a: RankedSymbol, b: RankedSymbol): number {
  if (b.changePercent !== a.changePercent) return b.changePercent - a.changePercent;
  return a.symbol.localeCompare(b.symbol);
}

/** Ranks by today's change percent, best first. Symbols without a change are left out. */
export async function rankByPriceChange(
  ctx: ScreenContext,
  symbols: readonly string[]
): Promise<RankOutcome> {
  const ranked: RankedSymbol[] = [];
  const quotes = new Map<string, PriceQuote>();

  for (const [index, raw] of symbols.entries()) {
    const symbol = normalizeSymbol(raw);
    logger.debug({ symbol, progress: `${index + 1}/${symbols.length}` }, 'Quote');

    const resolution = await ctx.prices.resolve(symbol);
    if (resolution.kind === 'throttled') {
      logger.warn({ symbol, source: resolution.source }, 'Throttled while ranking, stopping');
      ranked.sort(compareRanked);
      return { ranked, quotes, halted: true, haltReason: resolution.message };
    }
    if (resolution.kind === 'missing') continue;

    const { quote } = resolution;
    quotes.set(symbol, quote);
    if (quote.changePercent !== null) {
      ranked.push({
        symbol,
        price: quote.price,
        changePercent: quote.changePercent,
        source: quote.source,
      });
    }
  }

  ranked.sort(compareRanked);
  return { ranked, quotes, halted: false, haltReason: null };
}

function buildResult(
  ctx: ScreenContext,
  symbol: string,
  status: SymbolScreenStatus,
  price: PriceQuote | null,
  bundle: FundamentalsBundle | null,
  fundamentalsSource: SymbolScreenResult['fundamentalsSource'],
  notes: string[]
): SymbolScreenResult {
  const priceValue = price?.price ?? null;
  const metrics = bundle ? computeMetrics(bundle, priceValue) : emptyMetrics(symbol, priceValue);
  const valuation = dcf(metrics, ctx.valuation);
  const verdict = evaluateGate(metrics, valuation.upsidePct, ctx.thresholds);

  return {
    symbol,
    status,
    price,
    fundamentalsSource,
    metrics,
    valuation,
    verdict,
    piotroski: bundle ? calculatePiotroski(mapBundleToPiotroski(bundle)) : null,
    magicFormula: bundle ? calculateMagicFormula(bundle) : null,
    notes,
  };
}

export async function screenSymbol(
  ctx: ScreenContext,
  rawSymbol: string,
  options: ScreenSymbolOptions = {}
): Promise<ScreenSymbolOutcome> {
  const symbol = normalizeSymbol(rawSymbol);
  const notes: string[] = [];

  let price: PriceQuote | null;
  if (options.price !== undefined) {
    price = options.price;
  } else {
    const resolution = await ctx.prices.resolve(symbol);
    if (resolution.kind === 'throttled') {
      return { kind: 'throttled', message: resolution.message };
    }
    notes.push(...resolution.notes);
    price = resolution.kind === 'found' ? resolution.quote : null;
  }

  const load = await loadFundamentals(ctx, symbol);
  let result: SymbolScreenResult;
  switch (load.kind) {
    case 'throttled':
      return { kind: 'throttled', message: load.message };
    case 'ok':
      result = buildResult(ctx, symbol, 'screened', price, load.bundle, load.source, notes);
      break;
    case 'no_data':
      notes.push(`fundamentals: ${load.detail}`);
      result = buildResult(ctx, symbol, 'no_data', price, null, null, notes);
      break;
    case 'failed':
      notes.push(`fundamentals: ${load.error.message}`);
      result = buildResult(ctx, symbol, 'failed', price, null, null, notes);
      break;
  }

  logger.info(
    {
      symbol,
      status: result.status,
      pass: result.verdict.pass,
      upsidePct: result.valuation.upsidePct,
    },
    'Screened'
  );
  return { kind: 'screened', result };
}

export async function screenBatch(
  ctx: ScreenContext,
  symbols: readonly string[],
  quotes: ReadonlyMap<string, PriceQuote> = new Map()
): Promise<BatchOutcome> {
  const results: SymbolScreenResult[] = [];
  const normalized = symbols.map(normalizeSymbol);

  for (const [index, symbol] of normalized.entries()) {
    const known = quotes.get(symbol);
    const outcome = await screenSymbol(ctx, symbol, known ? { price: known } : {});

    if (outcome.kind === 'throttled') {
      const unprocessed = normalized.slice(index);
      logger.warn(
        { symbol, unprocessed: unprocessed.length, message: outcome.message },
        'Throttled, halting batch'
      );
      return { results, halted: true, haltReason: outcome.message, unprocessed };
    }
    results.push(outcome.result);
  }

  return { results, halted: false, haltReason: null, unprocessed: [] };
}
