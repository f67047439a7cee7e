/**
 * Universe discovery: builds a candidate list per sector from the Alpha
 * Vantage listing, falling back to the configured seed tickers.
 */

import type { SectorDefinition } from './config';
import type { ScreenContext } from './context';
import { loadOverview } from '@/data/fundamentals';
import type { UniverseSource } from '@/types/screen_run';
import { createChildLogger } from '@/utils/logger';
import { normalizeSymbol } from '@/utils/values';

const logger = createChildLogger('universe');

export interface DiscoveryRequest {
  sectors: SectorDefinition[];
  exchanges: string[];
  poolCap: number;
  namesPerSector: number;
  oversample: number;
}

export interface SectorUniverse {
  sector: string;
  source: UniverseSource;
  symbols: string[];
}

export type DiscoveryResult =
  | { kind: 'ok'; sectors: SectorUniverse[]; listingSize: number }
  | { kind: 'throttled'; message: string; sectors: SectorUniverse[] };

export type SectorCheck =
  | { kind: 'checked'; matches: boolean; sector: string | null; industry: string | null }
  | { kind: 'unknown'; detail: string }
  | { kind: 'throttled'; message: string };

function normKey(value: string): string {
  return value.toLowerCase().replace(/[^a-z]/g, '');
}

function dedupe(symbols: Iterable<string>): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const raw of symbols) {
    const symbol = normalizeSymbol(raw);
    if (symbol && !seen.has(symbol)) {
      seen.add(symbol);
      out.push(symbol);
    }
  }
  return out;
}

function sectorCap(request: DiscoveryRequest): number {
  return Math.max(request.namesPerSector, 1) * request.oversample;
}

function seedUniverse(sector: SectorDefinition, request: DiscoveryRequest): SectorUniverse {
  return {
    sector: sector.name,
    source: 'seeds',
    symbols: dedupe(sector.seeds).slice(0, sectorCap(request)),
  };
}

/**
 * True when the company's sector equals one of the aliases (ignoring case
 * and punctuation), or an alias appears inside "sector industry".
 */
export function matchesSector(
  aliases: readonly string[],
  sector: string | null,
  industry: string | null
): boolean {
  if (!sector && !industry) return false;

  if (sector) {
    const sectorKey = normKey(sector);
    if (aliases.some((alias) => normKey(alias) === sectorKey)) return true;
  }

  const haystack = `${sector ?? ''} ${industry ?? ''}`.toLowerCase();
  return aliases.some((alias) => haystack.includes(alias.toLowerCase()));
}

export async function discoverUniverse(
  ctx: ScreenContext,
  request: DiscoveryRequest
): Promise<DiscoveryResult> {
  const listing = await ctx.client.getListingStatus({ state: 'active' });

  if (listing.kind !== 'ok') {
    const sectors = request.sectors.map((s) => seedUniverse(s, request));
    if (listing.kind === 'throttled') {
      logger.warn('LISTING_STATUS throttled, using seed tickers');
      return { kind: 'throttled', message: listing.message, sectors };
    }
    logger.warn({ outcome: listing.kind }, 'LISTING_STATUS unavailable, using seed tickers');
    return { kind: 'ok', sectors, listingSize: 0 };
  }

  const exchanges = new Set(request.exchanges.map((e) => e.trim().toUpperCase()));
  let pool = listing.data.filter(
    (row) => exchanges.size === 0 || exchanges.has((row.exchange ?? '').trim().toUpperCase())
  );
  if (request.poolCap > 0 && pool.length > request.poolCap) {
    pool = pool.slice(0, request.poolCap);
  }

  const sectors = request.sectors.map((sector): SectorUniverse => {
    if (sector.name_keywords.length === 0) {
      return seedUniverse(sector, request);
    }
    const matched = pool
      .filter((row) => {
        const name = (row.name ?? '').toUpperCase();
        return sector.name_keywords.some((keyword) => name.includes(keyword));
      })
      .map((row) => row.symbol ?? '');
    const symbols = dedupe(matched).slice(0, sectorCap(request));
    if (symbols.length === 0) {
      return seedUniverse(sector, request);
    }
    return { sector: sector.name, source: 'listing', symbols };
  });

  for (const s of sectors) {
    logger.info({ sector: s.sector, source: s.source, count: s.symbols.length }, 'Sector universe');
  }
  return { kind: 'ok', sectors, listingSize: pool.length };
}

/** Confirms sector membership from the company overview. */
export async function verifySector(
  ctx: ScreenContext,
  symbol: string,
  aliases: readonly string[]
): Promise<SectorCheck> {
  const result = await loadOverview(ctx, symbol);
  switch (result.kind) {
    case 'ok':
      return {
        kind: 'checked',
        matches: matchesSector(aliases, result.overview.sector, result.overview.industry),
        sector: result.overview.sector,
        industry: result.overview.industry,
      };
    case 'throttled':
      return { kind: 'throttled', message: result.message };
    case 'no_data':
      return { kind: 'unknown', detail: result.detail };
    case 'failed':
      return { kind: 'unknown', detail: result.error.message };
  }
}
