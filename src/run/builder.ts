/**
 * Screen Run Builder
 * Discovers candidates per sector, ranks them by price change, screens the
 * top of the stack and assembles the run record.
 */

import type { ScreenContext } from '@/core/context';
import { ConfigError } from '@/core/errors';
import { findSector, type SectorDefinition } from '@/core/config';
import { contentHash } from '@/core/seed';
import { getRunId } from '@/core/time';
import { discoverUniverse, verifySector, type SectorUniverse } from '@/core/universe';
import { rankByPriceChange, screenBatch } from '@/scoring/screen';
import type { RankedSymbol, ScreenRun, ScreenRunSector, SymbolScreenResult } from '@/types/screen_run';
import { createChildLogger } from '@/utils/logger';
import { normalizeSymbol } from '@/utils/values';
import { validateAndThrow } from './validator';

const logger = createChildLogger('run_builder');

export const EXPLICIT_SECTOR = 'Explicit';

export interface ScreenRequest {
  /** Sector names from `config/universe.json`; all configured sectors when empty. */
  sectors?: string[];
  /** Screen exactly these symbols and skip discovery. */
  symbols?: string[];
  exchanges?: string[];
  namesPerSector?: number;
  stackCap?: number;
  /** Confirm listing-derived candidates against their company overview. */
  verifySectors?: boolean;
}

export interface BuildRunOptions {
  now?: Date;
}

interface SectorPass {
  sector: ScreenRunSector;
  haltReason: string | null;
}

/** Passing symbols, best upside first. */
export function selectPicks(results: SymbolScreenResult[], limit: number): string[] {
  return results
    .filter((r) => r.verdict.pass)
    .sort((a, b) => {
      const diff = (b.valuation.upsidePct ?? -Infinity) - (a.valuation.upsidePct ?? -Infinity);
      return diff !== 0 ? diff : a.symbol.localeCompare(b.symbol);
    })
    .slice(0, limit)
    .map((r) => r.symbol);
}

function resolveSectors(ctx: ScreenContext, names: string[] | undefined): SectorDefinition[] {
  if (!names || names.length === 0) return ctx.config.universe.sectors;
  return names.map((name) => {
    const sector = findSector(ctx.config, name);
    if (!sector) {
      throw new ConfigError(`Unknown sector "${name}"`, 'universe.json');
    }
    return sector;
  });
}

async function filterBySector(
  ctx: ScreenContext,
  ranked: RankedSymbol[],
  aliases: readonly string[],
  limit: number
): Promise<{ kept: RankedSymbol[]; haltReason: string | null }> {
  const kept: RankedSymbol[] = [];
  for (const entry of ranked) {
    if (kept.length >= limit) break;
    const check = await verifySector(ctx, entry.symbol, aliases);
    if (check.kind === 'throttled') {
      return { kept, haltReason: check.message };
    }
    if (check.kind === 'checked' && check.matches) {
      kept.push(entry);
    } else {
      logger.debug({ symbol: entry.symbol, check }, 'Dropped by sector check');
    }
  }
  return { kept, haltReason: null };
}

async function screenSector(
  ctx: ScreenContext,
  universe: SectorUniverse,
  definition: SectorDefinition | null,
  request: Required<Pick<ScreenRequest, 'namesPerSector' | 'stackCap' | 'verifySectors'>>
): Promise<SectorPass> {
  const sector: ScreenRunSector = {
    sector: universe.sector,
    universe_source: universe.source,
    candidates: universe.symbols,
    ranked: [],
    results: [],
    picks: [],
    halted: false,
  };

  const rank = await rankByPriceChange(ctx, universe.symbols);
  sector.ranked = rank.ranked;
  if (rank.halted) {
    sector.halted = true;
    return { sector, haltReason: rank.haltReason };
  }

  let stack = rank.ranked.slice(0, request.stackCap);
  if (request.verifySectors && definition && universe.source === 'listing') {
    const filtered = await filterBySector(ctx, rank.ranked, definition.aliases, request.stackCap);
    stack = filtered.kept;
    if (filtered.haltReason !== null) {
      sector.halted = true;
      return { sector, haltReason: filtered.haltReason };
    }
  }

  const batch = await screenBatch(
    ctx,
    stack.map((r) => r.symbol),
    rank.quotes
  );
  sector.results = batch.results;
  sector.picks = selectPicks(batch.results, request.namesPerSector);
  sector.halted = batch.halted;
  return { sector, haltReason: batch.haltReason };
}

async function screenExplicit(
  ctx: ScreenContext,
  symbols: string[],
  namesPerSector: number
): Promise<SectorPass> {
  const candidates = [...new Set(symbols.map(normalizeSymbol).filter(Boolean))];
  const batch = await screenBatch(ctx, candidates);
  return {
    sector: {
      sector: EXPLICIT_SECTOR,
      universe_source: 'explicit',
      candidates,
      ranked: [],
      results: batch.results,
      picks: selectPicks(batch.results, namesPerSector),
      halted: batch.halted,
    },
    haltReason: batch.haltReason,
  };
}

function requestCount(ctx: ScreenContext): number {
  return ctx.client.getRequestCount() + (ctx.finnhub?.getRequestCount() ?? 0);
}

export async function buildScreenRun(
  ctx: ScreenContext,
  request: ScreenRequest = {},
  options: BuildRunOptions = {}
): Promise<ScreenRun> {
  const universeCfg = ctx.config.universe;
  const settings = {
    namesPerSector: request.namesPerSector ?? universeCfg.names_per_sector,
    stackCap: request.stackCap ?? universeCfg.stack_cap,
    verifySectors: request.verifySectors ?? false,
  };

  const sectors: ScreenRunSector[] = [];
  let haltReason: string | null = null;

  if (request.symbols && request.symbols.length > 0) {
    const pass = await screenExplicit(ctx, request.symbols, settings.namesPerSector);
    sectors.push(pass.sector);
    haltReason = pass.haltReason;
  } else {
    const definitions = resolveSectors(ctx, request.sectors);
    const discovery = await discoverUniverse(ctx, {
      sectors: definitions,
      exchanges: request.exchanges ?? universeCfg.exchanges,
      poolCap: universeCfg.pool_cap,
      namesPerSector: settings.namesPerSector,
      oversample: universeCfg.oversample,
    });

    for (const universe of discovery.sectors) {
      const definition = definitions.find((d) => d.name === universe.sector) ?? null;
      const pass = await screenSector(ctx, universe, definition, settings);
      sectors.push(pass.sector);
      if (pass.haltReason !== null) {
        haltReason = pass.haltReason;
        logger.warn({ sector: universe.sector, haltReason }, 'Throttled, skipping remaining sectors');
        break;
      }
    }
  }

  const generatedAt = options.now ?? new Date(ctx.clock.now());
  const body = {
    schema_version: 'screen_run.v1' as const,
    generated_at: generatedAt.toISOString(),
    thresholds: ctx.thresholds,
    valuation_settings: ctx.valuation,
    sectors,
    halted: haltReason !== null,
    halt_reason: haltReason,
    request_count: requestCount(ctx),
  };
  const run: ScreenRun = { ...body, run_id: getRunId(generatedAt, contentHash(body)) };

  logger.info(
    {
      runId: run.run_id,
      sectors: sectors.length,
      picks: sectors.reduce((n, s) => n + s.picks.length, 0),
      halted: run.halted,
    },
    'Screen run built'
  );

  return validateAndThrow(run, ctx.config.schemasDir);
}
