import { describe, expect, it } from 'vitest';
import type { SectorDefinition } from '@/core/config';
import { ConfigError } from '@/core/errors';
import { formatDate } from '@/core/time';
import { buildScreenRun, EXPLICIT_SECTOR, selectPicks } from '@/run/builder';
import { checkRunConsistency, validateScreenRunRecord } from '@/run/validator';
import { emptyMetrics } from '@/scoring/metrics';
import { dcf } from '@/scoring/valuation';
import type { SymbolScreenResult } from '@/types/screen_run';
import {
  dailyRoute,
  fundamentalsRoutes,
  makeConfig,
  makeTestContext,
  overviewPayload,
  type SymbolRoute,
} from '../helpers/context';
import { reply, routeByFunction, type FakeReply } from '../helpers/fakes';

const THROTTLE_NOTE = 'Our standard API call frequency is 5 calls per minute.';
const NOW = new Date('2024-06-03T12:00:00.000Z');

const CLOSES: Record<string, [number, number]> = {
  GOOD: [10, 9.5],
  DEAR: [20, 21],
  XOM: [50, 49],
};

const DEFENCE: SectorDefinition = {
  name: 'Defence',
  aliases: ['Aerospace & Defense'],
  seeds: ['GOOD', 'DEAR'],
  name_keywords: [],
};

const ENERGY: SectorDefinition = {
  name: 'Energy',
  aliases: ['Energy'],
  seeds: ['XOM'],
  name_keywords: [],
};

function market(
  overrides: Record<string, FakeReply | SymbolRoute> = {},
  sectors: SectorDefinition[] = [DEFENCE, ENERGY]
) {
  return makeTestContext(
    routeByFunction({
      ...fundamentalsRoutes(),
      TIME_SERIES_DAILY_ADJUSTED: dailyRoute(CLOSES),
      ...overrides,
    }),
    { config: makeConfig({ sectors }) }
  );
}

describe('buildScreenRun', () => {
  it('screens explicit symbols without ranking', async () => {
    const { ctx, transport } = market();

    const run = await buildScreenRun(ctx, { symbols: ['good', 'GOOD', 'dear'] }, { now: NOW });

    expect(run.schema_version).toBe('screen_run.v1');
    expect(run.generated_at).toBe('2024-06-03T12:00:00.000Z');
    expect(run.run_id.startsWith(`${formatDate(NOW)}__`)).toBe(true);
    expect(run.run_id).toMatch(/^\d{4}-\d{2}-\d{2}__[0-9a-f]{8}$/);
    expect(run.sectors).toHaveLength(1);
    expect(run.sectors[0]).toMatchObject({
      sector: EXPLICIT_SECTOR,
      universe_source: 'explicit',
      candidates: ['GOOD', 'DEAR'],
      ranked: [],
      picks: ['GOOD'],
      halted: false,
    });
    expect(run.halted).toBe(false);
    expect(run.halt_reason).toBeNull();
    expect(run.request_count).toBe(12);
    expect(transport.calls).toHaveLength(12);
    expect(run.thresholds).toEqual(ctx.thresholds);
    expect(checkRunConsistency(run)).toEqual({ passed: true, issues: [] });
  });

  it('derives the run id from the content', async () => {
    const first = await buildScreenRun(market().ctx, { symbols: ['GOOD'] }, { now: NOW });
    const second = await buildScreenRun(market().ctx, { symbols: ['GOOD'] }, { now: NOW });
    const other = await buildScreenRun(market().ctx, { symbols: ['DEAR'] }, { now: NOW });

    expect(second.run_id).toBe(first.run_id);
    expect(other.run_id).not.toBe(first.run_id);
  });

  it('ranks seed universes per sector and picks passing names', async () => {
    const { ctx } = market();

    const run = await buildScreenRun(ctx, {}, { now: NOW });

    expect(run.sectors.map((s) => s.sector)).toEqual(['Defence', 'Energy']);
    const [defence, energy] = run.sectors;
    expect(defence.universe_source).toBe('seeds');
    expect(defence.ranked.map((r) => r.symbol)).toEqual(['GOOD', 'DEAR']);
    expect(defence.results.map((r) => r.symbol)).toEqual(['GOOD', 'DEAR']);
    expect(defence.picks).toEqual(['GOOD']);
    expect(energy.results.map((r) => r.symbol)).toEqual(['XOM']);
    expect(energy.picks).toEqual([]);
    expect(run.halted).toBe(false);
  });

  it('screens only the top of the stack', async () => {
    const { ctx } = market();

    const run = await buildScreenRun(ctx, { sectors: ['defence'], stackCap: 1 }, { now: NOW });

    expect(run.sectors).toHaveLength(1);
    expect(run.sectors[0].ranked).toHaveLength(2);
    expect(run.sectors[0].results.map((r) => r.symbol)).toEqual(['GOOD']);
  });

  it('rejects an unknown sector', async () => {
    const { ctx } = market();

    await expect(buildScreenRun(ctx, { sectors: ['Utilities'] })).rejects.toThrow(ConfigError);
    await expect(buildScreenRun(ctx, { sectors: ['Utilities'] })).rejects.toThrow(
      'universe.json: Unknown sector "Utilities"'
    );
  });

  it('halts the run on a throttle and skips remaining sectors', async () => {
    const { ctx } = market({
      OVERVIEW: (symbol) =>
        symbol === 'DEAR' ? reply({ Note: THROTTLE_NOTE }) : reply(overviewPayload(symbol)),
    });

    const run = await buildScreenRun(ctx, {}, { now: NOW });

    expect(run.halted).toBe(true);
    expect(run.halt_reason).toBe(THROTTLE_NOTE);
    expect(run.sectors.map((s) => s.sector)).toEqual(['Defence']);
    expect(run.sectors[0].halted).toBe(true);
    expect(run.sectors[0].results.map((r) => r.symbol)).toEqual(['GOOD']);
    expect(run.sectors[0].picks).toEqual(['GOOD']);
  });

  it('confirms listing candidates against their overview when asked', async () => {
    const listed: SectorDefinition = {
      name: 'Defence',
      aliases: ['Aerospace & Defense'],
      seeds: [],
      name_keywords: ['DEFENSE'],
    };
    const listing = [
      'symbol,name,exchange,assetType,ipoDate,delistingDate,status',
      'GOOD,Good Defense Inc,NYSE,Stock,2001-01-02,null,Active',
      'DEAR,Dear Defense Corp,NYSE,Stock,2001-01-02,null,Active',
    ].join('\n');
    const { ctx } = market(
      {
        LISTING_STATUS: reply(listing),
        OVERVIEW: (symbol) =>
          reply(
            overviewPayload(
              symbol,
              symbol === 'GOOD' ? { Sector: 'INDUSTRIALS', Industry: 'AEROSPACE & DEFENSE' } : {}
            )
          ),
      },
      [listed]
    );

    const run = await buildScreenRun(ctx, { verifySectors: true }, { now: NOW });

    const [sector] = run.sectors;
    expect(sector.universe_source).toBe('listing');
    expect(sector.candidates).toEqual(['GOOD', 'DEAR']);
    expect(sector.ranked.map((r) => r.symbol)).toEqual(['GOOD', 'DEAR']);
    expect(sector.results.map((r) => r.symbol)).toEqual(['GOOD']);
  });
});

describe('selectPicks', () => {
  function result(symbol: string, pass: boolean, upsidePct: number | null): SymbolScreenResult {
    const metrics = emptyMetrics(symbol, null);
    return {
      symbol,
      status: 'screened',
      price: null,
      fundamentalsSource: null,
      metrics,
      valuation: { ...dcf(metrics), upsidePct },
      verdict: { pass, reasons: pass ? [] : ['failed'], notEvaluated: [], checks: [] },
      piotroski: null,
      magicFormula: null,
      notes: [],
    };
  }

  it('orders passing symbols by upside, then symbol, up to the limit', () => {
    const picks = selectPicks(
      [
        result('BBB', true, 80),
        result('AAA', true, 80),
        result('CCC', false, 200),
        result('DDD', true, 120),
        result('EEE', true, 60),
      ],
      3
    );

    expect(picks).toEqual(['DDD', 'AAA', 'BBB']);
  });
});

describe('run validation', () => {
  it('rejects records that break the schema', () => {
    const outcome = validateScreenRunRecord({ schema_version: 'screen_run.v1' });

    expect(outcome.valid).toBe(false);
    expect(outcome.errors).toContain("root: must have required property 'run_id'");
  });

  it('flags picks that did not pass and halts without a reason', async () => {
    const run = await buildScreenRun(market().ctx, { symbols: ['DEAR'] }, { now: NOW });

    const check = checkRunConsistency({
      ...run,
      halted: true,
      sectors: [{ ...run.sectors[0], picks: ['DEAR'] }],
    });

    expect(check).toEqual({
      passed: false,
      issues: ['Explicit: pick DEAR did not pass the gate', 'Run is halted without a halt reason'],
    });
  });
});
