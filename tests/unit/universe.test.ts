import { describe, expect, it } from 'vitest';
import type { SectorDefinition } from '@/core/config';
import { discoverUniverse, matchesSector, verifySector, type DiscoveryRequest } from '@/core/universe';
import { makeTestContext, overviewPayload } from '../helpers/context';
import { reply, routeByFunction } from '../helpers/fakes';

const LISTING = [
  'symbol,name,exchange,assetType,ipoDate,delistingDate,status',
  'LMT,Lockheed Defense Corp,NYSE,Stock,1995-03-16,null,Active',
  'AERO,Acme Aerospace Inc,NASDAQ,Stock,2010-01-04,null,Active',
  'BA,Boeing Aerospace Co,NYSE,Stock,1962-01-02,null,Active',
  'GD,General Defense Dynamics,NYSE,Stock,1977-01-03,null,Active',
  'XOM,Exxon Oil Corp,NYSE,Stock,1970-01-02,null,Active',
].join('\n');

const DEFENCE: SectorDefinition = {
  name: 'Defence',
  aliases: ['Aerospace & Defense', 'Defense'],
  seeds: ['NOC', 'noc', 'RTX'],
  name_keywords: ['DEFENSE', 'AEROSPACE'],
};

const ENERGY: SectorDefinition = {
  name: 'Energy',
  aliases: ['Energy'],
  seeds: ['XOM', 'CVX'],
  name_keywords: [],
};

function request(overrides: Partial<DiscoveryRequest> = {}): DiscoveryRequest {
  return {
    sectors: [DEFENCE, ENERGY],
    exchanges: ['NYSE'],
    poolCap: 0,
    namesPerSector: 1,
    oversample: 2,
    ...overrides,
  };
}

describe('discoverUniverse', () => {
  it('matches listing names against sector keywords on the chosen exchanges', async () => {
    const { ctx, transport } = makeTestContext(routeByFunction({ LISTING_STATUS: reply(LISTING) }));

    const result = await discoverUniverse(ctx, request());

    expect(result).toEqual({
      kind: 'ok',
      listingSize: 4,
      sectors: [
        { sector: 'Defence', source: 'listing', symbols: ['LMT', 'BA'] },
        { sector: 'Energy', source: 'seeds', symbols: ['XOM', 'CVX'] },
      ],
    });
    expect(transport.calls[0].searchParams.get('state')).toBe('active');
  });

  it('keeps every exchange when none is given and caps the pool', async () => {
    const { ctx } = makeTestContext(routeByFunction({ LISTING_STATUS: reply(LISTING) }));

    const result = await discoverUniverse(
      ctx,
      request({ exchanges: [], poolCap: 2, oversample: 6, sectors: [DEFENCE] })
    );

    expect(result).toEqual({
      kind: 'ok',
      listingSize: 2,
      sectors: [{ sector: 'Defence', source: 'listing', symbols: ['LMT', 'AERO'] }],
    });
  });

  it('falls back to seeds when no listing name matches', async () => {
    const { ctx } = makeTestContext(routeByFunction({ LISTING_STATUS: reply(LISTING) }));
    const metals: SectorDefinition = {
      name: 'Metals',
      aliases: ['Metals'],
      seeds: ['FCX'],
      name_keywords: ['COPPER'],
    };

    const result = await discoverUniverse(ctx, request({ sectors: [metals] }));

    expect(result.sectors).toEqual([{ sector: 'Metals', source: 'seeds', symbols: ['FCX'] }]);
  });

  it('uses deduplicated seeds when the listing is throttled', async () => {
    const { ctx } = makeTestContext(
      routeByFunction({ LISTING_STATUS: reply({ Note: 'API call frequency exceeded' }) })
    );

    expect(await discoverUniverse(ctx, request())).toEqual({
      kind: 'throttled',
      message: 'API call frequency exceeded',
      sectors: [
        { sector: 'Defence', source: 'seeds', symbols: ['NOC', 'RTX'] },
        { sector: 'Energy', source: 'seeds', symbols: ['XOM', 'CVX'] },
      ],
    });
  });

  it('uses seeds when the listing is unusable', async () => {
    const { ctx } = makeTestContext(routeByFunction({ LISTING_STATUS: reply({ data: [] }) }));

    const result = await discoverUniverse(ctx, request({ sectors: [ENERGY] }));

    expect(result).toEqual({
      kind: 'ok',
      listingSize: 0,
      sectors: [{ sector: 'Energy', source: 'seeds', symbols: ['XOM', 'CVX'] }],
    });
  });
});

describe('matchesSector', () => {
  it('matches sector names ignoring case and punctuation', () => {
    expect(matchesSector(['Aerospace & Defense'], 'AEROSPACE AND DEFENSE', null)).toBe(false);
    expect(matchesSector(['Aerospace & Defense'], 'Aerospace/Defense', null)).toBe(true);
    expect(matchesSector(['Health Care'], 'HEALTHCARE', null)).toBe(true);
  });

  it('finds an alias inside the industry', () => {
    expect(matchesSector(['Defense'], 'INDUSTRIALS', 'AEROSPACE & DEFENSE')).toBe(true);
    expect(matchesSector(['Energy'], 'TECHNOLOGY', 'SOFTWARE')).toBe(false);
  });

  it('never matches without sector or industry', () => {
    expect(matchesSector(['Energy'], null, null)).toBe(false);
  });
});

describe('verifySector', () => {
  it('checks the overview sector', async () => {
    const { ctx } = makeTestContext(
      routeByFunction({ OVERVIEW: (symbol) => reply(overviewPayload(symbol)) })
    );

    expect(await verifySector(ctx, 'XOM', ['Energy'])).toEqual({
      kind: 'checked',
      matches: true,
      sector: 'ENERGY',
      industry: 'OIL & GAS INTEGRATED',
    });
    expect(await verifySector(ctx, 'XOM', ['Health Care'])).toEqual({
      kind: 'checked',
      matches: false,
      sector: 'ENERGY',
      industry: 'OIL & GAS INTEGRATED',
    });
  });

  it('passes throttling through and treats a missing overview as unknown', async () => {
    const throttled = makeTestContext(
      routeByFunction({ OVERVIEW: reply({ Note: 'API call frequency exceeded' }) })
    );
    const missing = makeTestContext(routeByFunction({ OVERVIEW: reply({}) }));

    expect(await verifySector(throttled.ctx, 'XOM', ['Energy'])).toEqual({
      kind: 'throttled',
      message: 'API call frequency exceeded',
    });
    expect(await verifySector(missing.ctx, 'XOM', ['Energy'])).toEqual({
      kind: 'unknown',
      detail: 'overview has neither Symbol nor Name',
    });
  });
});
