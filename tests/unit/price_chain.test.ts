import { describe, expect, it } from 'vitest';
import { dailyPayload, makeConfig, makeTestContext } from '../helpers/context';
import { reply, routeByFunction } from '../helpers/fakes';

const THROTTLE_NOTE =
  'Thank you for using Alpha Vantage! Our standard API call frequency is 5 calls per minute.';

const GLOBAL_QUOTE = {
  'Global Quote': {
    '01. symbol': 'IBM',
    '05. price': '170.5000',
    '07. latest trading day': '2024-06-03',
    '08. previous close': '171.2200',
    '10. change percent': '-0.4205%',
  },
};

describe('PriceResolver', () => {
  it('takes the last daily close and its change', async () => {
    const { ctx } = makeTestContext(
      routeByFunction({ TIME_SERIES_DAILY_ADJUSTED: reply(dailyPayload(110, 100)) })
    );

    const resolution = await ctx.prices.resolve('ibm');

    if (resolution.kind !== 'found') throw new Error(`expected found, got ${resolution.kind}`);
    expect(resolution.quote.symbol).toBe('IBM');
    expect(resolution.quote.price).toBe(110);
    expect(resolution.quote.changePercent).toBeCloseTo(10, 10);
    expect(resolution.quote.asOf).toBe('2024-06-03');
    expect(resolution.quote.source).toBe('av_daily_adjusted');
    expect(resolution.notes).toEqual([]);
  });

  it('falls through to the global quote with a note', async () => {
    const { ctx, transport } = makeTestContext(
      routeByFunction({
        TIME_SERIES_DAILY_ADJUSTED: reply({}),
        GLOBAL_QUOTE: reply(GLOBAL_QUOTE),
      })
    );

    const resolution = await ctx.prices.resolve('IBM');

    expect(resolution).toEqual({
      kind: 'found',
      quote: {
        symbol: 'IBM',
        price: 170.5,
        changePercent: -0.4205,
        asOf: '2024-06-03',
        source: 'av_global_quote',
      },
      notes: ['av_daily_adjusted: no_data (empty response)'],
    });
    expect(transport.functions()).toEqual(['TIME_SERIES_DAILY_ADJUSTED', 'GLOBAL_QUOTE']);
  });

  it('stops the chain on an Alpha Vantage throttle', async () => {
    const { ctx, transport } = makeTestContext(
      routeByFunction({
        TIME_SERIES_DAILY_ADJUSTED: reply({ Note: THROTTLE_NOTE }),
        GLOBAL_QUOTE: reply(GLOBAL_QUOTE),
      })
    );

    expect(await ctx.prices.resolve('IBM')).toEqual({
      kind: 'throttled',
      source: 'av_daily_adjusted',
      message: THROTTLE_NOTE,
      notes: [],
    });
    expect(transport.functions()).toEqual(['TIME_SERIES_DAILY_ADJUSTED']);
  });

  it('reports every miss when no source has a price', async () => {
    const { ctx } = makeTestContext(
      routeByFunction({
        TIME_SERIES_DAILY_ADJUSTED: reply({ 'Meta Data': {} }),
        GLOBAL_QUOTE: reply({ 'Global Quote': {} }),
      })
    );

    expect(await ctx.prices.resolve('IBM')).toEqual({
      kind: 'missing',
      notes: [
        'av_daily_adjusted: no_data (missing "Time Series (Daily)")',
        'av_global_quote: no_data (missing "Global Quote")',
      ],
    });
  });

  it('asks Finnhub first when a key is configured', async () => {
    const config = makeConfig({
      price_sources: ['finnhub_quote', 'av_daily_adjusted', 'av_global_quote'],
    });
    const { ctx, transport } = makeTestContext(
      routeByFunction({
        '/api/v1/quote': reply({ c: 50, d: 0.5, dp: 1.5, h: 51, l: 49, o: 49.5, pc: 49.5, t: 1717430400 }),
      }),
      { config, finnhubApiKey: 'test-finnhub' }
    );

    const resolution = await ctx.prices.resolve('IBM');

    expect(ctx.prices.getSourceIds()).toEqual([
      'finnhub_quote',
      'av_daily_adjusted',
      'av_global_quote',
    ]);
    expect(resolution).toEqual({
      kind: 'found',
      quote: {
        symbol: 'IBM',
        price: 50,
        changePercent: 1.5,
        asOf: '2024-06-03T16:00:00.000Z',
        source: 'finnhub_quote',
      },
      notes: [],
    });
    expect(transport.functions()).toEqual(['quote']);
  });

  it('moves past a throttled Finnhub quote to Alpha Vantage', async () => {
    const config = makeConfig({ price_sources: ['finnhub_quote', 'av_daily_adjusted'] });
    const { ctx } = makeTestContext(
      routeByFunction({
        '/api/v1/quote': reply('', 429),
        TIME_SERIES_DAILY_ADJUSTED: reply(dailyPayload(20, 25)),
      }),
      { config, finnhubApiKey: 'test-finnhub' }
    );

    const resolution = await ctx.prices.resolve('IBM');

    if (resolution.kind !== 'found') throw new Error(`expected found, got ${resolution.kind}`);
    expect(resolution.quote.source).toBe('av_daily_adjusted');
    expect(resolution.quote.changePercent).toBeCloseTo(-20, 10);
    expect(resolution.notes).toEqual([
      'finnhub_quote: throttled (Finnhub rate limit (HTTP 429))',
    ]);
  });

  it('skips Finnhub without a key', () => {
    const config = makeConfig({ price_sources: ['finnhub_quote', 'av_global_quote'] });
    const { ctx } = makeTestContext(routeByFunction({}), { config });

    expect(ctx.prices.getSourceIds()).toEqual(['av_global_quote']);
  });
});
