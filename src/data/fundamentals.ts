/**
 * Fundamentals loader: cache first, then the five Alpha Vantage statement
 * calls in a fixed order. A throttle stops at once; a transport failure on
 * any call fails the symbol.
 */

import type { ScreenContext } from '@/core/context';
import type { ProviderError } from '@/core/errors';
import { toIsoTimestamp } from '@/core/time';
import type { FetchOutcome } from '@/providers/types';
import type { CompanyOverview, FundamentalsBundle } from '@/types/fundamentals';
import type { FundamentalsSource } from '@/types/screen_run';
import { createChildLogger } from '@/utils/logger';
import { normalizeSymbol, type UnknownRecord } from '@/utils/values';
import { normalizeOverview, normalizeStatement } from './statements/normalizer';

const logger = createChildLogger('fundamentals');

export type FundamentalsLoad =
  | { kind: 'ok'; bundle: FundamentalsBundle; source: FundamentalsSource }
  | { kind: 'no_data'; detail: string }
  | { kind: 'throttled'; message: string }
  | { kind: 'failed'; error: ProviderError };

export type OverviewLoad =
  | { kind: 'ok'; overview: CompanyOverview; source: FundamentalsSource }
  | { kind: 'no_data'; detail: string }
  | { kind: 'throttled'; message: string }
  | { kind: 'failed'; error: ProviderError };

type StepResult =
  | { kind: 'payload'; data: UnknownRecord | null }
  | { kind: 'throttled'; message: string }
  | { kind: 'failed'; error: ProviderError };

function step(outcome: FetchOutcome<UnknownRecord>): StepResult {
  switch (outcome.kind) {
    case 'ok':
      return { kind: 'payload', data: outcome.data };
    case 'empty':
      return { kind: 'payload', data: null };
    case 'throttled':
      return { kind: 'throttled', message: outcome.message };
    case 'fatal':
      return { kind: 'failed', error: outcome.error };
  }
}

function hasAnyData(bundle: FundamentalsBundle): boolean {
  return (
    bundle.overview !== null ||
    bundle.income.length > 0 ||
    bundle.balance.length > 0 ||
    bundle.cashflow.length > 0 ||
    bundle.earnings.length > 0
  );
}

export async function loadFundamentals(
  ctx: ScreenContext,
  rawSymbol: string
): Promise<FundamentalsLoad> {
  const symbol = normalizeSymbol(rawSymbol);

  const cached = ctx.cache.get('fundamentals', symbol, ctx.validators.isFundamentalsBundle);
  if (cached) {
    return { kind: 'ok', bundle: cached, source: 'cache' };
  }

  const calls = [
    () => ctx.client.getOverview(symbol),
    () => ctx.client.getIncomeStatement(symbol),
    () => ctx.client.getBalanceSheet(symbol),
    () => ctx.client.getCashFlow(symbol),
    () => ctx.client.getEarnings(symbol),
  ];

  const payloads: Array<UnknownRecord | null> = [];
  for (const call of calls) {
    const result = step(await call());
    if (result.kind === 'throttled') {
      return result;
    }
    if (result.kind === 'failed') {
      logger.error({ symbol, error: result.error.message }, 'Fundamentals fetch failed');
      return result;
    }
    payloads.push(result.data);
  }

  const [overviewRaw, incomeRaw, balanceRaw, cashflowRaw, earningsRaw] = payloads;
  const bundle: FundamentalsBundle = {
    symbol,
    overview: normalizeOverview(overviewRaw),
    income: normalizeStatement(incomeRaw, 'income'),
    balance: normalizeStatement(balanceRaw, 'balance'),
    cashflow: normalizeStatement(cashflowRaw, 'cashflow'),
    earnings: normalizeStatement(earningsRaw, 'earnings'),
    fetchedAt: toIsoTimestamp(ctx.clock.now()),
  };

  if (!hasAnyData(bundle)) {
    logger.info({ symbol }, 'No usable fundamentals');
    return { kind: 'no_data', detail: 'no overview and no statement periods' };
  }

  ctx.cache.put('fundamentals', symbol, bundle);
  if (bundle.overview) {
    ctx.cache.put('overview', symbol, bundle.overview);
  }
  return { kind: 'ok', bundle, source: 'live' };
}

/** Overview only, for sector checks during universe discovery. */
export async function loadOverview(
  ctx: ScreenContext,
  rawSymbol: string
): Promise<OverviewLoad> {
  const symbol = normalizeSymbol(rawSymbol);

  const cached = ctx.cache.get('overview', symbol, ctx.validators.isCompanyOverview);
  if (cached) {
    return { kind: 'ok', overview: cached, source: 'cache' };
  }

  const result = step(await ctx.client.getOverview(symbol));
  if (result.kind !== 'payload') return result;

  const overview = normalizeOverview(result.data);
  if (!overview) {
    return { kind: 'no_data', detail: 'overview has neither Symbol nor Name' };
  }
  ctx.cache.put('overview', symbol, overview);
  return { kind: 'ok', overview, source: 'live' };
}
