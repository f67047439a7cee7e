/**
 * Conservative discounted-cash-flow valuation.
 *
 * Trailing free cash flow grows at the clamped revenue CAGR for the
 * explicit horizon, then at the terminal rate (Gordon growth). Without a
 * strictly positive FCF every value field is null; the assumption set is
 * always reported.
 */

import type {
  DcfAssumptions,
  MetricsSnapshot,
  UpsideBasis,
  ValuationResult,
} from '@/types/screening';

export interface DcfSettings {
  discountRate: number;
  terminalGrowthRate: number;
  horizonYears: number;
  defaultGrowthRate: number;
  minGrowthRate: number;
  maxGrowthRate: number;
}

export const DEFAULT_DCF_SETTINGS: DcfSettings = {
  discountRate: 0.1,
  terminalGrowthRate: 0.025,
  horizonYears: 5,
  defaultGrowthRate: 0.03,
  minGrowthRate: -0.02,
  maxGrowthRate: 0.06,
};

export interface DcfBreakdown {
  explicitPresentValue: number;
  terminalValue: number;
  terminalPresentValue: number;
  enterpriseValue: number;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

export function resolveAssumptions(
  revenueCagr: number | null,
  settings: DcfSettings = DEFAULT_DCF_SETTINGS
): DcfAssumptions {
  const fromCagr = revenueCagr !== null && Number.isFinite(revenueCagr);
  return {
    growthRate: fromCagr
      ? clamp(revenueCagr, settings.minGrowthRate, settings.maxGrowthRate)
      : settings.defaultGrowthRate,
    growthSource: fromCagr ? 'revenue_cagr' : 'default',
    discountRate: settings.discountRate,
    terminalGrowthRate: settings.terminalGrowthRate,
    horizonYears: settings.horizonYears,
  };
}

/** Present values for a positive starting FCF. */
export function discountCashFlows(fcf: number, assumptions: DcfAssumptions): DcfBreakdown {
  const { growthRate, discountRate, terminalGrowthRate, horizonYears } = assumptions;

  let projected = fcf;
  let explicitPresentValue = 0;
  for (let year = 1; year <= horizonYears; year++) {
    projected *= 1 + growthRate;
    explicitPresentValue += projected / Math.pow(1 + discountRate, year);
  }

  const terminalValue =
    (projected * (1 + terminalGrowthRate)) / (discountRate - terminalGrowthRate);
  const terminalPresentValue = terminalValue / Math.pow(1 + discountRate, horizonYears);

  return {
    explicitPresentValue,
    terminalValue,
    terminalPresentValue,
    enterpriseValue: explicitPresentValue + terminalPresentValue,
  };
}

export function dcf(
  metrics: MetricsSnapshot,
  settings: DcfSettings = DEFAULT_DCF_SETTINGS
): ValuationResult {
  const assumptions = resolveAssumptions(metrics.revenueCagr, settings);
  const fcf = metrics.freeCashFlow;

  if (fcf === null || !(fcf > 0)) {
    return {
      enterpriseValue: null,
      equityValue: null,
      explicitPresentValue: null,
      terminalPresentValue: null,
      fairValuePerShare: null,
      upsidePct: null,
      upsideBasis: null,
      assumptions,
    };
  }

  const breakdown = discountCashFlows(fcf, assumptions);
  const ev = breakdown.enterpriseValue;

  const shares = metrics.sharesOutstanding;
  const fairValuePerShare = shares !== null && shares > 0 ? ev / shares : null;

  let upsidePct: number | null = null;
  let upsideBasis: UpsideBasis | null = null;
  const price = metrics.price;
  const marketCap = metrics.marketCap ?? metrics.impliedMarketCap;

  if (fairValuePerShare !== null && price !== null && price > 0) {
    upsidePct = (fairValuePerShare / price - 1) * 100;
    upsideBasis = 'per_share';
  } else if (marketCap !== null && marketCap > 0) {
    upsidePct = (ev / marketCap - 1) * 100;
    upsideBasis = 'enterprise';
  }

  return {
    enterpriseValue: ev,
    equityValue: metrics.netDebt !== null ? ev - metrics.netDebt : null,
    explicitPresentValue: breakdown.explicitPresentValue,
    terminalPresentValue: breakdown.terminalPresentValue,
    fairValuePerShare,
    upsidePct,
    upsideBasis,
    assumptions,
  };
}
