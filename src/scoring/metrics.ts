/**
 * Quality metrics derived from a fundamentals bundle.
 *
 * All derivations are null-propagating: a missing input gives a null metric,
 * never zero. Margins, leverage and returns read the latest fiscal period.
 */

import { fieldValues, latestValue } from '@/data/statements/normalizer';
import type { FundamentalsBundle } from '@/types/fundamentals';
import type { MetricsSnapshot } from '@/types/screening';

/** Flat tax rate used to turn operating income into NOPAT. */
export const APPROX_TAX_RATE = 0.25;

/** Points used for growth rates: 4 periods, 3 intervals. */
export const CAGR_WINDOW = 4;

/**
 * Compound annual growth over the last `window` points, nulls removed.
 * Null with fewer than two points, a zero start, or a non-real result.
 */
export function cagr(
  values: ReadonlyArray<number | null>,
  window: number = CAGR_WINDOW
): number | null {
  const points = values
    .slice(-window)
    .filter((v): v is number => v !== null && Number.isFinite(v));
  if (points.length < 2) return null;

  const start = points[0];
  const end = points[points.length - 1];
  const intervals = points.length - 1;
  if (start === 0) return null;

  const growth = Math.pow(end / start, 1 / intervals) - 1;
  return Number.isFinite(growth) ? growth : null;
}

function ratio(numerator: number | null, denominator: number | null): number | null {
  if (numerator === null || denominator === null || denominator === 0) return null;
  return numerator / denominator;
}

function product(a: number | null, b: number | null): number | null {
  return a === null || b === null ? null : a * b;
}

export function computeMetrics(
  bundle: FundamentalsBundle,
  price: number | null
): MetricsSnapshot {
  const { overview, income, balance, cashflow, earnings } = bundle;

  const revenue = latestValue(income, 'revenue');
  const grossProfit = latestValue(income, 'grossProfit');
  const operatingIncome = latestValue(income, 'operatingIncome');
  const netIncome = latestValue(income, 'netIncome');
  const interestExpense = latestValue(income, 'interestExpense');

  const operatingCashFlow = latestValue(cashflow, 'operatingCashFlow');
  const capex = latestValue(cashflow, 'capitalExpenditures');
  const freeCashFlow =
    operatingCashFlow !== null && capex !== null
      ? operatingCashFlow - Math.abs(capex)
      : null;

  const totalDebt = latestValue(balance, 'totalDebt');
  const cash = latestValue(balance, 'cash');
  const equity = latestValue(balance, 'shareholdersEquity');
  const netDebt = totalDebt !== null && cash !== null ? totalDebt - cash : null;

  const interestCoverage =
    operatingIncome !== null && interestExpense !== null && interestExpense !== 0
      ? operatingIncome / Math.abs(interestExpense)
      : null;

  const nopat = operatingIncome !== null ? operatingIncome * (1 - APPROX_TAX_RATE) : null;
  const investedCapital = netDebt !== null && equity !== null ? netDebt + equity : null;

  const sharesOutstanding =
    overview?.sharesOutstanding ?? latestValue(balance, 'sharesOutstanding');
  const ebitda = overview?.ebitda ?? latestValue(income, 'ebitda');

  return {
    symbol: bundle.symbol,
    name: overview?.name ?? null,
    sector: overview?.sector ?? null,
    industry: overview?.industry ?? null,
    price,
    sharesOutstanding,
    marketCap: overview?.marketCap ?? null,
    impliedMarketCap: product(price, sharesOutstanding),
    revenue,
    ebitda,
    grossMargin: ratio(grossProfit, revenue),
    operatingMargin: ratio(operatingIncome, revenue),
    netMargin: ratio(netIncome, revenue),
    freeCashFlow,
    fcfMargin: ratio(freeCashFlow, revenue),
    revenueCagr: cagr(fieldValues(income, 'revenue')),
    epsCagr: cagr(fieldValues(earnings, 'reportedEps')),
    totalDebt,
    cash,
    netDebt,
    interestCoverage,
    roe: ratio(netIncome, equity),
    roic: ratio(nopat, investedCapital),
    peRatio: overview?.peRatio ?? null,
    psRatio: overview?.psRatio ?? null,
    pbRatio: overview?.pbRatio ?? null,
    dividendYield: overview?.dividendYield ?? null,
  };
}

/** Snapshot for a symbol with no fundamentals; only the price is known. */
export function emptyMetrics(symbol: string, price: number | null): MetricsSnapshot {
  return computeMetrics(
    {
      symbol,
      overview: null,
      income: [],
      balance: [],
      cashflow: [],
      earnings: [],
      fetchedAt: new Date(0).toISOString(),
    },
    price
  );
}
