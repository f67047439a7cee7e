/**
 * Piotroski F-Score (supplementary signal, not part of the gate).
 *
 * Current-year values come from the latest period of each normalized
 * series, prior-year values from the period before it.
 */

import { latestValue, priorValue } from '@/data/statements/normalizer';
import type { FundamentalsBundle } from '@/types/fundamentals';

export interface PiotroskiCheck {
  passed: boolean | null;
  label: string;
  detail?: string;
}

export interface PiotroskiResult {
  score: number;
  maxScore: number;
  checks: {
    f1_roa: PiotroskiCheck;
    f2_cfo: PiotroskiCheck;
    f3_delta_roa: PiotroskiCheck;
    f4_accrual: PiotroskiCheck;
    f5_delta_lever: PiotroskiCheck;
    f6_delta_liquid: PiotroskiCheck;
    f7_eq_offer: PiotroskiCheck;
    f8_delta_margin: PiotroskiCheck;
    f9_delta_turn: PiotroskiCheck;
  };
  fiscalYearCurrent?: string;
  fiscalYearPrior?: string;
}

export interface PiotroskiInputs {
  netIncome: number | null;
  totalAssets: number | null;
  longTermDebt: number | null;
  revenue: number | null;
  grossProfit: number | null;
  operatingCashFlow: number | null;
  currentAssets: number | null;
  currentLiabilities: number | null;
  sharesOutstanding: number | null;
  netIncome_py: number | null;
  totalAssets_py: number | null;
  longTermDebt_py: number | null;
  revenue_py: number | null;
  grossProfit_py: number | null;
  currentAssets_py: number | null;
  currentLiabilities_py: number | null;
  sharesOutstanding_py: number | null;
  fiscalYearCurrent?: string;
  fiscalYearPrior?: string;
}

function calcCheck(
  a: number | null,
  b: number | null,
  test: (a: number, b: number) => boolean | null,
  label: string,
  detailFn?: (a: number, b: number) => string
): PiotroskiCheck {
  if (a == null || b == null) return { passed: null, label };
  const result = test(a, b);
  if (result === null || !detailFn) return { passed: result, label };
  return { passed: result, label, detail: detailFn(a, b) };
}

function calcCheckSingle(
  a: number | null,
  test: (a: number) => boolean,
  label: string,
  detailFn?: (a: number) => string
): PiotroskiCheck {
  if (a == null) return { passed: null, label };
  const result = test(a);
  return detailFn ? { passed: result, label, detail: detailFn(a) } : { passed: result, label };
}

function calcCheckYoY(
  currA: number | null,
  currB: number | null,
  prevA: number | null,
  prevB: number | null,
  test: (a: number, b: number, pa: number, pb: number) => boolean | null,
  label: string
): PiotroskiCheck {
  if (currA == null || currB == null || prevA == null || prevB == null) {
    return { passed: null, label };
  }
  return { passed: test(currA, currB, prevA, prevB), label };
}

function formatAmount(v: number): string {
  if (Math.abs(v) >= 1e9) return `${(v / 1e9).toFixed(1)}B`;
  if (Math.abs(v) >= 1e6) return `${(v / 1e6).toFixed(0)}M`;
  return v.toFixed(0);
}

export function calculatePiotroski(data: PiotroskiInputs): PiotroskiResult {
  const checks: PiotroskiResult['checks'] = {
    f1_roa: calcCheck(
      data.netIncome,
      data.totalAssets,
      (ni, ta) => (ta !== 0 ? ni / ta > 0 : null),
      'Profitability: ROA > 0',
      (ni, ta) => `ROA: ${((ni / ta) * 100).toFixed(1)}%`
    ),
    f2_cfo: calcCheckSingle(
      data.operatingCashFlow,
      (cfo) => cfo > 0,
      'Profitability: Operating CF > 0',
      (cfo) => `OCF: ${formatAmount(cfo)}`
    ),
    f3_delta_roa: calcCheckYoY(
      data.netIncome,
      data.totalAssets,
      data.netIncome_py,
      data.totalAssets_py,
      (ni, ta, niPy, taPy) => {
        if (ta === 0 || taPy === 0) return null;
        return ni / ta > niPy / taPy;
      },
      'Profitability: ROA improved YoY'
    ),
    f4_accrual: calcCheck(
      data.operatingCashFlow,
      data.netIncome,
      (cfo, ni) => cfo > ni,
      'Profitability: CFO > Net Income (accrual quality)',
      (cfo, ni) => `CFO ${formatAmount(cfo)} vs NI ${formatAmount(ni)}`
    ),
    f5_delta_lever: calcCheckYoY(
      data.longTermDebt,
      data.totalAssets,
      data.longTermDebt_py,
      data.totalAssets_py,
      (d, a, dPy, aPy) => {
        if (a === 0 || aPy === 0) return null;
        return d / a < dPy / aPy;
      },
      'Leverage: LT Debt/Assets decreased YoY'
    ),
    f6_delta_liquid: calcCheckYoY(
      data.currentAssets,
      data.currentLiabilities,
      data.currentAssets_py,
      data.currentLiabilities_py,
      (ca, cl, caPy, clPy) => {
        if (cl === 0 || clPy === 0) return null;
        return ca / cl > caPy / clPy;
      },
      'Liquidity: Current Ratio improved YoY'
    ),
    f7_eq_offer: calcCheck(
      data.sharesOutstanding,
      data.sharesOutstanding_py,
      (curr, prev) => curr <= prev,
      'Leverage: No new shares issued',
      (curr, prev) => `Shares: ${formatAmount(curr)} vs prior ${formatAmount(prev)}`
    ),
    f8_delta_margin: calcCheckYoY(
      data.grossProfit,
      data.revenue,
      data.grossProfit_py,
      data.revenue_py,
      (gp, rev, gpPy, revPy) => {
        if (rev === 0 || revPy === 0) return null;
        return gp / rev > gpPy / revPy;
      },
      'Efficiency: Gross Margin improved YoY'
    ),
    f9_delta_turn: calcCheckYoY(
      data.revenue,
      data.totalAssets,
      data.revenue_py,
      data.totalAssets_py,
      (rev, ta, revPy, taPy) => {
        if (ta === 0 || taPy === 0) return null;
        return rev / ta > revPy / taPy;
      },
      'Efficiency: Asset Turnover improved YoY'
    ),
  };

  const allChecks = Object.values(checks);
  const calculable = allChecks.filter((c) => c.passed !== null);
  const passed = calculable.filter((c) => c.passed === true);

  const result: PiotroskiResult = {
    score: passed.length,
    maxScore: calculable.length,
    checks,
  };
  if (data.fiscalYearCurrent) result.fiscalYearCurrent = data.fiscalYearCurrent;
  if (data.fiscalYearPrior) result.fiscalYearPrior = data.fiscalYearPrior;
  return result;
}

/** Reads current and prior fiscal years from normalized statements. */
export function mapBundleToPiotroski(bundle: FundamentalsBundle): PiotroskiInputs {
  const { income, balance, cashflow } = bundle;
  const latestIncome = income[income.length - 1];
  const priorIncome = income[income.length - 2];

  return {
    netIncome: latestValue(income, 'netIncome'),
    totalAssets: latestValue(balance, 'totalAssets'),
    longTermDebt: latestValue(balance, 'longTermDebt'),
    revenue: latestValue(income, 'revenue'),
    grossProfit: latestValue(income, 'grossProfit'),
    operatingCashFlow: latestValue(cashflow, 'operatingCashFlow'),
    currentAssets: latestValue(balance, 'currentAssets'),
    currentLiabilities: latestValue(balance, 'currentLiabilities'),
    sharesOutstanding: latestValue(balance, 'sharesOutstanding'),
    netIncome_py: priorValue(income, 'netIncome'),
    totalAssets_py: priorValue(balance, 'totalAssets'),
    longTermDebt_py: priorValue(balance, 'longTermDebt'),
    revenue_py: priorValue(income, 'revenue'),
    grossProfit_py: priorValue(income, 'grossProfit'),
    currentAssets_py: priorValue(balance, 'currentAssets'),
    currentLiabilities_py: priorValue(balance, 'currentLiabilities'),
    sharesOutstanding_py: priorValue(balance, 'sharesOutstanding'),
    fiscalYearCurrent: latestIncome?.periodEnd.slice(0, 4),
    fiscalYearPrior: priorIncome?.periodEnd.slice(0, 4),
  };
}
