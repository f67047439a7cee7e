/**
 * Magic-formula style value/quality blend: earnings yield (EBIT / EV) and
 * return on capital (EBIT / (total assets - current liabilities)), equally
 * weighted. Operating income stands in for EBIT.
 */

import { latestValue } from '@/data/statements/normalizer';
import type { FundamentalsBundle } from '@/types/fundamentals';

export interface MagicFormulaResult {
  ebit: number | null;
  enterpriseValue: number | null;
  earningsYield: number | null;
  returnOnCapital: number | null;
  score: number | null;
}

function sumPresent(...values: Array<number | null>): number | null {
  const present = values.filter((v): v is number => v !== null);
  return present.length > 0 ? present.reduce((acc, v) => acc + v, 0) : null;
}

export function enterpriseValueFromBundle(bundle: FundamentalsBundle): number | null {
  const marketCap = bundle.overview?.marketCap ?? null;
  const debt = sumPresent(
    latestValue(bundle.balance, 'shortTermDebt'),
    latestValue(bundle.balance, 'longTermDebt')
  );
  const cash = latestValue(bundle.balance, 'cash');
  if (marketCap === null || debt === null || cash === null) return null;
  return Math.max(marketCap + debt - cash, 0);
}

export function calculateMagicFormula(bundle: FundamentalsBundle): MagicFormulaResult {
  const ebit = latestValue(bundle.income, 'operatingIncome');
  const enterpriseValue = enterpriseValueFromBundle(bundle);

  const totalAssets = latestValue(bundle.balance, 'totalAssets');
  const currentLiabilities = latestValue(bundle.balance, 'currentLiabilities');
  const investedCapital =
    totalAssets !== null && currentLiabilities !== null
      ? Math.max(totalAssets - currentLiabilities, 1)
      : null;

  const earningsYield =
    ebit !== null && enterpriseValue !== null && enterpriseValue > 0
      ? ebit / enterpriseValue
      : null;
  const returnOnCapital =
    ebit !== null && investedCapital !== null ? ebit / investedCapital : null;

  return {
    ebit,
    enterpriseValue,
    earningsYield,
    returnOnCapital,
    score:
      earningsYield !== null && returnOnCapital !== null
        ? 0.5 * earningsYield + 0.5 * returnOnCapital
        : null,
  };
}
