/**
 * Canonical fundamentals shapes. No vendor field names appear here; the
 * mapping from provider payloads lives in `src/data/statements/schema_map.ts`.
 */

export type StatementKind = 'income' | 'balance' | 'cashflow' | 'earnings';

export type IncomeField =
  | 'revenue'
  | 'grossProfit'
  | 'operatingIncome'
  | 'netIncome'
  | 'interestExpense'
  | 'ebitda';

export type BalanceField =
  | 'totalAssets'
  | 'currentAssets'
  | 'currentLiabilities'
  | 'cash'
  | 'shortTermDebt'
  | 'longTermDebt'
  | 'totalDebt'
  | 'shareholdersEquity'
  | 'sharesOutstanding';

export type CashFlowField = 'operatingCashFlow' | 'capitalExpenditures';

export type EarningsField = 'reportedEps';

export interface StatementFieldMap {
  income: IncomeField;
  balance: BalanceField;
  cashflow: CashFlowField;
  earnings: EarningsField;
}

export interface StatementRecord<F extends string = string> {
  /** Fiscal period end, `yyyy-MM-dd`. */
  periodEnd: string;
  currency: string | null;
  values: Partial<Record<F, number | null>>;
}

/** Oldest period first. */
export type NormalizedSeries<F extends string = string> = StatementRecord<F>[];

export interface CompanyOverview {
  symbol: string | null;
  name: string | null;
  exchange: string | null;
  currency: string | null;
  sector: string | null;
  industry: string | null;
  sharesOutstanding: number | null;
  marketCap: number | null;
  ebitda: number | null;
  peRatio: number | null;
  psRatio: number | null;
  pbRatio: number | null;
  dividendYield: number | null;
  beta: number | null;
}

export interface FundamentalsBundle {
  symbol: string;
  overview: CompanyOverview | null;
  income: NormalizedSeries<IncomeField>;
  balance: NormalizedSeries<BalanceField>;
  cashflow: NormalizedSeries<CashFlowField>;
  earnings: NormalizedSeries<EarningsField>;
  fetchedAt: string;
}

export interface PriceBar {
  date: string;
  open: number | null;
  high: number | null;
  low: number | null;
  close: number | null;
  adjustedClose: number | null;
  volume: number | null;
  dividendAmount: number | null;
  splitCoefficient: number | null;
}

export interface GlobalQuote {
  symbol: string | null;
  price: number | null;
  previousClose: number | null;
  changePercent: number | null;
  latestTradingDay: string | null;
}

export interface ListingEntry {
  symbol: string;
  name: string;
  exchange: string;
  assetType: string;
  status: string;
}
