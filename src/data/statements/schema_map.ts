/**
 * Vendor schema mapping for Alpha Vantage payloads.
 *
 * Every vendor field name the screener reads is listed here, mapped to its
 * canonical name. When a field has several spellings across API versions,
 * the vendor keys are tried in order.
 */

import type {
  CompanyOverview,
  GlobalQuote,
  PriceBar,
  StatementFieldMap,
  StatementKind,
} from '@/types/fundamentals';

export interface FieldMapping<F extends string> {
  field: F;
  vendorKeys: readonly string[];
}

export interface StatementSchema<F extends string> {
  envelopeKey: string;
  dateKey: string;
  currencyKey: string | null;
  fields: ReadonlyArray<FieldMapping<F>>;
}

export type StatementSchemaTable = {
  [K in StatementKind]: StatementSchema<StatementFieldMap[K]>;
};

export const STATEMENT_SCHEMAS: StatementSchemaTable = {
  income: {
    envelopeKey: 'annualReports',
    dateKey: 'fiscalDateEnding',
    currencyKey: 'reportedCurrency',
    fields: [
      { field: 'revenue', vendorKeys: ['totalRevenue'] },
      { field: 'grossProfit', vendorKeys: ['grossProfit'] },
      { field: 'operatingIncome', vendorKeys: ['operatingIncome'] },
      { field: 'netIncome', vendorKeys: ['netIncome'] },
      { field: 'interestExpense', vendorKeys: ['interestExpense'] },
      { field: 'ebitda', vendorKeys: ['ebitda'] },
    ],
  },
  balance: {
    envelopeKey: 'annualReports',
    dateKey: 'fiscalDateEnding',
    currencyKey: 'reportedCurrency',
    fields: [
      { field: 'totalAssets', vendorKeys: ['totalAssets'] },
      { field: 'currentAssets', vendorKeys: ['totalCurrentAssets'] },
      { field: 'currentLiabilities', vendorKeys: ['totalCurrentLiabilities'] },
      {
        field: 'cash',
        vendorKeys: ['cashAndCashEquivalentsAtCarryingValue', 'cashAndShortTermInvestments'],
      },
      { field: 'shortTermDebt', vendorKeys: ['shortTermDebt', 'currentDebt'] },
      { field: 'longTermDebt', vendorKeys: ['longTermDebt', 'longTermDebtNoncurrent'] },
      { field: 'totalDebt', vendorKeys: ['shortLongTermDebtTotal', 'totalDebt'] },
      { field: 'shareholdersEquity', vendorKeys: ['totalShareholderEquity'] },
      { field: 'sharesOutstanding', vendorKeys: ['commonStockSharesOutstanding'] },
    ],
  },
  cashflow: {
    envelopeKey: 'annualReports',
    dateKey: 'fiscalDateEnding',
    currencyKey: 'reportedCurrency',
    fields: [
      { field: 'operatingCashFlow', vendorKeys: ['operatingCashflow'] },
      { field: 'capitalExpenditures', vendorKeys: ['capitalExpenditures'] },
    ],
  },
  earnings: {
    envelopeKey: 'annualEarnings',
    dateKey: 'fiscalDateEnding',
    currencyKey: null,
    fields: [{ field: 'reportedEps', vendorKeys: ['reportedEPS'] }],
  },
};

export type OverviewTextField = 'symbol' | 'name' | 'exchange' | 'currency' | 'sector' | 'industry';
export type OverviewNumericField = Exclude<keyof CompanyOverview, OverviewTextField>;

export const OVERVIEW_TEXT_FIELDS: Record<OverviewTextField, readonly string[]> = {
  symbol: ['Symbol'],
  name: ['Name'],
  exchange: ['Exchange'],
  currency: ['Currency'],
  sector: ['Sector'],
  industry: ['Industry'],
};

export const OVERVIEW_NUMERIC_FIELDS: Record<OverviewNumericField, readonly string[]> = {
  sharesOutstanding: ['SharesOutstanding'],
  marketCap: ['MarketCapitalization'],
  ebitda: ['EBITDA'],
  peRatio: ['PERatio', 'TrailingPE'],
  psRatio: ['PriceToSalesRatioTTM'],
  pbRatio: ['PriceToBookRatio'],
  dividendYield: ['DividendYield'],
  beta: ['Beta'],
};

export const PRICE_BAR_FIELDS: Record<Exclude<keyof PriceBar, 'date'>, string> = {
  open: '1. open',
  high: '2. high',
  low: '3. low',
  close: '4. close',
  adjustedClose: '5. adjusted close',
  volume: '6. volume',
  dividendAmount: '7. dividend amount',
  splitCoefficient: '8. split coefficient',
};

export const GLOBAL_QUOTE_FIELDS: Record<keyof GlobalQuote, string> = {
  symbol: '01. symbol',
  price: '05. price',
  previousClose: '08. previous close',
  changePercent: '10. change percent',
  latestTradingDay: '07. latest trading day',
};
