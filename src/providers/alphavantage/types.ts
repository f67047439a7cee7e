/**
 * Alpha Vantage query functions and response envelope keys
 */

export type AlphaVantageFunction =
  | 'OVERVIEW'
  | 'INCOME_STATEMENT'
  | 'BALANCE_SHEET'
  | 'CASH_FLOW'
  | 'EARNINGS'
  | 'TIME_SERIES_DAILY_ADJUSTED'
  | 'GLOBAL_QUOTE'
  | 'LISTING_STATUS';

export const DAILY_SERIES_KEY = 'Time Series (Daily)';
export const GLOBAL_QUOTE_KEY = 'Global Quote';

export type OutputSize = 'compact' | 'full';

export type ListingState = 'active' | 'delisted';

export interface ListingQuery {
  state?: ListingState;
  /** `yyyy-MM-dd` snapshot date. */
  date?: string;
}
