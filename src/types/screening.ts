/**
 * Derived records handed to downstream consumers (report writers, exporters).
 * All of them are plain JSON-serializable values.
 */

export interface PriceQuote {
  symbol: string;
  price: number;
  changePercent: number | null;
  asOf: string | null;
  source: string;
}

export interface MetricsSnapshot {
  symbol: string;
  name: string | null;
  sector: string | null;
  industry: string | null;
  price: number | null;
  sharesOutstanding: number | null;
  marketCap: number | null;
  impliedMarketCap: number | null;
  revenue: number | null;
  ebitda: number | null;
  grossMargin: number | null;
  operatingMargin: number | null;
  netMargin: number | null;
  freeCashFlow: number | null;
  fcfMargin: number | null;
  revenueCagr: number | null;
  epsCagr: number | null;
  totalDebt: number | null;
  cash: number | null;
  netDebt: number | null;
  interestCoverage: number | null;
  roe: number | null;
  roic: number | null;
  peRatio: number | null;
  psRatio: number | null;
  pbRatio: number | null;
  dividendYield: number | null;
}

export type GrowthSource = 'revenue_cagr' | 'default';

export interface DcfAssumptions {
  growthRate: number;
  growthSource: GrowthSource;
  discountRate: number;
  terminalGrowthRate: number;
  horizonYears: number;
}

export type UpsideBasis = 'per_share' | 'enterprise';

export interface ValuationResult {
  enterpriseValue: number | null;
  equityValue: number | null;
  explicitPresentValue: number | null;
  terminalPresentValue: number | null;
  fairValuePerShare: number | null;
  upsidePct: number | null;
  upsideBasis: UpsideBasis | null;
  assumptions: DcfAssumptions;
}

export type GateCheckId =
  | 'roic'
  | 'roe'
  | 'fcf_margin'
  | 'net_debt_to_ebitda'
  | 'interest_coverage'
  | 'pe'
  | 'pb'
  | 'margin_of_safety';

export type GateCheckStatus = 'passed' | 'failed' | 'not_evaluated';

export interface GateCheck {
  id: GateCheckId;
  status: GateCheckStatus;
  value: number | null;
  threshold: number;
  reason: string | null;
}

export interface GateVerdict {
  pass: boolean;
  /** Failed checks only, in check order. Empty iff `pass`. */
  reasons: string[];
  /** Checks skipped for missing inputs. */
  notEvaluated: GateCheckId[];
  checks: GateCheck[];
}
