/**
 * Persisted screen run record (validated against `schemas/screen_run.v1.schema.json`).
 */

import type { DcfSettings } from '@/scoring/valuation';
import type { GateThresholds } from '@/scoring/gate';
import type { MagicFormulaResult } from '@/scoring/formulas/magic_formula';
import type { PiotroskiResult } from '@/scoring/formulas/piotroski';
import type {
  GateVerdict,
  MetricsSnapshot,
  PriceQuote,
  ValuationResult,
} from './screening';

export type SymbolScreenStatus = 'screened' | 'no_data' | 'failed';

export type FundamentalsSource = 'cache' | 'live';

export interface SymbolScreenResult {
  symbol: string;
  status: SymbolScreenStatus;
  price: PriceQuote | null;
  fundamentalsSource: FundamentalsSource | null;
  metrics: MetricsSnapshot;
  valuation: ValuationResult;
  verdict: GateVerdict;
  piotroski: PiotroskiResult | null;
  magicFormula: MagicFormulaResult | null;
  notes: string[];
}

export type UniverseSource = 'listing' | 'seeds' | 'explicit';

export interface RankedSymbol {
  symbol: string;
  price: number;
  changePercent: number;
  source: string;
}

export interface ScreenRunSector {
  sector: string;
  universe_source: UniverseSource;
  candidates: string[];
  ranked: RankedSymbol[];
  results: SymbolScreenResult[];
  picks: string[];
  halted: boolean;
}

export interface ScreenRun {
  schema_version: 'screen_run.v1';
  run_id: string;
  generated_at: string;
  thresholds: GateThresholds;
  valuation_settings: DcfSettings;
  sectors: ScreenRunSector[];
  halted: boolean;
  halt_reason: string | null;
  request_count: number;
}
