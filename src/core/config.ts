/**
 * Application configuration loaded from JSON files under `config/`.
 * Every file is optional; missing keys fall back to the defaults below.
 */

import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { ConfigError } from './errors';
import { DEFAULT_GATE_THRESHOLDS, type GateThresholds } from '@/scoring/gate';
import { DEFAULT_DCF_SETTINGS, type DcfSettings } from '@/scoring/valuation';
import { isRecord, normalizeSymbol, type UnknownRecord } from '@/utils/values';

export type PriceSourceId = 'finnhub_quote' | 'av_daily_adjusted' | 'av_global_quote';

export const PRICE_SOURCE_IDS: readonly PriceSourceId[] = [
  'finnhub_quote',
  'av_daily_adjusted',
  'av_global_quote',
];

export interface CacheTtlConfig {
  fundamentals_ttl_days: number;
  overview_ttl_days: number;
}

export interface FetcherConfig {
  base_url: string;
  pause_seconds: number;
  timeout_seconds: number;
  max_retries: number;
  max_backoff_seconds: number;
}

export interface SectorDefinition {
  name: string;
  aliases: string[];
  seeds: string[];
  name_keywords: string[];
}

export interface UniverseConfig {
  exchanges: string[];
  pool_cap: number;
  names_per_sector: number;
  oversample: number;
  stack_cap: number;
  price_sources: PriceSourceId[];
  sectors: SectorDefinition[];
}

export interface AppConfig {
  cacheTtl: CacheTtlConfig;
  fetcher: FetcherConfig;
  gate: GateThresholds;
  valuation: DcfSettings;
  universe: UniverseConfig;
  projectRoot: string;
  /** JSON Schemas for cache payloads and run records. */
  schemasDir: string;
}

export const DEFAULT_CACHE_TTL: CacheTtlConfig = {
  fundamentals_ttl_days: 14,
  overview_ttl_days: 7,
};

export const DEFAULT_FETCHER: FetcherConfig = {
  base_url: 'https://www.alphavantage.co/query',
  pause_seconds: 12,
  timeout_seconds: 15,
  max_retries: 3,
  max_backoff_seconds: 30,
};

const DEFAULT_UNIVERSE: UniverseConfig = {
  exchanges: ['NYSE', 'NASDAQ'],
  pool_cap: 600,
  names_per_sector: 5,
  oversample: 6,
  stack_cap: 10,
  price_sources: ['finnhub_quote', 'av_daily_adjusted', 'av_global_quote'],
  sectors: [],
};

let cachedConfig: AppConfig | null = null;

function readJsonFile(path: string): unknown {
  if (!existsSync(path)) return null;
  const raw = readFileSync(path, 'utf-8');
  try {
    return JSON.parse(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`invalid JSON (${message})`, path);
  }
}

function readNumber(
  data: UnknownRecord,
  key: string,
  fallback: number,
  file: string
): number {
  const value = data[key];
  if (value === undefined || value === null) return fallback;
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ConfigError(`"${key}" must be a finite number`, file);
  }
  return value;
}

function readStringList(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value
    .filter((item): item is string => typeof item === 'string')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function dedupeSymbols(values: string[]): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const value of values) {
    const symbol = normalizeSymbol(value);
    if (symbol && !seen.has(symbol)) {
      seen.add(symbol);
      out.push(symbol);
    }
  }
  return out;
}

function normalizeCacheTtl(raw: unknown, file: string): CacheTtlConfig {
  const parsed = isRecord(raw) ? raw : {};
  return {
    fundamentals_ttl_days: readNumber(
      parsed,
      'fundamentals_ttl_days',
      DEFAULT_CACHE_TTL.fundamentals_ttl_days,
      file
    ),
    overview_ttl_days: readNumber(
      parsed,
      'overview_ttl_days',
      DEFAULT_CACHE_TTL.overview_ttl_days,
      file
    ),
  };
}

function normalizeFetcher(raw: unknown, file: string): FetcherConfig {
  const parsed = isRecord(raw) ? raw : {};
  const maxRetries = readNumber(parsed, 'max_retries', DEFAULT_FETCHER.max_retries, file);
  if (!Number.isInteger(maxRetries) || maxRetries < 0) {
    throw new ConfigError('"max_retries" must be a non-negative integer', file);
  }
  return {
    base_url:
      typeof parsed.base_url === 'string' && parsed.base_url.trim()
        ? parsed.base_url.trim()
        : DEFAULT_FETCHER.base_url,
    pause_seconds: readNumber(parsed, 'pause_seconds', DEFAULT_FETCHER.pause_seconds, file),
    timeout_seconds: readNumber(
      parsed,
      'timeout_seconds',
      DEFAULT_FETCHER.timeout_seconds,
      file
    ),
    max_retries: maxRetries,
    max_backoff_seconds: readNumber(
      parsed,
      'max_backoff_seconds',
      DEFAULT_FETCHER.max_backoff_seconds,
      file
    ),
  };
}

function normalizeGate(raw: unknown, file: string): GateThresholds {
  const parsed = isRecord(raw) ? raw : {};
  const d = DEFAULT_GATE_THRESHOLDS;
  return {
    roicMin: readNumber(parsed, 'roic_min', d.roicMin, file),
    roeMin: readNumber(parsed, 'roe_min', d.roeMin, file),
    fcfMarginMin: readNumber(parsed, 'fcf_margin_min', d.fcfMarginMin, file),
    netDebtToEbitdaMax: readNumber(
      parsed,
      'net_debt_to_ebitda_max',
      d.netDebtToEbitdaMax,
      file
    ),
    interestCoverageMin: readNumber(
      parsed,
      'interest_coverage_min',
      d.interestCoverageMin,
      file
    ),
    peMax: readNumber(parsed, 'pe_max', d.peMax, file),
    pbMax: readNumber(parsed, 'pb_max', d.pbMax, file),
    minUpsidePct: readNumber(parsed, 'min_upside_pct', d.minUpsidePct, file),
  };
}

function normalizeValuation(raw: unknown, file: string): DcfSettings {
  const parsed = isRecord(raw) ? raw : {};
  const d = DEFAULT_DCF_SETTINGS;
  const settings: DcfSettings = {
    discountRate: readNumber(parsed, 'discount_rate', d.discountRate, file),
    terminalGrowthRate: readNumber(
      parsed,
      'terminal_growth_rate',
      d.terminalGrowthRate,
      file
    ),
    horizonYears: readNumber(parsed, 'horizon_years', d.horizonYears, file),
    defaultGrowthRate: readNumber(parsed, 'default_growth_rate', d.defaultGrowthRate, file),
    minGrowthRate: readNumber(parsed, 'min_growth_rate', d.minGrowthRate, file),
    maxGrowthRate: readNumber(parsed, 'max_growth_rate', d.maxGrowthRate, file),
  };
  if (settings.discountRate <= settings.terminalGrowthRate) {
    throw new ConfigError('"discount_rate" must exceed "terminal_growth_rate"', file);
  }
  if (!Number.isInteger(settings.horizonYears) || settings.horizonYears < 1) {
    throw new ConfigError('"horizon_years" must be a positive integer', file);
  }
  return settings;
}

function normalizeSector(raw: unknown): SectorDefinition | null {
  if (!isRecord(raw) || typeof raw.name !== 'string' || !raw.name.trim()) {
    return null;
  }
  const name = raw.name.trim();
  const aliases = readStringList(raw.aliases);
  return {
    name,
    aliases: aliases.length > 0 ? aliases : [name],
    seeds: dedupeSymbols(readStringList(raw.seeds)),
    name_keywords: readStringList(raw.name_keywords).map((k) => k.toUpperCase()),
  };
}

function normalizeUniverse(raw: unknown, file: string): UniverseConfig {
  const parsed = isRecord(raw) ? raw : {};
  const d = DEFAULT_UNIVERSE;
  const exchanges = readStringList(parsed.exchanges).map((e) => e.toUpperCase());
  const priceSources = readStringList(parsed.price_sources).flatMap((id) => {
    const known = PRICE_SOURCE_IDS.find((candidate) => candidate === id);
    if (!known) {
      throw new ConfigError(`unknown price source "${id}"`, file);
    }
    return [known];
  });
  const sectors = Array.isArray(parsed.sectors)
    ? parsed.sectors
        .map(normalizeSector)
        .filter((sector): sector is SectorDefinition => sector !== null)
    : d.sectors;

  return {
    exchanges: exchanges.length > 0 ? exchanges : d.exchanges,
    pool_cap: readNumber(parsed, 'pool_cap', d.pool_cap, file),
    names_per_sector: readNumber(parsed, 'names_per_sector', d.names_per_sector, file),
    oversample: readNumber(parsed, 'oversample', d.oversample, file),
    stack_cap: readNumber(parsed, 'stack_cap', d.stack_cap, file),
    price_sources: priceSources.length > 0 ? priceSources : d.price_sources,
    sectors,
  };
}

export function loadConfig(projectRoot: string = process.cwd()): AppConfig {
  const configDir = join(projectRoot, 'config');
  const file = (name: string) => join(configDir, name);

  return {
    cacheTtl: normalizeCacheTtl(readJsonFile(file('cache_ttl.json')), file('cache_ttl.json')),
    fetcher: normalizeFetcher(readJsonFile(file('fetcher.json')), file('fetcher.json')),
    gate: normalizeGate(
      readJsonFile(file('gate_thresholds.json')),
      file('gate_thresholds.json')
    ),
    valuation: normalizeValuation(
      readJsonFile(file('valuation.json')),
      file('valuation.json')
    ),
    universe: normalizeUniverse(readJsonFile(file('universe.json')), file('universe.json')),
    projectRoot,
    schemasDir: join(projectRoot, 'schemas'),
  };
}

export function getConfig(): AppConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}

export function resetConfig(): void {
  cachedConfig = null;
}

export function findSector(config: AppConfig, name: string): SectorDefinition | null {
  const wanted = name.trim().toLowerCase();
  return config.universe.sectors.find((s) => s.name.toLowerCase() === wanted) ?? null;
}
