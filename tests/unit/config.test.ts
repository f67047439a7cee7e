import { afterEach, describe, expect, it } from 'vitest';
import { mkdirSync, writeFileSync } from 'fs';
import { join } from 'path';
import {
  DEFAULT_CACHE_TTL,
  DEFAULT_FETCHER,
  findSector,
  getConfig,
  loadConfig,
  resetConfig,
} from '@/core/config';
import { ConfigError } from '@/core/errors';
import { DEFAULT_GATE_THRESHOLDS } from '@/scoring/gate';
import { DEFAULT_DCF_SETTINGS } from '@/scoring/valuation';
import { makeTempDir } from '../helpers/context';

function writeConfig(files: Record<string, unknown>): string {
  const root = makeTempDir('config-test-');
  const configDir = join(root, 'config');
  mkdirSync(configDir, { recursive: true });
  for (const [name, content] of Object.entries(files)) {
    writeFileSync(
      join(configDir, name),
      typeof content === 'string' ? content : JSON.stringify(content)
    );
  }
  return root;
}

describe('loadConfig', () => {
  afterEach(() => {
    resetConfig();
  });

  it('uses defaults when no config files exist', () => {
    const root = makeTempDir('config-empty-');
    const config = loadConfig(root);

    expect(config.projectRoot).toBe(root);
    expect(config.schemasDir).toBe(join(root, 'schemas'));
    expect(config.cacheTtl).toEqual(DEFAULT_CACHE_TTL);
    expect(config.fetcher).toEqual(DEFAULT_FETCHER);
    expect(config.gate).toEqual(DEFAULT_GATE_THRESHOLDS);
    expect(config.valuation).toEqual(DEFAULT_DCF_SETTINGS);
    expect(config.universe).toEqual({
      exchanges: ['NYSE', 'NASDAQ'],
      pool_cap: 600,
      names_per_sector: 5,
      oversample: 6,
      stack_cap: 10,
      price_sources: ['finnhub_quote', 'av_daily_adjusted', 'av_global_quote'],
      sectors: [],
    });
  });

  it('maps snake_case thresholds and keeps defaults for missing keys', () => {
    const config = loadConfig(
      writeConfig({ 'gate_thresholds.json': { roic_min: 0.15, pe_max: 30 } })
    );

    expect(config.gate).toEqual({ ...DEFAULT_GATE_THRESHOLDS, roicMin: 0.15, peMax: 30 });
  });

  it('normalizes sector definitions', () => {
    const config = loadConfig(
      writeConfig({
        'universe.json': {
          exchanges: ['nyse'],
          price_sources: ['av_global_quote'],
          sectors: [
            { name: ' Energy ', seeds: ['xom', 'XOM', ' cvx '], name_keywords: ['oil'] },
            { aliases: ['Nameless'] },
          ],
        },
      })
    );

    expect(config.universe.exchanges).toEqual(['NYSE']);
    expect(config.universe.price_sources).toEqual(['av_global_quote']);
    expect(config.universe.sectors).toEqual([
      { name: 'Energy', aliases: ['Energy'], seeds: ['XOM', 'CVX'], name_keywords: ['OIL'] },
    ]);
    expect(findSector(config, 'energy')?.name).toBe('Energy');
    expect(findSector(config, 'Metals')).toBeNull();
  });

  it('rejects malformed JSON with the file name', () => {
    const root = writeConfig({ 'cache_ttl.json': '{ "fundamentals_ttl_days": ' });

    expect(() => loadConfig(root)).toThrow(ConfigError);
    expect(() => loadConfig(root)).toThrow(/cache_ttl\.json: invalid JSON/);
  });

  it('rejects non-numeric values', () => {
    const root = writeConfig({ 'fetcher.json': { pause_seconds: '12' } });

    expect(() => loadConfig(root)).toThrow('"pause_seconds" must be a finite number');
  });

  it('rejects a negative retry count', () => {
    const root = writeConfig({ 'fetcher.json': { max_retries: -1 } });

    expect(() => loadConfig(root)).toThrow('"max_retries" must be a non-negative integer');
  });

  it('rejects unknown price sources', () => {
    const root = writeConfig({ 'universe.json': { price_sources: ['yahoo'] } });

    expect(() => loadConfig(root)).toThrow('unknown price source "yahoo"');
  });

  it('rejects a discount rate at or below terminal growth', () => {
    const root = writeConfig({
      'valuation.json': { discount_rate: 0.025, terminal_growth_rate: 0.025 },
    });

    expect(() => loadConfig(root)).toThrow('"discount_rate" must exceed "terminal_growth_rate"');
  });

  it('rejects a fractional horizon', () => {
    const root = writeConfig({ 'valuation.json': { horizon_years: 2.5 } });

    expect(() => loadConfig(root)).toThrow('"horizon_years" must be a positive integer');
  });

  it('ships a sector list in the repository config', () => {
    const config = getConfig();

    expect(config.universe.sectors.map((s) => s.name)).toEqual([
      'Defence',
      'Energy',
      'Health',
      'Metals',
    ]);
    expect(getConfig()).toBe(config);
  });
});
