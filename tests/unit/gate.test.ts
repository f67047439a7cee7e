import { describe, expect, it } from 'vitest';
import {
  DEFAULT_GATE_THRESHOLDS,
  evaluateGate,
  evaluateMarginOfSafety,
  netDebtToEbitda,
} from '@/scoring/gate';
import { emptyMetrics } from '@/scoring/metrics';
import type { MetricsSnapshot } from '@/types/screening';

function metrics(overrides: Partial<MetricsSnapshot>): MetricsSnapshot {
  return { ...emptyMetrics('TEST', 10), ...overrides };
}

const healthy: Partial<MetricsSnapshot> = {
  roic: 0.2,
  roe: 0.2,
  fcfMargin: 0.1,
  netDebt: 100,
  ebitda: 100,
  interestCoverage: 10,
  peRatio: 15,
  pbRatio: 2,
};

describe('evaluateGate', () => {
  it('passes a healthy company with enough upside', () => {
    const verdict = evaluateGate(metrics(healthy), 75);

    expect(verdict.pass).toBe(true);
    expect(verdict.reasons).toEqual([]);
    expect(verdict.notEvaluated).toEqual([]);
    expect(verdict.checks.map((c) => c.status)).toEqual(Array(8).fill('passed'));
  });

  it('fails on one metric and skips the missing ones', () => {
    const verdict = evaluateGate(metrics({ roic: 0.15, roe: 0.1 }), 60);

    expect(verdict.pass).toBe(false);
    expect(verdict.reasons).toEqual(['ROE 10.0% < 12.0%']);
    expect(verdict.notEvaluated).toEqual([
      'fcf_margin',
      'net_debt_to_ebitda',
      'interest_coverage',
      'pe',
      'pb',
    ]);
  });

  it('lists every failure in check order', () => {
    const verdict = evaluateGate(
      metrics({
        roic: 0.08,
        roe: 0.05,
        fcfMargin: 0.03,
        netDebt: 310,
        ebitda: 100,
        interestCoverage: 2.5,
        peRatio: 45,
        pbRatio: 6,
      }),
      20
    );

    expect(verdict.pass).toBe(false);
    expect(verdict.reasons).toEqual([
      'ROIC 8.0% < 12.0%',
      'ROE 5.0% < 12.0%',
      'FCF margin 3.0% < 5.0%',
      'Net debt/EBITDA 3.10 > 2.50',
      'Interest coverage 2.5x < 4.0x',
      'P/E 45.0 > 40.0',
      'P/B 6.00 > 5.00',
      'Upside 20.0% < 50.0%',
    ]);
  });

  it('passes values sitting exactly on a threshold', () => {
    const verdict = evaluateGate(
      metrics({
        ...healthy,
        roic: 0.12,
        fcfMargin: 0.05,
        netDebt: 250,
        ebitda: 100,
        interestCoverage: 4,
        peRatio: 40,
        pbRatio: 5,
      }),
      50
    );

    expect(verdict.pass).toBe(true);
  });

  it('cannot pass without an upside estimate', () => {
    const verdict = evaluateGate(metrics(healthy), null);

    expect(verdict.pass).toBe(false);
    expect(verdict.reasons).toEqual(['No upside estimate']);
    expect(verdict.checks[7]).toEqual({
      id: 'margin_of_safety',
      status: 'failed',
      value: null,
      threshold: 50,
      reason: 'No upside estimate',
    });
  });

  it('applies custom thresholds', () => {
    const verdict = evaluateGate(metrics(healthy), 30, {
      ...DEFAULT_GATE_THRESHOLDS,
      minUpsidePct: 25,
      peMax: 10,
    });

    expect(verdict.reasons).toEqual(['P/E 15.0 > 10.0']);
  });
});

describe('netDebtToEbitda', () => {
  it('is null without a positive EBITDA', () => {
    expect(netDebtToEbitda(metrics({ netDebt: 100, ebitda: 0 }))).toBeNull();
    expect(netDebtToEbitda(metrics({ netDebt: 100, ebitda: -50 }))).toBeNull();
    expect(netDebtToEbitda(metrics({ netDebt: null, ebitda: 50 }))).toBeNull();
  });

  it('lets net cash pass', () => {
    expect(netDebtToEbitda(metrics({ netDebt: -100, ebitda: 50 }))).toBe(-2);
  });
});

describe('evaluateMarginOfSafety', () => {
  it('passes at the threshold', () => {
    expect(evaluateMarginOfSafety(50).status).toBe('passed');
    expect(evaluateMarginOfSafety(49.9).reason).toBe('Upside 49.9% < 50.0%');
  });
});
