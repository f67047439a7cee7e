/**
 * Pass/fail quality and margin-of-safety gate.
 *
 * Quality checks with a null input are reported as `not_evaluated` and do
 * not fail the verdict. The margin-of-safety check is mandatory: without an
 * upside estimate the symbol cannot pass.
 */

import type {
  GateCheck,
  GateCheckId,
  GateVerdict,
  MetricsSnapshot,
} from '@/types/screening';

export interface GateThresholds {
  roicMin: number;
  roeMin: number;
  fcfMarginMin: number;
  netDebtToEbitdaMax: number;
  interestCoverageMin: number;
  peMax: number;
  pbMax: number;
  /** Required upside in percent (50 = fair value 1.5x price). */
  minUpsidePct: number;
}

export const DEFAULT_GATE_THRESHOLDS: GateThresholds = {
  roicMin: 0.12,
  roeMin: 0.12,
  fcfMarginMin: 0.05,
  netDebtToEbitdaMax: 2.5,
  interestCoverageMin: 4,
  peMax: 40,
  pbMax: 5,
  minUpsidePct: 50,
};

export const NO_UPSIDE_REASON = 'No upside estimate';

type Direction = 'min' | 'max';

interface CheckSpec {
  id: GateCheckId;
  direction: Direction;
  value: (m: MetricsSnapshot) => number | null;
  threshold: (t: GateThresholds) => number;
  describe: (value: number, threshold: number) => string;
}

const pct = (v: number) => `${(v * 100).toFixed(1)}%`;

export function netDebtToEbitda(metrics: MetricsSnapshot): number | null {
  const { netDebt, ebitda } = metrics;
  if (netDebt === null || ebitda === null || ebitda <= 0) return null;
  return netDebt / ebitda;
}

/** Quality checks in reporting order. */
const QUALITY_CHECKS: readonly CheckSpec[] = [
  {
    id: 'roic',
    direction: 'min',
    value: (m) => m.roic,
    threshold: (t) => t.roicMin,
    describe: (v, t) => `ROIC ${pct(v)} < ${pct(t)}`,
  },
  {
    id: 'roe',
    direction: 'min',
    value: (m) => m.roe,
    threshold: (t) => t.roeMin,
    describe: (v, t) => `ROE ${pct(v)} < ${pct(t)}`,
  },
  {
    id: 'fcf_margin',
    direction: 'min',
    value: (m) => m.fcfMargin,
    threshold: (t) => t.fcfMarginMin,
    describe: (v, t) => `FCF margin ${pct(v)} < ${pct(t)}`,
  },
  {
    id: 'net_debt_to_ebitda',
    direction: 'max',
    value: netDebtToEbitda,
    threshold: (t) => t.netDebtToEbitdaMax,
    describe: (v, t) => `Net debt/EBITDA ${v.toFixed(2)} > ${t.toFixed(2)}`,
  },
  {
    id: 'interest_coverage',
    direction: 'min',
    value: (m) => m.interestCoverage,
    threshold: (t) => t.interestCoverageMin,
    describe: (v, t) => `Interest coverage ${v.toFixed(1)}x < ${t.toFixed(1)}x`,
  },
  {
    id: 'pe',
    direction: 'max',
    value: (m) => m.peRatio,
    threshold: (t) => t.peMax,
    describe: (v, t) => `P/E ${v.toFixed(1)} > ${t.toFixed(1)}`,
  },
  {
    id: 'pb',
    direction: 'max',
    value: (m) => m.pbRatio,
    threshold: (t) => t.pbMax,
    describe: (v, t) => `P/B ${v.toFixed(2)} > ${t.toFixed(2)}`,
  },
];

function runCheck(spec: CheckSpec, metrics: MetricsSnapshot, thresholds: GateThresholds): GateCheck {
  const value = spec.value(metrics);
  const threshold = spec.threshold(thresholds);
  if (value === null) {
    return { id: spec.id, status: 'not_evaluated', value: null, threshold, reason: null };
  }
  const passed = spec.direction === 'min' ? value >= threshold : value <= threshold;
  return {
    id: spec.id,
    status: passed ? 'passed' : 'failed',
    value,
    threshold,
    reason: passed ? null : spec.describe(value, threshold),
  };
}

export function evaluateMarginOfSafety(
  upsidePct: number | null,
  thresholds: GateThresholds = DEFAULT_GATE_THRESHOLDS
): GateCheck {
  const threshold = thresholds.minUpsidePct;
  if (upsidePct === null) {
    return {
      id: 'margin_of_safety',
      status: 'failed',
      value: null,
      threshold,
      reason: NO_UPSIDE_REASON,
    };
  }
  const passed = upsidePct >= threshold;
  return {
    id: 'margin_of_safety',
    status: passed ? 'passed' : 'failed',
    value: upsidePct,
    threshold,
    reason: passed ? null : `Upside ${upsidePct.toFixed(1)}% < ${threshold.toFixed(1)}%`,
  };
}

export function evaluateGate(
  metrics: MetricsSnapshot,
  upsidePct: number | null,
  thresholds: GateThresholds = DEFAULT_GATE_THRESHOLDS
): GateVerdict {
  const checks = QUALITY_CHECKS.map((spec) => runCheck(spec, metrics, thresholds));
  checks.push(evaluateMarginOfSafety(upsidePct, thresholds));

  const reasons: string[] = [];
  const notEvaluated: GateCheckId[] = [];
  for (const check of checks) {
    if (check.status === 'failed' && check.reason !== null) {
      reasons.push(check.reason);
    } else if (check.status === 'not_evaluated') {
      notEvaluated.push(check.id);
    }
  }

  return {
    pass: checks.every((check) => check.status !== 'failed'),
    reasons,
    notEvaluated,
    checks,
  };
}
