/**
 * Run Writer
 * Saves screen run records to disk and to the SQLite history
 */

import { existsSync, mkdirSync, writeFileSync } from 'fs';
import { join } from 'path';
import type { Db } from '@/data/db';
import { replaceVerdicts, upsertScreenRun, type VerdictRow } from '@/data/repositories/verdict_repo';
import { contentHash } from '@/core/seed';
import type { ScreenRun } from '@/types/screen_run';
import { createChildLogger } from '@/utils/logger';

const logger = createChildLogger('run_writer');

export interface WriteTarget {
  /** Root data directory; records land in `<dataDir>/runs`. */
  dataDir: string;
  db: Db;
}

export interface WriteResult {
  runId: string;
  filePath: string;
  contentHash: string;
  verdictCount: number;
}

export function toVerdictRows(run: ScreenRun): VerdictRow[] {
  const runDate = run.generated_at.slice(0, 10);
  return run.sectors.flatMap((sector) =>
    sector.results.map((result) => ({
      runId: run.run_id,
      runDate,
      sector: sector.sector,
      symbol: result.symbol,
      status: result.status,
      price: result.price?.price ?? null,
      roic: result.metrics.roic,
      roe: result.metrics.roe,
      fcfMargin: result.metrics.fcfMargin,
      netDebt: result.metrics.netDebt,
      upsidePct: result.valuation.upsidePct,
      pass: result.verdict.pass,
      reasons: result.verdict.reasons,
    }))
  );
}

export function writeScreenRun(run: ScreenRun, target: WriteTarget): WriteResult {
  const runsDir = join(target.dataDir, 'runs');

  // Ensure directory exists
  if (!existsSync(runsDir)) {
    mkdirSync(runsDir, { recursive: true });
  }

  const filePath = join(runsDir, `${run.run_id}.json`);
  const hash = contentHash(run);

  writeFileSync(filePath, JSON.stringify(run, null, 2), 'utf-8');
  logger.info({ runId: run.run_id, filePath }, 'Screen run written');

  const verdicts = toVerdictRows(run);
  upsertScreenRun(target.db, {
    runId: run.run_id,
    generatedAt: run.generated_at,
    filePath,
    contentHash: hash,
    sectorCount: run.sectors.length,
    symbolCount: verdicts.length,
    pickCount: run.sectors.reduce((n, s) => n + s.picks.length, 0),
    halted: run.halted,
    haltReason: run.halt_reason,
    requestCount: run.request_count,
  });
  replaceVerdicts(target.db, run.run_id, verdicts);

  return {
    runId: run.run_id,
    filePath,
    contentHash: hash,
    verdictCount: verdicts.length,
  };
}
