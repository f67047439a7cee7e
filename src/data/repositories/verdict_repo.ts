/**
 * Screen run index and verdict history.
 * Every function takes the database handle explicitly.
 */

import type { Db } from '../db';
import { toError } from '@/core/errors';
import { createChildLogger } from '@/utils/logger';
import { normalizeSymbol } from '@/utils/values';

const logger = createChildLogger('verdict_repo');

export interface ScreenRunIndexEntry {
  runId: string;
  generatedAt: string;
  filePath: string;
  contentHash: string;
  sectorCount: number;
  symbolCount: number;
  pickCount: number;
  halted: boolean;
  haltReason: string | null;
  requestCount: number;
}

export interface VerdictRow {
  runId: string;
  runDate: string;
  sector: string;
  symbol: string;
  status: string;
  price: number | null;
  roic: number | null;
  roe: number | null;
  fcfMargin: number | null;
  netDebt: number | null;
  upsidePct: number | null;
  pass: boolean;
  reasons: string[];
}

interface ScreenRunRow {
  run_id: string;
  generated_at: string;
  file_path: string;
  content_hash: string;
  sector_count: number;
  symbol_count: number;
  pick_count: number;
  halted: number;
  halt_reason: string | null;
  request_count: number;
}

interface VerdictHistoryRow {
  run_id: string;
  run_date: string;
  sector: string;
  symbol: string;
  status: string;
  price: number | null;
  roic: number | null;
  roe: number | null;
  fcf_margin: number | null;
  net_debt: number | null;
  upside_pct: number | null;
  pass: number;
  reasons: string;
}

function parseReasons(raw: string): string[] {
  try {
    const parsed: unknown = JSON.parse(raw);
    return Array.isArray(parsed) ? parsed.filter((r): r is string => typeof r === 'string') : [];
  } catch (error) {
    logger.warn({ error: toError(error).message }, 'Unreadable reasons column');
    return [];
  }
}

function toIndexEntry(row: ScreenRunRow): ScreenRunIndexEntry {
  return {
    runId: row.run_id,
    generatedAt: row.generated_at,
    filePath: row.file_path,
    contentHash: row.content_hash,
    sectorCount: row.sector_count,
    symbolCount: row.symbol_count,
    pickCount: row.pick_count,
    halted: row.halted === 1,
    haltReason: row.halt_reason,
    requestCount: row.request_count,
  };
}

function toVerdictRow(row: VerdictHistoryRow): VerdictRow {
  return {
    runId: row.run_id,
    runDate: row.run_date,
    sector: row.sector,
    symbol: row.symbol,
    status: row.status,
    price: row.price,
    roic: row.roic,
    roe: row.roe,
    fcfMargin: row.fcf_margin,
    netDebt: row.net_debt,
    upsidePct: row.upside_pct,
    pass: row.pass === 1,
    reasons: parseReasons(row.reasons),
  };
}

export function upsertScreenRun(db: Db, entry: ScreenRunIndexEntry): void {
  db.prepare(
    `
    INSERT INTO screen_runs (
      run_id, generated_at, file_path, content_hash,
      sector_count, symbol_count, pick_count, halted, halt_reason, request_count
    ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    ON CONFLICT(run_id) DO UPDATE SET
      generated_at = excluded.generated_at,
      file_path = excluded.file_path,
      content_hash = excluded.content_hash,
      sector_count = excluded.sector_count,
      symbol_count = excluded.symbol_count,
      pick_count = excluded.pick_count,
      halted = excluded.halted,
      halt_reason = excluded.halt_reason,
      request_count = excluded.request_count
  `
  ).run(
    entry.runId,
    entry.generatedAt,
    entry.filePath,
    entry.contentHash,
    entry.sectorCount,
    entry.symbolCount,
    entry.pickCount,
    entry.halted ? 1 : 0,
    entry.haltReason,
    entry.requestCount
  );
}

/** Replaces all verdict rows of a run (re-runs overwrite). */
export function replaceVerdicts(db: Db, runId: string, rows: VerdictRow[]): void {
  const deleteStmt = db.prepare('DELETE FROM verdict_history WHERE run_id = ?');
  const insertStmt = db.prepare(`
    INSERT INTO verdict_history (
      run_id, run_date, sector, symbol, status, price,
      roic, roe, fcf_margin, net_debt, upside_pct, pass, reasons
    ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
  `);

  const replaceAll = db.transaction((items: VerdictRow[]) => {
    deleteStmt.run(runId);
    for (const row of items) {
      insertStmt.run(
        runId,
        row.runDate,
        row.sector,
        row.symbol,
        row.status,
        row.price,
        row.roic,
        row.roe,
        row.fcfMargin,
        row.netDebt,
        row.upsidePct,
        row.pass ? 1 : 0,
        JSON.stringify(row.reasons)
      );
    }
  });

  replaceAll(rows);
  logger.debug({ runId, count: rows.length }, 'Verdicts saved to history');
}

export function getLatestScreenRun(db: Db): ScreenRunIndexEntry | null {
  const row = db
    .prepare<[], ScreenRunRow>(
      'SELECT * FROM screen_runs ORDER BY generated_at DESC, run_id DESC LIMIT 1'
    )
    .get();
  return row ? toIndexEntry(row) : null;
}

export function getVerdictHistory(db: Db, symbol: string, limit: number = 20): VerdictRow[] {
  return db
    .prepare<[string, number], VerdictHistoryRow>(
      `
      SELECT run_id, run_date, sector, symbol, status, price,
             roic, roe, fcf_margin, net_debt, upside_pct, pass, reasons
      FROM verdict_history
      WHERE symbol = ?
      ORDER BY run_date DESC, run_id DESC
      LIMIT ?
    `
    )
    .all(normalizeSymbol(symbol), limit)
    .map(toVerdictRow);
}
