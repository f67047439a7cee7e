/**
 * SQLite database initialization and management
 * Uses better-sqlite3 for synchronous operations
 */

import Database from 'better-sqlite3';
import { existsSync, mkdirSync, readdirSync, readFileSync } from 'fs';
import { dirname, join } from 'path';
import { createChildLogger } from '@/utils/logger';

const logger = createChildLogger('db');

export type Db = Database.Database;

let db: Db | null = null;

export function getDefaultDbPath(projectRoot: string = process.cwd()): string {
  return join(projectRoot, 'data', 'screener.db');
}

export function getMigrationsDir(projectRoot: string = process.cwd()): string {
  return join(projectRoot, 'src', 'data', 'migrations');
}

/** Opens a database file, enables WAL and applies migrations. */
export function openDatabase(
  dbPath: string,
  migrationsDir: string = getMigrationsDir()
): Db {
  const dir = dirname(dbPath);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }

  const isNew = !existsSync(dbPath);
  logger.info({ dbPath, isNew }, 'Initializing database');

  const database = new Database(dbPath);

  // Enable WAL mode for better concurrency
  database.pragma('journal_mode = WAL');

  // Run migrations (idempotent)
  runMigrations(database, migrationsDir);

  return database;
}

function runMigrations(database: Db, migrationsDir: string): void {
  if (!existsSync(migrationsDir)) {
    logger.warn({ migrationsDir }, 'Migrations directory not found');
    return;
  }

  const files = readdirSync(migrationsDir)
    .filter((f) => f.endsWith('.sql'))
    .sort();

  logger.debug({ migrationsDir, files }, 'Running database migrations');

  for (const file of files) {
    const sql = readFileSync(join(migrationsDir, file), 'utf-8');
    database.exec(sql);
  }
}

/** Shared handle for the CLI; the first call fixes the project root. */
export function getDatabase(projectRoot: string = process.cwd()): Db {
  if (!db) {
    db = openDatabase(getDefaultDbPath(projectRoot), getMigrationsDir(projectRoot));
  }
  return db;
}

export function closeDatabase(): void {
  if (db) {
    db.close();
    db = null;
    logger.info('Database connection closed');
  }
}
