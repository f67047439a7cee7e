/**
 * Creates the screen history database under the configured project root,
 * applies migrations and reports what the history already holds.
 *
 * Usage: npx tsx scripts/init_db.ts
 */

import { getConfig } from '../src/core/config';
import { closeDatabase, getDatabase } from '../src/data/db';
import { getLatestScreenRun } from '../src/data/repositories/verdict_repo';

const config = getConfig();

try {
  const db = getDatabase(config.projectRoot);
  console.log(`Database ready at ${db.name}`);

  const latest = getLatestScreenRun(db);
  if (latest) {
    console.log(
      `Latest run: ${latest.runId} (${latest.generatedAt}), ${latest.symbolCount} symbols, ${latest.pickCount} picks${latest.halted ? ', halted' : ''}`
    );
  } else {
    console.log('No screen runs recorded yet');
  }
} catch (error) {
  console.error('Database initialization failed:', error);
  process.exitCode = 1;
} finally {
  closeDatabase();
}
