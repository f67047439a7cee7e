/**
 * Screen Run Script
 * Discovers candidates, screens them and writes the run record.
 *
 * Usage:
 *   npx tsx scripts/run_screen.ts --sectors=Energy,Health --names=5 --stack=10
 *   npx tsx scripts/run_screen.ts XOM CVX --no-cache
 */

import dotenv from 'dotenv';
import { join, resolve } from 'path';

// Load .env.local first, then fall back to .env
dotenv.config({ path: resolve(process.cwd(), '.env.local') });
dotenv.config();

import { getConfig } from '../src/core/config';
import { createScreenContext } from '../src/core/context';
import { getEnvConfig } from '../src/core/env';
import { closeDatabase, getDatabase } from '../src/data/db';
import { buildScreenRun } from '../src/run/builder';
import { parseScreenArgs } from '../src/run/cli_args';
import { checkRunConsistency } from '../src/run/validator';
import { writeScreenRun } from '../src/run/writer';
import type { ScreenRun } from '../src/types/screen_run';
import { createChildLogger } from '../src/utils/logger';

const logger = createChildLogger('run_screen');

function formatUpside(value: number | null): string {
  return value === null ? '-' : `${value.toFixed(1)}%`;
}

function printSummary(run: ScreenRun): void {
  console.log('\n' + '='.repeat(50));
  console.log(`Run ID:        ${run.run_id}`);
  console.log(`Requests:      ${run.request_count}`);
  if (run.halted) {
    console.log(`Halted:        ${run.halt_reason ?? 'throttled'}`);
  }

  for (const sector of run.sectors) {
    console.log(`\n${sector.sector} (${sector.universe_source}, ${sector.candidates.length} candidates)`);
    for (const result of sector.results) {
      const flag = result.verdict.pass ? 'PASS' : 'FAIL';
      const reasons = result.verdict.reasons.join('; ');
      console.log(
        `  ${result.symbol.padEnd(6)} ${flag}  ${formatUpside(result.valuation.upsidePct).padStart(8)}  ${reasons}`
      );
    }
    console.log(`  Picks: ${sector.picks.length > 0 ? sector.picks.join(', ') : '-'}`);
  }
  console.log('='.repeat(50) + '\n');
}

async function main() {
  const args = parseScreenArgs(process.argv.slice(2));
  const config = getConfig();
  const env = getEnvConfig();
  const ctx = createScreenContext(config, env, { useCache: args.useCache });

  logger.info({ request: args.request, useCache: args.useCache }, 'Starting screen run');

  try {
    const run = await buildScreenRun(ctx, args.request);

    const consistency = checkRunConsistency(run);
    if (!consistency.passed) {
      logger.warn({ issues: consistency.issues }, 'Run consistency issues');
    }

    if (args.write) {
      const result = writeScreenRun(run, {
        dataDir: join(config.projectRoot, 'data'),
        db: getDatabase(config.projectRoot),
      });
      console.log(`Output: ${result.filePath}`);
    }

    printSummary(run);
    if (run.halted) {
      process.exitCode = 2;
    }
  } catch (error) {
    logger.error({ error }, 'Screen run failed');
    console.error('Screen run failed:', error);
    process.exitCode = 1;
  } finally {
    closeDatabase();
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
