/**
 * Run Validation Script
 * Checks every stored screen run against the schema and the cross-field rules
 *
 * Usage: npx tsx scripts/validate_runs.ts
 */

import { existsSync, readdirSync, readFileSync } from 'fs';
import { join } from 'path';
import { getConfig } from '../src/core/config';
import { checkRunConsistency, validateScreenRunRecord } from '../src/run/validator';

const config = getConfig();
const runsDir = join(config.projectRoot, 'data', 'runs');

if (!existsSync(runsDir)) {
  console.log(`No runs directory at ${runsDir}`);
} else {
  const files = readdirSync(runsDir)
    .filter((f) => f.endsWith('.json'))
    .sort();
  let failures = 0;

  for (const file of files) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(join(runsDir, file), 'utf-8'));
    } catch (error) {
      failures++;
      console.log(`✗ ${file}`);
      console.log(`  Error: ${error instanceof Error ? error.message : String(error)}`);
      continue;
    }

    const result = validateScreenRunRecord(parsed, config.schemasDir);
    if (!result.data) {
      failures++;
      console.log(`✗ ${file}`);
      for (const message of result.errors ?? []) console.log(`  ${message}`);
      continue;
    }

    const consistency = checkRunConsistency(result.data);
    if (!consistency.passed) {
      failures++;
      console.log(`✗ ${file}`);
      for (const issue of consistency.issues) console.log(`  ${issue}`);
      continue;
    }

    console.log(`✓ ${file}`);
  }

  if (failures > 0) {
    console.log(`\n${failures} of ${files.length} runs FAILED validation`);
    process.exitCode = 1;
  } else {
    console.log(`\nAll ${files.length} runs validated successfully`);
  }
}
