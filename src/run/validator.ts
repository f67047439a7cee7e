/**
 * Run Validator
 * Validates screen run records against the schema
 */

import { RunValidationError } from '@/core/errors';
import type { ScreenRun } from '@/types/screen_run';
import { createChildLogger } from '@/utils/logger';
import { getSchemaValidators, type ValidationResult } from '@/validation/ajv_instance';

const logger = createChildLogger('run_validator');

export function validateScreenRunRecord(
  data: unknown,
  schemasDir?: string
): ValidationResult<ScreenRun> {
  const result = getSchemaValidators(schemasDir).validateScreenRun(data);

  if (!result.valid) {
    logger.error({ errors: result.errors }, 'Screen run validation failed');
  } else {
    logger.debug('Screen run validation passed');
  }

  return result;
}

export function validateAndThrow(data: unknown, schemasDir?: string): ScreenRun {
  const result = getSchemaValidators(schemasDir).validateScreenRun(data);
  if (!result.data) {
    throw new RunValidationError(result.errors ?? ['Unknown error']);
  }
  return result.data;
}

export interface ConsistencyCheck {
  passed: boolean;
  issues: string[];
}

/** Cross-field checks the schema cannot express. */
export function checkRunConsistency(run: ScreenRun): ConsistencyCheck {
  const issues: string[] = [];

  for (const sector of run.sectors) {
    const passing = new Set(
      sector.results.filter((r) => r.verdict.pass).map((r) => r.symbol)
    );
    for (const pick of sector.picks) {
      if (!passing.has(pick)) {
        issues.push(`${sector.sector}: pick ${pick} did not pass the gate`);
      }
    }

    for (const result of sector.results) {
      if (result.verdict.pass !== (result.verdict.reasons.length === 0)) {
        issues.push(`${sector.sector}: ${result.symbol} pass/reasons mismatch`);
      }
    }
  }

  if (run.halted && run.halt_reason === null) {
    issues.push('Run is halted without a halt reason');
  }

  return {
    passed: issues.length === 0,
    issues,
  };
}
