/**
 * Ajv validation instances with schema validators
 * Persisted payloads (cache entries, run records) are checked against the
 * JSON Schemas in the project's `schemas/` directory. Each schemas directory
 * gets its own Ajv instance, since the schemas register themselves by `$id`.
 */

import Ajv2020, { type ValidateFunction } from 'ajv/dist/2020';
import addFormats from 'ajv-formats';
import { getSchemasDir, loadSchema } from './schema_loader';
import type { CompanyOverview, FundamentalsBundle } from '@/types/fundamentals';
import type { ScreenRun } from '@/types/screen_run';

export interface ValidationResult<T> {
  valid: boolean;
  data: T | null;
  errors: string[] | null;
}

export interface SchemaValidators {
  isCompanyOverview: (data: unknown) => data is CompanyOverview;
  isFundamentalsBundle: (data: unknown) => data is FundamentalsBundle;
  validateScreenRun: (data: unknown) => ValidationResult<ScreenRun>;
}

const validatorsByDir = new Map<string, SchemaValidators>();

function createAjv(): Ajv2020 {
  const ajv = new Ajv2020({
    allErrors: true,
    strict: true,
    strictTypes: true,
    strictTuples: true,
    allowUnionTypes: true,
  });
  // Add format validators (date, date-time, ...)
  addFormats(ajv);
  return ajv;
}

function runValidator<T>(validate: ValidateFunction<T>, data: unknown): ValidationResult<T> {
  if (validate(data)) {
    return { valid: true, data, errors: null };
  }

  const errors = validate.errors?.map(
    (e) => `${e.instancePath || 'root'}: ${e.message}`
  ) ?? ['Unknown validation error'];

  return { valid: false, data: null, errors };
}

/**
 * Validators compile on first use, so a missing or broken schema file
 * surfaces as a throw from the validator call rather than from here.
 */
export function getSchemaValidators(schemasDir: string = getSchemasDir()): SchemaValidators {
  const existing = validatorsByDir.get(schemasDir);
  if (existing) return existing;

  const ajv = createAjv();
  let overviewValidator: ValidateFunction<CompanyOverview> | null = null;
  let bundleValidator: ValidateFunction<FundamentalsBundle> | null = null;
  let screenRunValidator: ValidateFunction<ScreenRun> | null = null;

  const overview = (): ValidateFunction<CompanyOverview> => {
    if (!overviewValidator) {
      overviewValidator = ajv.compile<CompanyOverview>(
        loadSchema('company_overview.v1', schemasDir)
      );
    }
    return overviewValidator;
  };

  const bundle = (): ValidateFunction<FundamentalsBundle> => {
    if (!bundleValidator) {
      // The bundle schema references the overview schema by $id.
      overview();
      bundleValidator = ajv.compile<FundamentalsBundle>(
        loadSchema('fundamentals_bundle.v1', schemasDir)
      );
    }
    return bundleValidator;
  };

  const screenRun = (): ValidateFunction<ScreenRun> => {
    if (!screenRunValidator) {
      screenRunValidator = ajv.compile<ScreenRun>(loadSchema('screen_run.v1', schemasDir));
    }
    return screenRunValidator;
  };

  const validators: SchemaValidators = {
    isCompanyOverview: (data: unknown): data is CompanyOverview => overview()(data),
    isFundamentalsBundle: (data: unknown): data is FundamentalsBundle => bundle()(data),
    validateScreenRun: (data: unknown) => runValidator(screenRun(), data),
  };
  validatorsByDir.set(schemasDir, validators);
  return validators;
}
