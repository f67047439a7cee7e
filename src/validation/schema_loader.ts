/**
 * Schema loading utility
 */

import { readFileSync } from 'fs';
import { join } from 'path';
import { isRecord } from '@/utils/values';

export interface Schema {
  $schema: string;
  $id: string;
  [keyword: string]: unknown;
}

export type SchemaName = 'screen_run.v1' | 'fundamentals_bundle.v1' | 'company_overview.v1';

const schemaCache = new Map<string, Schema>();

export function getSchemasDir(projectRoot: string = process.cwd()): string {
  return join(projectRoot, 'schemas');
}

export function loadSchema(schemaName: SchemaName, schemasDir: string = getSchemasDir()): Schema {
  const cacheKey = join(schemasDir, schemaName);
  const cached = schemaCache.get(cacheKey);
  if (cached) return cached;

  const schemaPath = join(schemasDir, `${schemaName}.schema.json`);
  const parsed: unknown = JSON.parse(readFileSync(schemaPath, 'utf-8'));
  if (!isRecord(parsed) || typeof parsed.$schema !== 'string' || typeof parsed.$id !== 'string') {
    throw new Error(`Schema ${schemaPath} is missing $schema or $id`);
  }

  const schema: Schema = { ...parsed, $schema: parsed.$schema, $id: parsed.$id };
  schemaCache.set(cacheKey, schema);
  return schema;
}
