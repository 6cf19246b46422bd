/**
 * Schema loading utility
 */

import { readFileSync } from 'fs';
import { join } from 'path';
import type { SchemaObject } from 'ajv';

const schemaCache = new Map<string, SchemaObject>();

function isSchemaObject(value: unknown): value is SchemaObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function loadSchema(schemaName: string, projectRoot: string = process.cwd()): SchemaObject {
  const schemaPath = join(projectRoot, 'schemas', `${schemaName}.schema.json`);
  const cached = schemaCache.get(schemaPath);
  if (cached) {
    return cached;
  }

  const parsed: unknown = JSON.parse(readFileSync(schemaPath, 'utf-8'));
  if (!isSchemaObject(parsed)) {
    throw new Error(`schema_invalid: ${schemaPath}`);
  }

  schemaCache.set(schemaPath, parsed);
  return parsed;
}

export function getEngineResultSchema(): SchemaObject {
  return loadSchema('engine_result.v1');
}
