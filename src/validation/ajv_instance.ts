/**
 * Ajv validation for cached engine results
 * The JSON schema is the contract external caches round-trip against.
 */

import Ajv2020, { type ValidateFunction } from 'ajv/dist/2020';
import addFormats from 'ajv-formats';
import type { EngineResult } from '@/types/trends';
import { getEngineResultSchema } from './schema_loader';

// Draft 2020-12
const ajv = new Ajv2020({
  allErrors: true,
  strict: true,
  strictTypes: true,
  strictTuples: true,
  allowUnionTypes: true,
});

// date format for as_of
addFormats(ajv);

let engineResultValidator: ValidateFunction<EngineResult> | null = null;

export function getEngineResultValidator(): ValidateFunction<EngineResult> {
  if (!engineResultValidator) {
    engineResultValidator = ajv.compile<EngineResult>(getEngineResultSchema());
  }
  return engineResultValidator;
}

export interface ValidationResult<T> {
  valid: boolean;
  data: T | null;
  errors: string[] | null;
}

export function validateEngineResult(data: unknown): ValidationResult<EngineResult> {
  const validate = getEngineResultValidator();

  if (validate(data)) {
    return { valid: true, data, errors: null };
  }

  const errors = validate.errors?.map(
    (e) => `${e.instancePath || 'root'}: ${e.message}`
  ) ?? ['Unknown validation error'];

  return { valid: false, data: null, errors };
}

/** Parses and validates a cached result string. */
export function parseCachedResult(json: string): ValidationResult<EngineResult> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    return { valid: false, data: null, errors: [`invalid_json: ${detail}`] };
  }
  return validateEngineResult(parsed);
}
