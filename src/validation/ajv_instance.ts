/**
 * Ajv validation instance with schema validators
 */

import Ajv2020, { type ValidateFunction } from 'ajv/dist/2020.js';
import addFormats from 'ajv-formats';
import { getSnapshotSchema } from './schema_loader';
import type { SnapshotDocument } from '@/types/snapshot';

// Draft 2020-12
const ajv = new Ajv2020({
  allErrors: true,
  strict: true,
  strictTypes: true,
  strictTuples: true,
  allowUnionTypes: true,
});

// date, uri, ...
addFormats(ajv);

let snapshotValidator: ValidateFunction<SnapshotDocument> | null = null;

export function getSnapshotValidator(): ValidateFunction<SnapshotDocument> {
  if (!snapshotValidator) {
    snapshotValidator = ajv.compile<SnapshotDocument>(getSnapshotSchema());
  }
  return snapshotValidator;
}

export type ValidationResult<T> =
  | { valid: true; data: T; errors: null }
  | { valid: false; data: null; errors: string[] };

export class SnapshotValidationError extends Error {
  constructor(
    message: string,
    public readonly errors: string[]
  ) {
    super(message);
    this.name = 'SnapshotValidationError';
  }
}

export function validateSnapshotDocument(data: unknown): ValidationResult<SnapshotDocument> {
  const validate = getSnapshotValidator();

  if (validate(data)) {
    return { valid: true, data, errors: null };
  }

  const errors = validate.errors?.map(
    (e) => `${e.instancePath || 'root'}: ${e.message}`
  ) ?? ['Unknown validation error'];

  return { valid: false, data: null, errors };
}

export function validateSnapshotOrThrow(data: unknown, source: string = 'snapshot'): SnapshotDocument {
  const result = validateSnapshotDocument(data);
  if (!result.valid) {
    throw new SnapshotValidationError(
      `Snapshot validation failed for ${source}: ${result.errors.join('; ')}`,
      result.errors
    );
  }
  return result.data;
}
