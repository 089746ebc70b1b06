/**
 * AjvValidator — Structural validation using Ajv.
 *
 * RULES:
 * - Ajv is the single authority for structural validation
 * - Configure Ajv ONCE at construction time (formats/options)
 * - DO NOT depend on Ajv private/internal fields
 *
 * This module:
 * - Wraps Ajv with a small interface
 * - Compiles type guards for registered schemas
 * - Converts Ajv errors to ValidationIssue
 * - Fills schema defaults into the validated data (useDefaults)
 */

import Ajv2020 from 'ajv/dist/2020.js';
import type { ErrorObject, ValidateFunction, AnySchema } from 'ajv';
import addFormats from 'ajv-formats';
import type { ValidationIssue } from '../types/common.js';
import type { ValidatorOptions } from './types.js';

const DEFAULT_OPTIONS: Required<ValidatorOptions> = {
  strict: true,
  addFormats: true,
  useDefaults: true,
};

/**
 * Convert an Ajv ErrorObject to a ValidationIssue.
 */
export function convertAjvError(error: ErrorObject): ValidationIssue {
  const path = error.instancePath || '/';
  let message = error.message ?? 'Validation failed';

  switch (error.keyword) {
    case 'required':
      if ('missingProperty' in error.params) {
        message = `Missing required property: ${String(error.params.missingProperty)}`;
      }
      break;
    case 'type':
      if ('type' in error.params) {
        message = `Expected type: ${String(error.params.type)}`;
      }
      break;
    case 'enum':
      if ('allowedValues' in error.params && Array.isArray(error.params.allowedValues)) {
        message = `Must be one of: ${error.params.allowedValues.join(', ')}`;
      }
      break;
    case 'minimum':
      if ('limit' in error.params) {
        message = `Must be >= ${String(error.params.limit)}`;
      }
      break;
    case 'format':
      if ('format' in error.params) {
        message = `Invalid format: expected ${String(error.params.format)}`;
      }
      break;
  }

  return {
    path,
    message,
    keyword: error.keyword,
    params: { ...error.params },
  };
}

/**
 * AjvValidator — Ajv-based structural validator.
 */
export class AjvValidator {
  private readonly ajv: Ajv2020;

  /**
   * IMPORTANT: Ajv is configured ONCE at construction time.
   */
  constructor(options: ValidatorOptions = {}) {
    const opts = { ...DEFAULT_OPTIONS, ...options };

    this.ajv = new Ajv2020({
      strict: opts.strict,
      useDefaults: opts.useDefaults,
      allErrors: true,
    });

    if (opts.addFormats) {
      addFormats(this.ajv);
    }
  }

  /**
   * Add a schema to the validator (keyed by its $id).
   */
  addSchema(schema: AnySchema): void {
    this.ajv.addSchema(schema);
  }

  hasSchema(id: string): boolean {
    return this.ajv.getSchema(id) !== undefined;
  }

  /**
   * Compile a type guard for a registered schema.
   *
   * The caller names the type the schema describes; keeping the two in
   * step is the caller's job.
   */
  getValidator<T>(id: string): ValidateFunction<T> {
    return this.ajv.compile<T>({ $ref: id });
  }
}
