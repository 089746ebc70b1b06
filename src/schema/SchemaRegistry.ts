/**
 * SchemaRegistry — Maps each record kind to its schema and validates records.
 *
 * The table from kind to schema $id is static and built in one place
 * (RECORD_SCHEMA_IDS). A registry is constructed once per process and passed
 * to whatever needs schema lookup; there is no global instance.
 */

import type { ValidateFunction } from 'ajv';
import { AjvValidator, convertAjvError } from '../validation/AjvValidator.js';
import { ValidationError } from '../core/errors.js';
import type { RecordKind, RecordTypes } from '../model/types.js';
import { systemClock, type Clock } from '../types/common.js';
import { BUNDLED_SCHEMA_DIR, loadAllSchemas } from './SchemaLoader.js';
import type { SchemaEntry } from './types.js';

const SCHEMA_BASE = 'https://kbmd.local/schema/';

export const RECORD_SCHEMA_IDS: { readonly [K in RecordKind]: string } = {
  dataset: `${SCHEMA_BASE}dataset.schema.yaml`,
  project: `${SCHEMA_BASE}project.schema.yaml`,
  index: `${SCHEMA_BASE}index.schema.yaml`,
  'knowledgebase-config': `${SCHEMA_BASE}knowledgebase-config.schema.yaml`,
};

/**
 * Timestamps that default to the current time when a record omits them.
 * Filled from the registry's clock before Ajv runs; nothing is written back.
 */
export const TIMESTAMP_DEFAULTS: { readonly [K in RecordKind]: ReadonlyArray<keyof RecordTypes[K]> } = {
  dataset: ['date_added'],
  project: ['date_added'],
  index: ['last_updated'],
  'knowledgebase-config': ['created'],
};

export interface SchemaRegistryOptions {
  validator?: AjvValidator;
  /** Source of timestamp defaults (default: system clock) */
  clock?: Clock;
}

type ValidatorTable = { [K in RecordKind]: ValidateFunction<RecordTypes[K]> };

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class SchemaRegistry {
  private readonly validators: ValidatorTable;
  private readonly clock: Clock;

  constructor(entries: SchemaEntry[], options: SchemaRegistryOptions = {}) {
    const validator = options.validator ?? new AjvValidator();
    this.clock = options.clock ?? systemClock;

    for (const entry of entries) {
      validator.addSchema(entry.schema);
    }

    for (const [kind, id] of Object.entries(RECORD_SCHEMA_IDS)) {
      if (!validator.hasSchema(id)) {
        throw new Error(`No schema registered for record kind '${kind}' (${id})`);
      }
    }

    this.validators = {
      dataset: validator.getValidator<RecordTypes['dataset']>(RECORD_SCHEMA_IDS.dataset),
      project: validator.getValidator<RecordTypes['project']>(RECORD_SCHEMA_IDS.project),
      index: validator.getValidator<RecordTypes['index']>(RECORD_SCHEMA_IDS.index),
      'knowledgebase-config': validator.getValidator<RecordTypes['knowledgebase-config']>(
        RECORD_SCHEMA_IDS['knowledgebase-config']
      ),
    };
  }

  /**
   * Load the schemas in `schemaDir` (the bundled ones by default) and build
   * a registry over them. Any unreadable schema file is fatal.
   */
  static async load(
    schemaDir: string = BUNDLED_SCHEMA_DIR,
    options: SchemaRegistryOptions = {}
  ): Promise<SchemaRegistry> {
    const { entries, errors } = await loadAllSchemas({ basePath: schemaDir });
    if (errors.length > 0) {
      const details = errors.map(e => `${e.path}: ${e.error}`).join('; ');
      throw new Error(`Failed to load schemas from ${schemaDir}: ${details}`);
    }
    return new SchemaRegistry(entries, options);
  }

  getSchemaId(kind: RecordKind): string {
    return RECORD_SCHEMA_IDS[kind];
  }

  /**
   * Check `data` against the schema for `kind` and return it typed.
   *
   * Omitted optional lists and flags are filled with their schema defaults
   * in place, and omitted TIMESTAMP_DEFAULTS fields with the clock's time.
   *
   * @param location - Reported in the ValidationError (usually a file path)
   * @throws ValidationError
   */
  parse<K extends RecordKind>(kind: K, data: unknown, location: string): RecordTypes[K] {
    if (isPlainObject(data)) {
      for (const field of TIMESTAMP_DEFAULTS[kind]) {
        if (data[String(field)] === undefined) {
          data[String(field)] = this.clock().toISOString();
        }
      }
    }

    const validate: ValidateFunction<RecordTypes[K]> = this.validators[kind];
    if (validate(data)) {
      return data;
    }
    throw new ValidationError(location, (validate.errors ?? []).map(convertAjvError));
  }
}
