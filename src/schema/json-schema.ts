/**
 * JSON Schema helpers.
 *
 * Schemas are handed straight to Ajv, so Ajv's own schema object type is
 * used rather than a parallel definition.
 */

import type { SchemaObject } from 'ajv';

export type JSONSchema = SchemaObject;

const SCHEMA_KEYWORDS = [
  '$schema', '$id', '$ref', '$defs', 'type', 'properties', 'items',
  'allOf', 'anyOf', 'oneOf', 'not', 'const', 'enum', 'title', 'description',
];

/**
 * Check if a value looks like a JSON Schema object.
 */
export function isJSONSchema(value: unknown): value is JSONSchema {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return false;
  }
  return SCHEMA_KEYWORDS.some(key => key in value);
}

/**
 * Extract the $id from a schema, or undefined if not present.
 */
export function getSchemaId(schema: JSONSchema): string | undefined {
  return typeof schema.$id === 'string' ? schema.$id : undefined;
}
