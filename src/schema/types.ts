/**
 * Types for schema loading.
 */

import type { JSONSchema } from './json-schema.js';

/**
 * Represents a loaded schema with its metadata.
 */
export interface SchemaEntry {
  /** The schema's $id URI (canonical identifier) */
  id: string;
  /** The schema's file path (relative to schema root) */
  path: string;
  /** The parsed schema object */
  schema: JSONSchema;
}

/**
 * Result of loading a single schema file.
 */
export interface SchemaLoadResult {
  success: boolean;
  entry?: SchemaEntry;
  error?: string;
}

/**
 * Result of loading all schemas from a directory.
 */
export interface SchemaLoadAllResult {
  /** Schemas that loaded successfully */
  entries: SchemaEntry[];
  /** Errors encountered during loading */
  errors: Array<{ path: string; error: string }>;
}

/**
 * Options for schema loading.
 */
export interface SchemaLoadOptions {
  /** Directory to read schemas from */
  basePath: string;
}
