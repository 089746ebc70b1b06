/**
 * SchemaLoader — Loads JSON Schema files from the file system.
 *
 * This module handles:
 * - Reading YAML and JSON schema files
 * - Checking basic structure and extracting $id
 *
 * It does NOT validate records (that's AjvValidator's job).
 */

import { readFile, readdir, stat } from 'node:fs/promises';
import { join, relative, extname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { parse as parseYaml } from 'yaml';
import { isJSONSchema, getSchemaId } from './json-schema.js';
import type {
  SchemaEntry,
  SchemaLoadResult,
  SchemaLoadAllResult,
  SchemaLoadOptions,
} from './types.js';

const SCHEMA_SUFFIXES = ['.schema.yaml', '.schema.json'];

/**
 * Directory holding the schemas bundled with the package.
 */
export const BUNDLED_SCHEMA_DIR = fileURLToPath(new URL('../../schema/', import.meta.url));

function isSchemaFile(filename: string): boolean {
  return SCHEMA_SUFFIXES.some(suffix => filename.endsWith(suffix));
}

function parseSchemaContent(content: string, filePath: string): unknown {
  if (extname(filePath).toLowerCase() === '.json') {
    return JSON.parse(content);
  }
  return parseYaml(content);
}

/**
 * Load a single schema file.
 *
 * @param filePath - Absolute path to the schema file
 * @param basePath - Base directory for computing relative paths
 */
export async function loadSchemaFile(
  filePath: string,
  basePath: string
): Promise<SchemaLoadResult> {
  try {
    const content = await readFile(filePath, 'utf-8');
    const parsed = parseSchemaContent(content, filePath);

    if (!isJSONSchema(parsed)) {
      return {
        success: false,
        error: `File does not contain a valid JSON Schema: ${filePath}`,
      };
    }

    const id = getSchemaId(parsed);
    if (id === undefined) {
      return {
        success: false,
        error: `Schema missing $id: ${filePath}`,
      };
    }

    return {
      success: true,
      entry: { id, path: relative(basePath, filePath), schema: parsed },
    };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return {
      success: false,
      error: `Failed to load schema ${filePath}: ${message}`,
    };
  }
}

async function findSchemaFiles(dirPath: string): Promise<string[]> {
  const entries = await readdir(dirPath, { withFileTypes: true });

  // readdir order is platform dependent
  return entries
    .filter(entry => entry.isFile() && isSchemaFile(entry.name))
    .map(entry => join(dirPath, entry.name))
    .sort();
}

/**
 * Load every *.schema.yaml and *.schema.json file directly inside a directory.
 */
export async function loadAllSchemas(
  options: SchemaLoadOptions
): Promise<SchemaLoadAllResult> {
  try {
    const stats = await stat(options.basePath);
    if (!stats.isDirectory()) {
      return {
        entries: [],
        errors: [{ path: options.basePath, error: 'Not a directory' }],
      };
    }
  } catch {
    return {
      entries: [],
      errors: [{ path: options.basePath, error: 'Directory does not exist' }],
    };
  }

  const filePaths = await findSchemaFiles(options.basePath);
  const entries: SchemaEntry[] = [];
  const errors: Array<{ path: string; error: string }> = [];

  for (const filePath of filePaths) {
    const result = await loadSchemaFile(filePath, options.basePath);

    if (result.success && result.entry !== undefined) {
      entries.push(result.entry);
    } else if (result.error !== undefined) {
      errors.push({
        path: relative(options.basePath, filePath),
        error: result.error,
      });
    }
  }

  return { entries, errors };
}
