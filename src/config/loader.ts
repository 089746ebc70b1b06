/**
 * Configuration loader for the per-user kbmd configuration.
 *
 * Resolution:
 * - File: ${KBMD_CONFIG_PATH} or ~/.kbmd_config.json
 * - Schema version: ${KBMD_SCHEMA_VERSION} or "001"
 *
 * A missing file is not an error: the default configuration is written
 * in its place.
 */

import { readFile, writeFile, mkdir } from 'node:fs/promises';
import { homedir } from 'node:os';
import { dirname, join, resolve } from 'node:path';
import type { ZodError } from 'zod';
import { KnowledgebaseError, StorageError } from '../core/errors.js';
import {
  CONFIG_PATH_ENV,
  CONFIG_SCHEMAS,
  DEFAULT_CONFIG_FILENAME,
  DEFAULT_SCHEMA_VERSION,
  SCHEMA_VERSION_ENV,
  type ConfigEnv,
  type UserConfig,
} from './types.js';

/**
 * Config validation error.
 */
export class ConfigValidationError extends KnowledgebaseError {
  constructor(
    message: string,
    public readonly path: string,
    public readonly value: unknown
  ) {
    super(`Config validation error at '${path}': ${message}`, 'CONFIG_INVALID');
    this.name = 'ConfigValidationError';
  }
}

export function getConfigPath(env: ConfigEnv = process.env): string {
  const override = env[CONFIG_PATH_ENV];
  return override ? resolve(override) : join(homedir(), DEFAULT_CONFIG_FILENAME);
}

export function getSchemaVersion(env: ConfigEnv = process.env): string {
  return env[SCHEMA_VERSION_ENV] || DEFAULT_SCHEMA_VERSION;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function fromZodError(error: ZodError, value: unknown): ConfigValidationError {
  const [issue] = error.issues;
  const path = issue && issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return new ConfigValidationError(issue?.message ?? 'invalid configuration', path, value);
}

function schemaFor(version: string): (typeof CONFIG_SCHEMAS)[string] {
  const schema = CONFIG_SCHEMAS[version];
  if (!schema) {
    throw new ConfigValidationError(`Unsupported schema version: ${version}`, 'schema_version', version);
  }
  return schema;
}

/**
 * Configuration for the current environment with no knowledgebases.
 */
export function defaultUserConfig(env: ConfigEnv = process.env): UserConfig {
  const version = getSchemaVersion(env);
  const parsed = schemaFor(version).safeParse({ schema_version: version, config_path: getConfigPath(env) });
  if (!parsed.success) {
    throw fromZodError(parsed.error, version);
  }
  return parsed.data;
}

export async function writeUserConfig(config: UserConfig): Promise<void> {
  try {
    await mkdir(dirname(config.config_path), { recursive: true });
    await writeFile(config.config_path, JSON.stringify(config, null, 2) + '\n', 'utf-8');
  } catch (err) {
    throw new StorageError(config.config_path, 'write', err);
  }
}

/**
 * Load the user configuration, creating it when absent.
 *
 * @throws ConfigValidationError for an unknown schema version or a file
 *         that does not match its schema
 */
export async function loadUserConfig(env: ConfigEnv = process.env): Promise<UserConfig> {
  const version = getSchemaVersion(env);
  const configPath = getConfigPath(env);
  const schema = schemaFor(version);

  let content: string;
  try {
    content = await readFile(configPath, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      console.warn(
        `Configuration file not found at ${configPath}, continuing with default configuration of schema ${version}.`
      );
      const config = defaultUserConfig(env);
      await writeUserConfig(config);
      return config;
    }
    throw new StorageError(configPath, 'read', err);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    throw new ConfigValidationError(err instanceof Error ? err.message : 'invalid JSON', '(root)', content);
  }
  if (!isPlainObject(raw)) {
    throw new ConfigValidationError('must be an object', '(root)', raw);
  }

  const parsed = schema.safeParse({ schema_version: version, ...raw, config_path: configPath });
  if (!parsed.success) {
    throw fromZodError(parsed.error, raw);
  }
  return parsed.data;
}

/**
 * Record a knowledgebase in the user configuration and save it.
 */
export async function registerKnowledgebase(
  name: string,
  root: string,
  env: ConfigEnv = process.env
): Promise<UserConfig> {
  const config = await loadUserConfig(env);
  const updated: UserConfig = { ...config, kbs: { ...config.kbs, [name]: root } };
  await writeUserConfig(updated);
  return updated;
}
