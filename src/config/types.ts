/**
 * Configuration types for the per-user kbmd configuration file.
 *
 * The file lists the knowledgebases this user has created. Each schema
 * version has its own zod schema, registered in CONFIG_SCHEMAS.
 */

import { z } from 'zod';

export const CONFIG_PATH_ENV = 'KBMD_CONFIG_PATH';
export const SCHEMA_VERSION_ENV = 'KBMD_SCHEMA_VERSION';
export const DEFAULT_SCHEMA_VERSION = '001';
export const DEFAULT_CONFIG_FILENAME = '.kbmd_config.json';

/**
 * Environment variables consulted while loading configuration.
 */
export type ConfigEnv = Readonly<Record<string, string | undefined>>;

const userConfigBase = z.object({
  schema_version: z.string(),
  /** Absolute path of the configuration file itself */
  config_path: z.string().min(1),
  /** Knowledgebase name -> absolute `.kbmd` directory */
  kbs: z.record(z.string(), z.string()).default({}),
});

export type UserConfig = z.infer<typeof userConfigBase>;

export const userConfigSchema001 = userConfigBase.extend({
  schema_version: z.literal('001'),
});

/**
 * Schema version -> schema. Add an entry per new version.
 */
export const CONFIG_SCHEMAS: Readonly<Record<string, z.ZodType<UserConfig, z.ZodTypeDef, unknown>>> = {
  '001': userConfigSchema001,
};
