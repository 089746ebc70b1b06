/**
 * kbmd command line.
 *
 *   kbmd init [--name <n>] [--description <d>]
 *   kbmd add dataset <path> --description <d> --size <s> --file-type <t> --data-source <src> [...]
 *   kbmd add project <path> --description <d> --objectives <o> --start <date> --pi <name> [...]
 *   kbmd build
 *   kbmd status
 */

import { parseArgs } from 'node:util';
import { initKnowledgebase } from './kb/KnowledgebaseInitializer.js';
import { findKnowledgebase, locateKnowledgebase } from './kb/Knowledgebase.js';
import { addDataset, addProject, parseTags } from './kb/EntryFactory.js';
import { buildKnowledgebase } from './kb/KnowledgebaseBuilder.js';
import type { DatasetFields, GitProbe, ProjectFields } from './kb/types.js';
import { loadUserConfig, registerKnowledgebase } from './config/loader.js';
import type { ConfigEnv } from './config/types.js';
import { NotFoundError } from './core/errors.js';

export const USAGE = `Usage: kbmd <command> [options]

Commands:
  init      Create a knowledgebase in the current git working tree
            [--name <name>] [--description <text>]
  add       Add a dataset or project to the knowledgebase
            add dataset <path> --description <text> --size <size> --file-type <type>
                --data-source <source> [--name] [--size-bytes] [--file-count]
                [--compression] [--access-notes] [--tags a,b] [--force]
            add project <path> --description <text> --objectives <text>
                --start <YYYY-MM-DD> --pi <name> [--name] [--status] [--completed <YYYY-MM-DD>]
                [--results-path] [--results-description] [--tags a,b] [--force]
  build     Rebuild indices and regenerate all markdown
  status    Show configured knowledgebases`;

/**
 * Bad command line. Printed with the usage text.
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export interface CliContext {
  cwd: string;
  env: ConfigEnv;
  git?: GitProbe;
}

type OptionValues = Record<string, string | boolean | undefined>;

function required(values: OptionValues, flag: string): string {
  const value = values[flag];
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new UsageError(`--${flag} is required`);
  }
  return value;
}

function optional(values: OptionValues, flag: string): string | undefined {
  const value = values[flag];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function optionalInteger(values: OptionValues, flag: string): number | undefined {
  const value = optional(values, flag);
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value);
  if (!/^\d+$/.test(value) || !Number.isSafeInteger(parsed)) {
    throw new UsageError(`--${flag} must be a non-negative integer, got '${value}'`);
  }
  return parsed;
}

async function runInit(args: string[], context: CliContext): Promise<void> {
  const { values } = parseArgs({
    args,
    options: {
      name: { type: 'string' },
      description: { type: 'string' },
    },
    strict: true,
  });

  const name = optional(values, 'name');
  const description = optional(values, 'description');
  const result = await initKnowledgebase({
    directory: context.cwd,
    ...(name !== undefined ? { name } : {}),
    ...(description !== undefined ? { description } : {}),
    ...(context.git ? { git: context.git } : {}),
  });

  await registerKnowledgebase(result.config.name, result.root, context.env);
}

function datasetFields(path: string, values: OptionValues): DatasetFields {
  const fields: DatasetFields = {
    path,
    description: required(values, 'description'),
    size: required(values, 'size'),
    file_type: required(values, 'file-type'),
    data_source: required(values, 'data-source'),
  };

  const name = optional(values, 'name');
  const sizeBytes = optionalInteger(values, 'size-bytes');
  const fileCount = optionalInteger(values, 'file-count');
  const compression = optional(values, 'compression');
  const accessNotes = optional(values, 'access-notes');
  const tags = optional(values, 'tags');

  if (name !== undefined) fields.name = name;
  if (sizeBytes !== undefined) fields.size_bytes = sizeBytes;
  if (fileCount !== undefined) fields.file_count = fileCount;
  if (compression !== undefined) fields.compression = compression;
  if (accessNotes !== undefined) fields.access_notes = accessNotes;
  if (tags !== undefined) fields.tags = parseTags(tags);

  return fields;
}

function projectFields(path: string, values: OptionValues): ProjectFields {
  const fields: ProjectFields = {
    path,
    description: required(values, 'description'),
    objectives: required(values, 'objectives'),
    date_started: required(values, 'start'),
    principal_investigator: required(values, 'pi'),
  };

  const name = optional(values, 'name');
  const status = optional(values, 'status');
  const completed = optional(values, 'completed');
  const resultsPath = optional(values, 'results-path');
  const resultsDescription = optional(values, 'results-description');
  const tags = optional(values, 'tags');

  if (name !== undefined) fields.name = name;
  if (status !== undefined) fields.status = status.toLowerCase();
  if (completed !== undefined) fields.date_completed = completed;
  if (resultsPath !== undefined) fields.results_path = resultsPath;
  if (resultsDescription !== undefined) fields.results_description = resultsDescription;
  if (tags !== undefined) fields.tags = parseTags(tags);

  return fields;
}

async function runAdd(args: string[], context: CliContext): Promise<void> {
  const { values, positionals } = parseArgs({
    args,
    options: {
      name: { type: 'string' },
      description: { type: 'string' },
      tags: { type: 'string' },
      force: { type: 'boolean' },
      // dataset
      size: { type: 'string' },
      'size-bytes': { type: 'string' },
      'file-type': { type: 'string' },
      'file-count': { type: 'string' },
      compression: { type: 'string' },
      'data-source': { type: 'string' },
      'access-notes': { type: 'string' },
      // project
      objectives: { type: 'string' },
      status: { type: 'string' },
      start: { type: 'string' },
      completed: { type: 'string' },
      pi: { type: 'string' },
      'results-path': { type: 'string' },
      'results-description': { type: 'string' },
    },
    allowPositionals: true,
    strict: true,
  });

  const [entryType, path, ...rest] = positionals;
  if (entryType === undefined || path === undefined || rest.length > 0) {
    throw new UsageError('expected: kbmd add <dataset|project> <path> [options]');
  }

  const options = { force: values.force === true };

  if (entryType === 'dataset') {
    const fields = datasetFields(path, values);
    const kb = await findKnowledgebase(context.cwd);
    await addDataset(kb, fields, options);
  } else if (entryType === 'project') {
    const fields = projectFields(path, values);
    const kb = await findKnowledgebase(context.cwd);
    await addProject(kb, fields, options);
  } else {
    throw new UsageError(`Unknown entry type: ${entryType}`);
  }
}

async function runBuild(args: string[], context: CliContext): Promise<void> {
  parseArgs({ args, options: {}, strict: true });
  const kb = await findKnowledgebase(context.cwd);
  await buildKnowledgebase(kb);
}

async function currentKnowledgebase(cwd: string): Promise<string | null> {
  try {
    return await locateKnowledgebase(cwd);
  } catch (err) {
    if (err instanceof NotFoundError) {
      return null;
    }
    throw err;
  }
}

async function runStatus(args: string[], context: CliContext): Promise<void> {
  parseArgs({ args, options: {}, strict: true });
  const config = await loadUserConfig(context.env);

  console.log(`Configuration schema version: ${config.schema_version}`);
  console.log(`Configuration path: ${config.config_path}`);

  const entries = Object.entries(config.kbs);
  if (entries.length > 0) {
    console.log('Knowledgebases:');
    for (const [name, root] of entries) {
      console.log(`  - ${name}: ${root}`);
    }
  } else {
    console.log('No knowledgebases configured.');
  }

  const current = await currentKnowledgebase(context.cwd);
  console.log(current ? `Current knowledgebase: ${current}` : 'Not inside a knowledgebase.');
}

const COMMANDS: Record<string, (args: string[], context: CliContext) => Promise<void>> = {
  init: runInit,
  add: runAdd,
  build: runBuild,
  status: runStatus,
};

/**
 * Run one command.
 *
 * @returns Process exit code: 0 on success, 1 on any error
 */
export async function main(argv: string[], context?: Partial<CliContext>): Promise<number> {
  const ctx: CliContext = {
    cwd: context?.cwd ?? process.cwd(),
    env: context?.env ?? process.env,
    ...(context?.git ? { git: context.git } : {}),
  };

  const [command, ...args] = argv;
  if (command === undefined || command === 'help' || command === '--help' || command === '-h') {
    console.log(USAGE);
    return command === undefined ? 1 : 0;
  }

  const handler = COMMANDS[command];
  if (!handler) {
    console.error(`Error: Unknown command: ${command}`);
    console.error(USAGE);
    return 1;
  }

  try {
    await handler(args, ctx);
    return 0;
  } catch (err) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    if (err instanceof UsageError) {
      console.error(USAGE);
    }
    return 1;
  }
}
