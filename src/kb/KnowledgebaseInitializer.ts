/**
 * KnowledgebaseInitializer — Creates a `.kbmd` directory inside a git
 * working tree.
 *
 * Layout created under `.kbmd/`:
 * - config.json
 * - templates/{root,dataset,project,index}.jinja (copied from the package)
 * - data/{datasets,projects,indices}/ with empty indices
 * - generated/{datasets,projects,indices}/
 */

import { readFile, stat } from 'node:fs/promises';
import { basename, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import {
  GENERATED_DIR,
  KB_DIRNAME,
  PARTITIONS,
  TEMPLATES_DIR,
  TEMPLATE_EXTENSION,
  TEMPLATE_KINDS,
  getPartitionDirectory,
  templatePath,
} from '../repo/PathConvention.js';
import type { RepoAdapter } from '../repo/types.js';
import { SchemaRegistry } from '../schema/SchemaRegistry.js';
import { IndexBuilder } from '../index/IndexBuilder.js';
import type { KnowledgebaseConfig } from '../model/types.js';
import { InitializationError, StorageError } from '../core/errors.js';
import { systemClock, type Clock } from '../types/common.js';
import { openKnowledgebase } from './Knowledgebase.js';
import { SimpleGitProbe } from './GitProbe.js';
import type { GitProbe, Knowledgebase } from './types.js';

/**
 * Default templates shipped with the package.
 */
export const BUNDLED_TEMPLATE_DIR = fileURLToPath(new URL('../../templates/', import.meta.url));

export interface InitOptions {
  /** Directory to create `.kbmd` in */
  directory: string;
  /** Defaults to the directory's base name */
  name?: string;
  description?: string;
  git?: GitProbe;
  clock?: Clock;
  schemas?: SchemaRegistry;
  /** Where the default templates are copied from */
  templateDir?: string;
}

export interface InitResult extends Knowledgebase {
  config: KnowledgebaseConfig;
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return false;
    }
    throw new StorageError(path, 'read', err);
  }
}

async function createLayout(repo: RepoAdapter): Promise<void> {
  const directories = [
    TEMPLATES_DIR,
    ...PARTITIONS.flatMap(partition => [getPartitionDirectory(partition), `${GENERATED_DIR}/${partition}`]),
  ];
  for (const directory of directories) {
    try {
      await repo.ensureDirectory(directory);
    } catch (err) {
      throw new StorageError(directory, 'write', err);
    }
  }
}

async function copyTemplates(repo: RepoAdapter, templateDir: string): Promise<void> {
  for (const kind of TEMPLATE_KINDS) {
    const source = join(templateDir, `${kind}${TEMPLATE_EXTENSION}`);
    let content: string;
    try {
      content = await readFile(source, 'utf-8');
    } catch (err) {
      throw new StorageError(source, 'read', err);
    }

    const target = templatePath(kind);
    const result = await repo.createFile({ path: target, content });
    if (!result.success) {
      throw new StorageError(target, 'write', result.error ?? 'unknown error');
    }
  }
}

/**
 * Create a knowledgebase in `options.directory`.
 *
 * @throws InitializationError outside a git working tree or when `.kbmd`
 *         already exists
 * @throws StorageError when the layout cannot be created
 */
export async function initKnowledgebase(options: InitOptions): Promise<InitResult> {
  const directory = resolve(options.directory);
  const git = options.git ?? new SimpleGitProbe();
  const clock = options.clock ?? systemClock;

  const gitRoot = await git.repositoryRoot(directory);
  if (gitRoot === null) {
    throw new InitializationError(directory, 'not a git repository');
  }

  const root = join(directory, KB_DIRNAME);
  if (await pathExists(root)) {
    throw new InitializationError(directory, `${KB_DIRNAME} directory already exists`);
  }

  const schemas = options.schemas ?? await SchemaRegistry.load();
  const kb = openKnowledgebase(root, schemas);

  await createLayout(kb.repo);

  await copyTemplates(kb.repo, options.templateDir ?? BUNDLED_TEMPLATE_DIR);
  await new IndexBuilder(kb.store, { clock }).rebuild();

  const name = options.name ?? basename(directory);
  const config: KnowledgebaseConfig = {
    name,
    description: options.description ?? `Knowledgebase for ${name}`,
    created: clock().toISOString(),
    git_repo_path: gitRoot,
    custom_templates: false,
    auto_update_indices: true,
    generate_cross_references: true,
  };
  await kb.store.putConfig(config);

  console.log(`Initialized knowledgebase '${name}' in ${root}`);
  return { ...kb, config };
}
