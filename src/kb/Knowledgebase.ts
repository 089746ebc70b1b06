/**
 * Knowledgebase — Locating and opening a `.kbmd` directory.
 */

import { stat } from 'node:fs/promises';
import { basename, dirname, join, resolve } from 'node:path';
import { KB_DIRNAME } from '../repo/PathConvention.js';
import { createLocalRepoAdapter } from '../repo/LocalRepoAdapter.js';
import { SchemaRegistry } from '../schema/SchemaRegistry.js';
import { createRecordStore } from '../store/RecordStoreImpl.js';
import { NotFoundError } from '../core/errors.js';
import type { Knowledgebase } from './types.js';

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return false;
    }
    throw err;
  }
}

/**
 * Walk up from `start` to the nearest directory holding `.kbmd`.
 *
 * @returns Absolute path of the `.kbmd` directory
 * @throws NotFoundError when no ancestor has one
 */
export async function locateKnowledgebase(start: string): Promise<string> {
  let current = resolve(start);

  for (;;) {
    const candidate = join(current, KB_DIRNAME);
    if (await isDirectory(candidate)) {
      return candidate;
    }
    const parent = dirname(current);
    if (parent === current) {
      throw new NotFoundError('knowledgebase', `${KB_DIRNAME} above ${resolve(start)} (run 'kbmd init' first)`);
    }
    current = parent;
  }
}

/**
 * Wire the repository adapter, schemas and record store for a `.kbmd` root.
 */
export function openKnowledgebase(root: string, schemas: SchemaRegistry): Knowledgebase {
  const repo = createLocalRepoAdapter({ basePath: root });
  return {
    root,
    repo,
    schemas,
    store: createRecordStore(repo, schemas),
  };
}

/**
 * Locate the knowledgebase above `start` and open it with the bundled schemas.
 */
export async function findKnowledgebase(start: string): Promise<Knowledgebase> {
  const root = await locateKnowledgebase(start);
  return openKnowledgebase(root, await SchemaRegistry.load());
}

/**
 * Name of the directory that contains the `.kbmd` root.
 */
export function defaultProjectName(root: string): string {
  return basename(dirname(root));
}
