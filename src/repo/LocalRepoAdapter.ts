/**
 * LocalRepoAdapter — Local filesystem implementation of RepoAdapter.
 */

import { readFile, writeFile, mkdir, readdir, stat } from 'node:fs/promises';
import type { Dirent } from 'node:fs';
import { join, dirname } from 'node:path';
import type {
  RepoAdapter,
  RepoFile,
  ListFilesOptions,
  WriteFileOptions,
  FileOperationResult,
  LocalRepoConfig,
} from './types.js';

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

function isMissing(err: unknown): boolean {
  return isErrnoException(err) && err.code === 'ENOENT';
}

/**
 * Check if a filename matches a glob pattern.
 * Supports *.ext and exact names.
 */
function matchesPattern(filename: string, pattern: string): boolean {
  if (!pattern) return true;

  if (pattern.startsWith('*.')) {
    return filename.endsWith(pattern.slice(1));
  }

  return filename === pattern;
}

/**
 * Local filesystem implementation of RepoAdapter.
 */
export class LocalRepoAdapter implements RepoAdapter {
  readonly basePath: string;

  constructor(config: LocalRepoConfig) {
    this.basePath = config.basePath;
  }

  private resolvePath(path: string): string {
    return join(this.basePath, path);
  }

  async getFile(path: string): Promise<RepoFile | null> {
    const fullPath = this.resolvePath(path);

    try {
      const content = await readFile(fullPath, 'utf-8');
      const stats = await stat(fullPath);

      return {
        path,
        content,
        size: stats.size,
      };
    } catch (err) {
      if (isMissing(err)) {
        return null;
      }
      throw err;
    }
  }

  async fileExists(path: string): Promise<boolean> {
    try {
      const stats = await stat(this.resolvePath(path));
      return stats.isFile();
    } catch (err) {
      if (isMissing(err)) {
        return false;
      }
      throw err;
    }
  }

  async listFiles(options: ListFilesOptions): Promise<string[]> {
    const { directory, pattern } = options;

    let entries: Dirent[];
    try {
      entries = await readdir(this.resolvePath(directory), { withFileTypes: true });
    } catch (err) {
      if (isMissing(err)) {
        return [];
      }
      throw err;
    }

    return entries
      .filter(entry => entry.isFile() && (!pattern || matchesPattern(entry.name, pattern)))
      .map(entry => (directory ? `${directory}/${entry.name}` : entry.name))
      .sort();
  }

  async createFile(options: WriteFileOptions): Promise<FileOperationResult> {
    const { path, content } = options;

    try {
      if (await this.fileExists(path)) {
        return {
          success: false,
          error: `File already exists: ${path}`,
        };
      }
      return await this.write(path, content);
    } catch (err) {
      return {
        success: false,
        error: err instanceof Error ? err.message : String(err),
      };
    }
  }

  async writeFile(options: WriteFileOptions): Promise<FileOperationResult> {
    try {
      return await this.write(options.path, options.content);
    } catch (err) {
      return {
        success: false,
        error: err instanceof Error ? err.message : String(err),
      };
    }
  }

  private async write(path: string, content: string): Promise<FileOperationResult> {
    const fullPath = this.resolvePath(path);
    await mkdir(dirname(fullPath), { recursive: true });
    await writeFile(fullPath, content, 'utf-8');
    return { success: true };
  }

  async ensureDirectory(path: string): Promise<void> {
    await mkdir(this.resolvePath(path), { recursive: true });
  }
}

/**
 * Create a new LocalRepoAdapter instance.
 */
export function createLocalRepoAdapter(config: LocalRepoConfig): LocalRepoAdapter {
  return new LocalRepoAdapter(config);
}
