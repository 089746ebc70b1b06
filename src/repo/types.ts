/**
 * Types for the Repository Adapter.
 *
 * The Repository Adapter provides text in/out against a knowledgebase
 * directory. It has NO domain semantics - just file operations.
 */

/**
 * File content read from the repository.
 */
export interface RepoFile {
  /** File path relative to the repository root */
  path: string;
  /** File content as string */
  content: string;
  /** File size in bytes */
  size: number;
}

/**
 * Options for listing files.
 */
export interface ListFilesOptions {
  /** Directory to list (relative to repo root) */
  directory: string;
  /** File pattern to match (glob-like, e.g., "*.json") */
  pattern?: string;
}

/**
 * Options for writing a file.
 */
export interface WriteFileOptions {
  /** File path relative to repo root */
  path: string;
  /** File content */
  content: string;
}

/**
 * Result of a file operation.
 */
export interface FileOperationResult {
  success: boolean;
  /** Error message if failed */
  error?: string;
}

/**
 * Repository Adapter interface.
 *
 * Paths are relative to the adapter's base directory and use `/`.
 * Listings are sorted so that callers see a stable order.
 */
export interface RepoAdapter {
  /**
   * Absolute path of the repository root.
   */
  readonly basePath: string;

  /**
   * @returns RepoFile or null if not found
   */
  getFile(path: string): Promise<RepoFile | null>;

  fileExists(path: string): Promise<boolean>;

  /**
   * @returns Sorted relative file paths; empty when the directory is missing
   */
  listFiles(options: ListFilesOptions): Promise<string[]>;

  /**
   * Create a new file. Fails when the file already exists.
   */
  createFile(options: WriteFileOptions): Promise<FileOperationResult>;

  /**
   * Create or replace a file, creating parent directories.
   */
  writeFile(options: WriteFileOptions): Promise<FileOperationResult>;

  /**
   * Create a directory (and parents) if it does not exist.
   */
  ensureDirectory(path: string): Promise<void>;
}

/**
 * Configuration for Local Repository Adapter.
 */
export interface LocalRepoConfig {
  /** Base directory for the repository */
  basePath: string;
}
