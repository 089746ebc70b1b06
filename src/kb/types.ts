/**
 * Types for the knowledgebase workflows (init, add, build).
 */

import type { RepoAdapter } from '../repo/types.js';
import type { SchemaRegistry } from '../schema/SchemaRegistry.js';
import type { RecordStore } from '../store/types.js';
import type { RenderCounts } from '../render/RenderPipeline.js';
import type { Clock } from '../types/common.js';

/**
 * An opened knowledgebase: its `.kbmd` directory and the services over it.
 */
export interface Knowledgebase {
  /** Absolute path of the `.kbmd` directory */
  root: string;
  repo: RepoAdapter;
  schemas: SchemaRegistry;
  store: RecordStore;
}

/**
 * Answers whether a directory sits inside a git working tree.
 */
export interface GitProbe {
  /**
   * @returns Top level of the working tree, or null outside one
   */
  repositoryRoot(directory: string): Promise<string | null>;
}

/**
 * Fields for a new dataset. Everything not listed is derived.
 */
export interface DatasetFields {
  path: string;
  description: string;
  size: string;
  file_type: string;
  data_source: string;
  /** Defaults to the base name of `path` */
  name?: string;
  size_bytes?: number;
  file_count?: number;
  compression?: string;
  access_notes?: string;
  tags?: string[];
}

/**
 * Fields for a new project.
 */
export interface ProjectFields {
  path: string;
  description: string;
  objectives: string;
  /** YYYY-MM-DD */
  date_started: string;
  principal_investigator: string;
  name?: string;
  /** Defaults to "active" */
  status?: string;
  date_completed?: string;
  results_path?: string;
  results_description?: string;
  tags?: string[];
}

export interface EntryOptions {
  clock?: Clock;
  /** Replace an existing record with the same slug */
  force?: boolean;
}

/**
 * Documents produced by one build, per partition.
 */
export type BuildReport = RenderCounts;
