/**
 * Types for Record Store.
 *
 * The Record Store orchestrates:
 * - JSON parsing/serialization (via RecordParser)
 * - Schema validation (via SchemaRegistry)
 * - File operations (via RepoAdapter)
 */

import type { Partition } from '../repo/PathConvention.js';
import type { KnowledgebaseConfig, RecordTypes } from '../model/types.js';

/**
 * Record kind stored in each partition.
 */
export const PARTITION_KINDS = {
  datasets: 'dataset',
  projects: 'project',
  indices: 'index',
} as const satisfies Record<Partition, keyof RecordTypes>;

export type PartitionKinds = typeof PARTITION_KINDS;

export type PartitionRecord<P extends Partition> = RecordTypes[PartitionKinds[P]];

/**
 * RecordStore interface.
 *
 * Identifiers are slugs for datasets and projects and well-known names for
 * indices. Every read is validated; every write validates first.
 */
export interface RecordStore {
  /**
   * Identifiers present in a partition, sorted.
   */
  listIds(partition: Partition): Promise<string[]>;

  /**
   * Get a record by identifier, or null if absent.
   *
   * @throws ValidationError when the stored record is malformed
   */
  get<P extends Partition>(partition: P, id: string): Promise<PartitionRecord<P> | null>;

  /**
   * All records of a partition, sorted by identifier.
   */
  list<P extends Partition>(partition: P): Promise<PartitionRecord<P>[]>;

  /**
   * Create or replace a record.
   */
  put<P extends Partition>(partition: P, id: string, record: PartitionRecord<P>): Promise<void>;

  /**
   * Create a record.
   *
   * @throws DuplicateRecordError when the identifier is taken
   */
  create<P extends Partition>(partition: P, id: string, record: PartitionRecord<P>): Promise<void>;

  exists(partition: Partition, id: string): Promise<boolean>;

  /**
   * The knowledgebase's config.json, or null if absent.
   */
  getConfig(): Promise<KnowledgebaseConfig | null>;

  putConfig(config: KnowledgebaseConfig): Promise<void>;
}
