/**
 * RecordStoreImpl — Implementation of RecordStore.
 *
 * This class orchestrates:
 * - JSON parsing/serialization (via RecordParser)
 * - Schema validation (via SchemaRegistry)
 * - File operations (via RepoAdapter)
 *
 * Failures are thrown: ValidationError for malformed records, StorageError
 * for I/O, DuplicateRecordError for create over an existing identifier.
 */

import type { RepoAdapter, RepoFile } from '../repo/types.js';
import type { SchemaRegistry } from '../schema/SchemaRegistry.js';
import type { KnowledgebaseConfig } from '../model/types.js';
import type { RecordStore, PartitionRecord } from './types.js';
import { PARTITION_KINDS } from './types.js';
import { parseRecord, serializeRecord } from './RecordParser.js';
import {
  CONFIG_FILE,
  getPartitionDirectory,
  parseRecordPath,
  recordPath,
  type Partition,
} from '../repo/PathConvention.js';
import { DuplicateRecordError, StorageError, ValidationError } from '../core/errors.js';

export class RecordStoreImpl implements RecordStore {
  private readonly repo: RepoAdapter;
  private readonly schemas: SchemaRegistry;

  constructor(repo: RepoAdapter, schemas: SchemaRegistry) {
    this.repo = repo;
    this.schemas = schemas;
  }

  async listIds(partition: Partition): Promise<string[]> {
    const directory = getPartitionDirectory(partition);
    let files: string[];
    try {
      files = await this.repo.listFiles({ directory, pattern: '*.json' });
    } catch (err) {
      throw new StorageError(directory, 'list', err);
    }

    const ids: string[] = [];
    for (const filePath of files) {
      const parsed = parseRecordPath(filePath);
      if (parsed?.partition === partition) {
        ids.push(parsed.id);
      }
    }
    return ids.sort(compareIds);
  }

  async get<P extends Partition>(partition: P, id: string): Promise<PartitionRecord<P> | null> {
    const path = recordPath(partition, id);
    const file = await this.readFile(path);
    if (!file) {
      return null;
    }

    const data = this.parseContent(file);
    return this.schemas.parse(PARTITION_KINDS[partition], data, path);
  }

  async list<P extends Partition>(partition: P): Promise<PartitionRecord<P>[]> {
    const records: PartitionRecord<P>[] = [];
    for (const id of await this.listIds(partition)) {
      const record = await this.get(partition, id);
      if (record !== null) {
        records.push(record);
      }
    }
    return records;
  }

  async put<P extends Partition>(partition: P, id: string, record: PartitionRecord<P>): Promise<void> {
    const path = recordPath(partition, id);
    this.schemas.parse(PARTITION_KINDS[partition], record, path);

    const result = await this.repo.writeFile({ path, content: serializeRecord(record) });
    if (!result.success) {
      throw new StorageError(path, 'write', result.error ?? 'unknown error');
    }
  }

  async create<P extends Partition>(partition: P, id: string, record: PartitionRecord<P>): Promise<void> {
    if (await this.exists(partition, id)) {
      throw new DuplicateRecordError(partition, id);
    }

    const path = recordPath(partition, id);
    this.schemas.parse(PARTITION_KINDS[partition], record, path);

    const result = await this.repo.createFile({ path, content: serializeRecord(record) });
    if (!result.success) {
      throw new StorageError(path, 'write', result.error ?? 'unknown error');
    }
  }

  async exists(partition: Partition, id: string): Promise<boolean> {
    const path = recordPath(partition, id);
    try {
      return await this.repo.fileExists(path);
    } catch (err) {
      throw new StorageError(path, 'read', err);
    }
  }

  async getConfig(): Promise<KnowledgebaseConfig | null> {
    const file = await this.readFile(CONFIG_FILE);
    if (!file) {
      return null;
    }
    return this.schemas.parse('knowledgebase-config', this.parseContent(file), CONFIG_FILE);
  }

  async putConfig(config: KnowledgebaseConfig): Promise<void> {
    this.schemas.parse('knowledgebase-config', config, CONFIG_FILE);

    const result = await this.repo.writeFile({ path: CONFIG_FILE, content: serializeRecord(config) });
    if (!result.success) {
      throw new StorageError(CONFIG_FILE, 'write', result.error ?? 'unknown error');
    }
  }

  private async readFile(path: string): Promise<RepoFile | null> {
    try {
      return await this.repo.getFile(path);
    } catch (err) {
      throw new StorageError(path, 'read', err);
    }
  }

  private parseContent(file: RepoFile): Record<string, unknown> {
    const result = parseRecord(file.content);
    if (!result.success || result.data === undefined) {
      throw new ValidationError(file.path, [{
        path: '/',
        message: result.error ?? 'Unparseable record',
        keyword: 'parse',
      }]);
    }
    return result.data;
  }
}

/**
 * Code-unit order, independent of locale.
 */
export function compareIds(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Create a new RecordStore instance.
 */
export function createRecordStore(repo: RepoAdapter, schemas: SchemaRegistry): RecordStoreImpl {
  return new RecordStoreImpl(repo, schemas);
}
