/**
 * IndexBuilder — Recomputes the filesystem and topic indices.
 *
 * The builder reads every dataset and project, groups them by a derived key
 * and overwrites both index records. Nothing is merged with the previous
 * index content.
 */

import type { Dataset, IndexCategory, IndexDocument, IndexEntry, Project } from '../model/types.js';
import type { RecordStore } from '../store/types.js';
import { compareIds } from '../store/RecordStoreImpl.js';
import { documentLink } from '../repo/PathConvention.js';
import { systemClock, type Clock } from '../types/common.js';
import {
  DESCRIPTION_LIMIT,
  ROOT_CATEGORY,
  TRUNCATION_MARKER,
  UNTAGGED_CATEGORY,
  type IndexSet,
} from './types.js';

export interface IndexBuilderConfig {
  /** Stamps `last_updated` (default: system clock) */
  clock?: Clock;
}

/**
 * Shorten a description to DESCRIPTION_LIMIT characters plus a marker.
 * Characters are code points, so a surrogate pair is never split.
 */
export function truncateDescription(description: string): string {
  const chars = Array.from(description);
  if (chars.length <= DESCRIPTION_LIMIT) {
    return description;
  }
  return chars.slice(0, DESCRIPTION_LIMIT).join('') + TRUNCATION_MARKER;
}

/**
 * Filesystem root a path belongs to.
 *
 * "/scratch/lab/data" -> "/scratch"; "/only-one-segment" -> "/".
 */
export function filesystemRoot(path: string): string {
  const segments = path.split('/').filter(segment => segment.length > 0);
  return segments.length > 1 ? `/${segments[0]}` : ROOT_CATEGORY;
}

function bySlug<T extends { slug: string }>(records: readonly T[]): T[] {
  return [...records].sort((a, b) => compareIds(a.slug, b.slug));
}

function datasetEntry(dataset: Dataset): IndexEntry {
  return {
    name: dataset.name,
    link: documentLink('datasets', dataset.slug),
    description: truncateDescription(dataset.description),
  };
}

function projectEntry(project: Project): IndexEntry {
  return {
    name: project.name,
    link: documentLink('projects', project.slug),
    description: truncateDescription(project.description),
  };
}

/**
 * Group keyed entries into categories sorted by key. Entries keep their
 * input order within a category.
 */
export function groupEntries(keyed: Iterable<[string, IndexEntry]>): IndexCategory[] {
  const groups = new Map<string, IndexEntry[]>();

  for (const [key, entry] of keyed) {
    const group = groups.get(key);
    if (group) {
      group.push(entry);
    } else {
      groups.set(key, [entry]);
    }
  }

  return [...groups.keys()]
    .sort(compareIds)
    .map(category => ({ category, entries: groups.get(category) ?? [] }));
}

/**
 * Datasets and projects grouped by filesystem root.
 */
export function buildFilesystemIndex(
  datasets: readonly Dataset[],
  projects: readonly Project[],
  lastUpdated: Date
): IndexDocument {
  const keyed: Array<[string, IndexEntry]> = [
    ...bySlug(datasets).map((d): [string, IndexEntry] => [filesystemRoot(d.path), datasetEntry(d)]),
    ...bySlug(projects).map((p): [string, IndexEntry] => [filesystemRoot(p.path), projectEntry(p)]),
  ];

  return {
    title: 'Browse by Filesystem Location',
    description: 'Datasets and projects organized by their location on different filesystems',
    entries: groupEntries(keyed),
    last_updated: lastUpdated.toISOString(),
  };
}

/**
 * Projects grouped by tag. A project appears once per tag.
 */
export function buildTopicIndex(projects: readonly Project[], lastUpdated: Date): IndexDocument {
  const keyed: Array<[string, IndexEntry]> = [];

  for (const project of bySlug(projects)) {
    const topics = project.tags.length > 0 ? project.tags : [UNTAGGED_CATEGORY];
    for (const topic of topics) {
      keyed.push([topic, projectEntry(project)]);
    }
  }

  return {
    title: 'Browse by Research Topic',
    description: 'Projects organized by research topic and domain',
    entries: groupEntries(keyed),
    last_updated: lastUpdated.toISOString(),
  };
}

export class IndexBuilder {
  private readonly store: RecordStore;
  private readonly clock: Clock;

  constructor(store: RecordStore, config: IndexBuilderConfig = {}) {
    this.store = store;
    this.clock = config.clock ?? systemClock;
  }

  /**
   * Compute both indices from the current records without writing them.
   *
   * @throws ValidationError if any dataset or project is malformed
   */
  async compute(): Promise<IndexSet> {
    const datasets = await this.store.list('datasets');
    const projects = await this.store.list('projects');
    const now = this.clock();

    return {
      'by-filesystem': buildFilesystemIndex(datasets, projects, now),
      'by-topic': buildTopicIndex(projects, now),
    };
  }

  /**
   * Recompute both indices and overwrite their records.
   *
   * The full scan completes before the first write, so an invalid record
   * leaves the stored indices untouched.
   */
  async rebuild(): Promise<IndexSet> {
    const indices = await this.compute();

    await this.store.put('indices', 'by-filesystem', indices['by-filesystem']);
    await this.store.put('indices', 'by-topic', indices['by-topic']);

    return indices;
  }
}

/**
 * Create a new IndexBuilder instance.
 */
export function createIndexBuilder(store: RecordStore, config?: IndexBuilderConfig): IndexBuilder {
  return new IndexBuilder(store, config);
}
