/**
 * EntryFactory — Builds and stores new dataset and project records.
 *
 * The caller supplies the descriptive fields; the factory derives the slug,
 * resolves the path, stamps `date_added` and validates the result.
 */

import { stat } from 'node:fs/promises';
import { basename, join, resolve } from 'node:path';
import type { Dataset, Project } from '../model/types.js';
import type { SchemaRegistry } from '../schema/SchemaRegistry.js';
import { recordPath, slugify } from '../repo/PathConvention.js';
import { ValidationError } from '../core/errors.js';
import { systemClock } from '../types/common.js';
import type { DatasetFields, EntryOptions, Knowledgebase, ProjectFields } from './types.js';

/**
 * "raw, processed ,, qc" -> ["raw", "processed", "qc"]
 */
export function parseTags(input: string): string[] {
  return input
    .split(',')
    .map(tag => tag.trim())
    .filter(tag => tag.length > 0);
}

function requireSlug(kind: 'dataset' | 'project', name: string): string {
  const slug = slugify(name);
  if (slug.length === 0) {
    throw new ValidationError(`${kind} '${name}'`, [{
      path: '/slug',
      message: 'Name produces an empty slug',
      keyword: 'slug',
    }]);
  }
  return slug;
}

/**
 * Modification time of `path`; now, with a warning, when it does not exist.
 */
async function lastModified(path: string, now: Date): Promise<string> {
  try {
    return (await stat(path)).mtime.toISOString();
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      console.warn(`Warning: Path ${path} does not exist`);
      return now.toISOString();
    }
    throw err;
  }
}

export async function createDatasetRecord(
  fields: DatasetFields,
  schemas: SchemaRegistry,
  options: EntryOptions = {}
): Promise<Dataset> {
  const now = (options.clock ?? systemClock)();
  const path = resolve(fields.path);
  const name = fields.name ?? basename(path);
  const slug = requireSlug('dataset', name);

  const candidate = {
    name,
    slug,
    path,
    description: fields.description,
    size: fields.size,
    ...(fields.size_bytes !== undefined ? { size_bytes: fields.size_bytes } : {}),
    file_type: fields.file_type,
    ...(fields.file_count !== undefined ? { file_count: fields.file_count } : {}),
    ...(fields.compression !== undefined ? { compression: fields.compression } : {}),
    data_source: fields.data_source,
    last_modified: await lastModified(path, now),
    date_added: now.toISOString(),
    related_projects: [],
    ...(fields.access_notes !== undefined ? { access_notes: fields.access_notes } : {}),
    tags: fields.tags ?? [],
  };

  return schemas.parse('dataset', candidate, `dataset '${slug}'`);
}

export async function createProjectRecord(
  fields: ProjectFields,
  schemas: SchemaRegistry,
  options: EntryOptions = {}
): Promise<Project> {
  const now = (options.clock ?? systemClock)();
  const path = resolve(fields.path);
  const name = fields.name ?? basename(path);
  const slug = requireSlug('project', name);

  const candidate = {
    name,
    slug,
    path,
    description: fields.description,
    objectives: fields.objectives,
    status: fields.status ?? 'active',
    date_started: fields.date_started,
    ...(fields.date_completed !== undefined ? { date_completed: fields.date_completed } : {}),
    date_added: now.toISOString(),
    principal_investigator: fields.principal_investigator,
    collaborators: [],
    datasets: [],
    scripts: [],
    ...(fields.results_path !== undefined ? { results_path: fields.results_path } : {}),
    ...(fields.results_description !== undefined ? { results_description: fields.results_description } : {}),
    publications: [],
    tags: fields.tags ?? [],
  };

  return schemas.parse('project', candidate, `project '${slug}'`);
}

/**
 * Create a dataset record and store it.
 *
 * @throws DuplicateRecordError when the slug is taken and `force` is not set
 */
export async function addDataset(
  kb: Knowledgebase,
  fields: DatasetFields,
  options: EntryOptions = {}
): Promise<Dataset> {
  console.log(`Adding dataset: ${resolve(fields.path)}`);
  const dataset = await createDatasetRecord(fields, kb.schemas, options);

  if (options.force) {
    await kb.store.put('datasets', dataset.slug, dataset);
  } else {
    await kb.store.create('datasets', dataset.slug, dataset);
  }

  console.log(`Dataset '${dataset.name}' added successfully!`);
  console.log(`Data saved to: ${join(kb.root, recordPath('datasets', dataset.slug))}`);
  return dataset;
}

/**
 * Create a project record and store it.
 *
 * @throws DuplicateRecordError when the slug is taken and `force` is not set
 */
export async function addProject(
  kb: Knowledgebase,
  fields: ProjectFields,
  options: EntryOptions = {}
): Promise<Project> {
  console.log(`Adding project: ${resolve(fields.path)}`);
  const project = await createProjectRecord(fields, kb.schemas, options);

  if (options.force) {
    await kb.store.put('projects', project.slug, project);
  } else {
    await kb.store.create('projects', project.slug, project);
  }

  console.log(`Project '${project.name}' added successfully!`);
  console.log(`Data saved to: ${join(kb.root, recordPath('projects', project.slug))}`);
  return project;
}
