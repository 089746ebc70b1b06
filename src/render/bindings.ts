/**
 * Template variables per template kind.
 *
 * Each kind has an enumerated list of variables. Binders build the variable
 * table field by field, and `checkBindings` rejects a table that is missing a
 * required variable or carries one the kind does not declare.
 */

import type {
  Collaborator,
  Dataset,
  IndexCategory,
  IndexDocument,
  Project,
  ProjectStatus,
  Publication,
  RecordReference,
  Script,
} from '../model/types.js';
import type { TemplateKind } from '../repo/PathConvention.js';
import { ValidationError } from '../core/errors.js';
import type { ValidationIssue } from '../types/common.js';

export type DatasetBindings = {
  name: string;
  slug: string;
  path: string;
  description: string;
  size: string;
  size_bytes: number | undefined;
  file_type: string;
  file_count: number | undefined;
  compression: string | undefined;
  data_source: string;
  last_modified: string;
  date_added: string;
  related_projects: RecordReference[];
  access_notes: string | undefined;
  tags: string[];
  generated_date: string;
};

export type ProjectBindings = {
  name: string;
  slug: string;
  path: string;
  description: string;
  objectives: string;
  status: ProjectStatus;
  date_started: string;
  date_completed: string | undefined;
  date_added: string;
  principal_investigator: string;
  collaborators: Collaborator[];
  datasets: RecordReference[];
  scripts: Script[];
  results_path: string | undefined;
  results_description: string | undefined;
  publications: Publication[];
  tags: string[];
  generated_date: string;
};

export type IndexBindings = {
  name: string;
  title: string;
  description: string;
  entries: IndexCategory[];
  last_updated: string;
  generated_date: string;
};

export interface DocumentLink {
  name: string;
  link: string;
}

export type RootBindings = {
  project_name: string;
  datasets: DocumentLink[];
  projects: DocumentLink[];
  indices: DocumentLink[];
  generated_date: string;
};

export interface BindingsByKind {
  dataset: DatasetBindings;
  project: ProjectBindings;
  index: IndexBindings;
  root: RootBindings;
}

interface VariableList {
  required: readonly string[];
  optional: readonly string[];
}

export const TEMPLATE_VARIABLES: { readonly [K in TemplateKind]: VariableList } = {
  dataset: {
    required: [
      'name', 'slug', 'path', 'description', 'size', 'file_type', 'data_source',
      'last_modified', 'date_added', 'related_projects', 'tags', 'generated_date',
    ],
    optional: ['size_bytes', 'file_count', 'compression', 'access_notes'],
  },
  project: {
    required: [
      'name', 'slug', 'path', 'description', 'objectives', 'status', 'date_started',
      'date_added', 'principal_investigator', 'collaborators', 'datasets', 'scripts',
      'publications', 'tags', 'generated_date',
    ],
    optional: ['date_completed', 'results_path', 'results_description'],
  },
  index: {
    required: ['name', 'title', 'description', 'entries', 'last_updated', 'generated_date'],
    optional: [],
  },
  root: {
    required: ['project_name', 'datasets', 'projects', 'indices', 'generated_date'],
    optional: [],
  },
};

/**
 * "2024-03-05T09:07:02.000Z" -> "2024-03-05 09:07:02" (UTC).
 */
export function formatTimestamp(date: Date): string {
  return date.toISOString().slice(0, 19).replace('T', ' ');
}

const ISO_TIMESTAMP = /^(\d{4}-\d{2}-\d{2})[T ](\d{2}:\d{2}:\d{2})(?:\.\d+)?(Z|[+-]\d{2}(?::?\d{2})?)?$/i;

/**
 * Re-render an ISO timestamp string in UTC. A timestamp without an offset is
 * shown as written. Anything else is left as is.
 */
export function displayTimestamp(value: string): string {
  const match = ISO_TIMESTAMP.exec(value);
  if (!match) {
    return value;
  }
  if (match[3] === undefined) {
    return `${match[1]} ${match[2]}`;
  }
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? value : formatTimestamp(date);
}

export function bindDataset(dataset: Dataset, generatedAt: Date): DatasetBindings {
  return {
    name: dataset.name,
    slug: dataset.slug,
    path: dataset.path,
    description: dataset.description,
    size: dataset.size,
    size_bytes: dataset.size_bytes,
    file_type: dataset.file_type,
    file_count: dataset.file_count,
    compression: dataset.compression,
    data_source: dataset.data_source,
    last_modified: displayTimestamp(dataset.last_modified),
    date_added: displayTimestamp(dataset.date_added),
    related_projects: dataset.related_projects,
    access_notes: dataset.access_notes,
    tags: dataset.tags,
    generated_date: formatTimestamp(generatedAt),
  };
}

export function bindProject(project: Project, generatedAt: Date): ProjectBindings {
  return {
    name: project.name,
    slug: project.slug,
    path: project.path,
    description: project.description,
    objectives: project.objectives,
    status: project.status,
    date_started: project.date_started,
    date_completed: project.date_completed,
    date_added: displayTimestamp(project.date_added),
    principal_investigator: project.principal_investigator,
    collaborators: project.collaborators,
    datasets: project.datasets,
    scripts: project.scripts,
    results_path: project.results_path,
    results_description: project.results_description,
    publications: project.publications,
    tags: project.tags,
    generated_date: formatTimestamp(generatedAt),
  };
}

export function bindIndex(name: string, index: IndexDocument, generatedAt: Date): IndexBindings {
  return {
    name,
    title: index.title,
    description: index.description,
    entries: index.entries,
    last_updated: index.last_updated.slice(0, 10),
    generated_date: formatTimestamp(generatedAt),
  };
}

export function bindRoot(
  projectName: string,
  links: { datasets: DocumentLink[]; projects: DocumentLink[]; indices: DocumentLink[] },
  generatedAt: Date
): RootBindings {
  return {
    project_name: projectName,
    datasets: links.datasets,
    projects: links.projects,
    indices: links.indices,
    generated_date: formatTimestamp(generatedAt),
  };
}

/**
 * Check a variable table against the declared list for its template kind.
 *
 * @throws ValidationError naming every missing or undeclared variable
 */
export function checkBindings(kind: TemplateKind, bindings: Record<string, unknown>): void {
  const { required, optional } = TEMPLATE_VARIABLES[kind];
  const issues: ValidationIssue[] = [];

  for (const name of required) {
    if (bindings[name] === undefined || bindings[name] === null) {
      issues.push({ path: `/${name}`, message: 'Missing required template variable', keyword: 'required' });
    }
  }

  for (const name of Object.keys(bindings)) {
    if (!required.includes(name) && !optional.includes(name)) {
      issues.push({ path: `/${name}`, message: 'Undeclared template variable', keyword: 'additionalProperties' });
    }
  }

  if (issues.length > 0) {
    throw new ValidationError(`bindings for template '${kind}'`, issues);
  }
}
