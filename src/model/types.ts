/**
 * Record shapes persisted in a knowledgebase.
 *
 * These mirror schema/*.schema.yaml field for field. Timestamps are ISO-8601
 * strings (`iso-date-time`, offset optional), calendar dates are `YYYY-MM-DD`.
 */

export const PROJECT_STATUSES = ['active', 'completed', 'on_hold', 'archived'] as const;
export type ProjectStatus = typeof PROJECT_STATUSES[number];

export const COLLABORATOR_ROLES = [
  'Principal Investigator',
  'Researcher',
  'Student',
  'Technician',
  'Collaborator',
] as const;
export type CollaboratorRole = typeof COLLABORATOR_ROLES[number];

/**
 * Lightweight pointer from one record to another.
 */
export interface RecordReference {
  name: string;
  slug: string;
  description?: string;
}

export interface Script {
  path: string;
  description: string;
  language?: string;
}

export interface Collaborator {
  name: string;
  role: CollaboratorRole;
  email?: string;
  affiliation?: string;
}

export interface Publication {
  title: string;
  journal: string;
  year: number;
  doi?: string;
  url?: string;
}

export interface Dataset {
  name: string;
  slug: string;
  path: string;
  description: string;
  /** Human-readable size, e.g. "2.5 GB" */
  size: string;
  size_bytes?: number;
  file_type: string;
  file_count?: number;
  compression?: string;
  data_source: string;
  last_modified: string;
  date_added: string;
  related_projects: RecordReference[];
  access_notes?: string;
  tags: string[];
}

export interface Project {
  name: string;
  slug: string;
  path: string;
  description: string;
  objectives: string;
  status: ProjectStatus;
  date_started: string;
  date_completed?: string;
  date_added: string;
  principal_investigator: string;
  collaborators: Collaborator[];
  datasets: RecordReference[];
  scripts: Script[];
  results_path?: string;
  results_description?: string;
  publications: Publication[];
  tags: string[];
}

export interface IndexEntry {
  name: string;
  /** Link relative to generated/indices/ */
  link: string;
  description?: string;
  category?: string;
}

export interface IndexCategory {
  category: string;
  entries: IndexEntry[];
}

export interface IndexDocument {
  title: string;
  description: string;
  entries: IndexCategory[];
  last_updated: string;
}

/**
 * config.json at the knowledgebase root. The flags are advisory.
 */
export interface KnowledgebaseConfig {
  name: string;
  description: string;
  created: string;
  git_repo_path: string;
  custom_templates: boolean;
  auto_update_indices: boolean;
  generate_cross_references: boolean;
}

/**
 * Record kind → record type.
 */
export interface RecordTypes {
  dataset: Dataset;
  project: Project;
  index: IndexDocument;
  'knowledgebase-config': KnowledgebaseConfig;
}

export type RecordKind = keyof RecordTypes;
