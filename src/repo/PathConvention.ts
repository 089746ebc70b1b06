/**
 * PathConvention — File layout of a knowledgebase.
 *
 * Convention (relative to the `.kbmd` knowledgebase root):
 * - Records live under `data/{partition}/{slug}.json`
 * - Rendered documents live under `generated/{partition}/{slug}.md`
 * - Templates live under `templates/{kind}.jinja`
 * - Example: `data/datasets/rna-seq-batch-1.json`
 */

/** Name of the directory that marks a knowledgebase root. */
export const KB_DIRNAME = '.kbmd';

export const CONFIG_FILE = 'config.json';
export const DATA_DIR = 'data';
export const GENERATED_DIR = 'generated';
export const TEMPLATES_DIR = 'templates';
export const ROOT_DOCUMENT = `${GENERATED_DIR}/README.md`;

export const PARTITIONS = ['datasets', 'projects', 'indices'] as const;
export type Partition = typeof PARTITIONS[number];

export const TEMPLATE_KINDS = ['root', 'dataset', 'project', 'index'] as const;
export type TemplateKind = typeof TEMPLATE_KINDS[number];

export const TEMPLATE_EXTENSION = '.jinja';

/**
 * Result of parsing a record path.
 */
export interface ParsedPath {
  partition: Partition;
  /** Slug (or index name) taken from the filename */
  id: string;
  /** Full relative path */
  path: string;
}

/**
 * Slugify a name for use as a record identifier.
 *
 * @returns lowercase `a-z0-9` words joined by single dashes
 */
export function slugify(text: string): string {
  return text
    .toLowerCase()
    .trim()
    .replace(/[^a-z0-9\s-]/g, '') // Drop everything else
    .replace(/[\s-]+/g, '-')      // Whitespace and dash runs become one dash
    .replace(/^-+|-+$/g, '');     // Trim leading/trailing dashes
}

export function getPartitionDirectory(partition: Partition): string {
  return `${DATA_DIR}/${partition}`;
}

/**
 * @returns e.g. "data/projects/my-project.json"
 */
export function recordPath(partition: Partition, id: string): string {
  if (!id || id.trim().length === 0) {
    throw new Error('record id is required');
  }
  return `${getPartitionDirectory(partition)}/${id}.json`;
}

/**
 * @returns e.g. "generated/projects/my-project.md"
 */
export function outputPath(partition: Partition, id: string): string {
  return `${GENERATED_DIR}/${partition}/${id}.md`;
}

export function templatePath(kind: TemplateKind): string {
  return `${TEMPLATES_DIR}/${kind}${TEMPLATE_EXTENSION}`;
}

/**
 * Link from a rendered index page to a rendered record page.
 */
export function documentLink(partition: 'datasets' | 'projects', slug: string): string {
  return `../${partition}/${slug}.md`;
}

function isPartition(value: string): value is Partition {
  return PARTITIONS.some(partition => partition === value);
}

/**
 * Parse a record file path into components.
 *
 * @returns ParsedPath or null if the path doesn't match the convention
 */
export function parseRecordPath(path: string): ParsedPath | null {
  const normalizedPath = path.replace(/\\/g, '/');
  const match = /^data\/([^/]+)\/([^/]+)\.json$/.exec(normalizedPath);
  if (!match) {
    return null;
  }

  const [, partition = '', id = ''] = match;
  if (!isPartition(partition) || id.length === 0) {
    return null;
  }

  return { partition, id, path: normalizedPath };
}
