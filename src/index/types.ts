/**
 * Types for the derived indices.
 *
 * Indices are NOT the source of truth - dataset and project records are.
 * Every rebuild regenerates them completely.
 */

import type { IndexDocument } from '../model/types.js';

export const INDEX_NAMES = ['by-filesystem', 'by-topic'] as const;
export type IndexName = typeof INDEX_NAMES[number];

/** Longest description carried into an index entry before truncation. */
export const DESCRIPTION_LIMIT = 100;
export const TRUNCATION_MARKER = '...';

/** Category for projects without tags in the topic index. */
export const UNTAGGED_CATEGORY = 'Untagged';

/** Category for paths with a single segment in the filesystem index. */
export const ROOT_CATEGORY = '/';

/**
 * Both indices produced by one rebuild, keyed by index name.
 */
export type IndexSet = { [N in IndexName]: IndexDocument };
