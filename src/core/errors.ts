/**
 * Error kinds surfaced by the knowledgebase core.
 *
 * Every failure is fatal for the current operation; nothing here is retried.
 * Callers distinguish kinds with `instanceof` or by `code`.
 */

import type { ValidationIssue } from '../types/common.js';

export type KnowledgebaseErrorCode =
  | 'VALIDATION_FAILED'
  | 'NOT_FOUND'
  | 'STORAGE_FAILED'
  | 'DUPLICATE_RECORD'
  | 'INIT_FAILED'
  | 'CONFIG_INVALID';

/**
 * Base class for all knowledgebase errors.
 */
export class KnowledgebaseError extends Error {
  constructor(
    message: string,
    public readonly code: KnowledgebaseErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'KnowledgebaseError';
  }
}

/**
 * A record's fields fail schema constraints.
 */
export class ValidationError extends KnowledgebaseError {
  constructor(
    /** Where the record came from (file path or a descriptive label) */
    public readonly location: string,
    public readonly issues: ValidationIssue[]
  ) {
    super(`Invalid record ${location}: ${formatIssues(issues)}`, 'VALIDATION_FAILED');
    this.name = 'ValidationError';
  }
}

/**
 * A required template, record, or knowledgebase does not exist.
 */
export class NotFoundError extends KnowledgebaseError {
  constructor(
    public readonly resource: 'template' | 'record' | 'knowledgebase',
    public readonly identifier: string
  ) {
    super(`${resource} not found: ${identifier}`, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

/**
 * Reading or writing a file failed.
 */
export class StorageError extends KnowledgebaseError {
  constructor(
    public readonly path: string,
    public readonly operation: 'read' | 'write' | 'list',
    cause: unknown
  ) {
    super(`Failed to ${operation} ${path}: ${describeCause(cause)}`, 'STORAGE_FAILED', { cause });
    this.name = 'StorageError';
  }
}

/**
 * An entry with the same slug already exists in its partition.
 */
export class DuplicateRecordError extends KnowledgebaseError {
  constructor(
    public readonly partition: string,
    public readonly slug: string
  ) {
    super(`A record with slug '${slug}' already exists in ${partition}`, 'DUPLICATE_RECORD');
    this.name = 'DuplicateRecordError';
  }
}

/**
 * A knowledgebase cannot be created in the requested directory.
 */
export class InitializationError extends KnowledgebaseError {
  constructor(
    public readonly directory: string,
    reason: string
  ) {
    super(`Cannot initialize knowledgebase in ${directory}: ${reason}`, 'INIT_FAILED');
    this.name = 'InitializationError';
  }
}

function formatIssues(issues: ValidationIssue[]): string {
  if (issues.length === 0) {
    return 'unknown validation failure';
  }
  return issues.map(issue => `${issue.path} ${issue.message}`).join('; ');
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
