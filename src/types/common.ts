/**
 * Common type definitions for kbmd.
 *
 * These types are fundamental building blocks used across the system.
 * They MUST NOT contain schema-specific logic.
 */

/**
 * A single schema violation with JSON pointer path.
 */
export interface ValidationIssue {
  /** JSON pointer path to the error location (e.g., "/status") */
  path: string;
  /** Error message */
  message: string;
  /** Schema keyword that failed (e.g., "required", "type", "enum") */
  keyword: string;
  /** Additional parameters from the validation */
  params?: Record<string, unknown>;
}

/**
 * Supplies the current time. Injected wherever a timestamp is stamped
 * so tests can pin it.
 */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
