/**
 * Types for the validation module.
 */

/**
 * Options for creating a validator instance.
 */
export interface ValidatorOptions {
  /** Whether to use strict mode (default: true) */
  strict?: boolean;
  /** Whether to add standard formats such as date and date-time (default: true) */
  addFormats?: boolean;
  /** Whether to fill `default` values into validated data (default: true) */
  useDefaults?: boolean;
}
