/**
 * Validation module exports.
 */

export * from './types.js';
export * from './AjvValidator.js';
