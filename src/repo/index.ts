/**
 * Repository module exports.
 */

export * from './types.js';
export * from './PathConvention.js';
export * from './LocalRepoAdapter.js';
