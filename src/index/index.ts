/**
 * Index module.
 *
 * Derived cross-reference indices over datasets and projects.
 */

export * from './types.js';
export * from './IndexBuilder.js';
