/**
 * User configuration module.
 */

export * from './types.js';
export * from './loader.js';
