/**
 * Schema module exports.
 */

export * from './types.js';
export * from './json-schema.js';
export * from './SchemaLoader.js';
export * from './SchemaRegistry.js';
