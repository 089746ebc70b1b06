/**
 * Record Store module exports.
 */

export * from './types.js';
export * from './RecordParser.js';
export * from './RecordStoreImpl.js';
