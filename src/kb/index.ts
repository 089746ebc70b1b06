/**
 * Knowledgebase module — init, add and build.
 */

export * from './types.js';
export * from './Knowledgebase.js';
export * from './GitProbe.js';
export * from './KnowledgebaseInitializer.js';
export * from './EntryFactory.js';
export * from './KnowledgebaseBuilder.js';
