/**
 * kbmd — Research dataset and project knowledgebase rendered to markdown.
 *
 * This is the main entry point for the library.
 */

// Types
export * from './types/common.js';
export * from './model/types.js';
export * from './core/errors.js';

// Schema loading and registry
export * from './schema/index.js';

// Validation
export * from './validation/index.js';

// Repository adapter
export * from './repo/index.js';

// Record store
export * from './store/index.js';

// Derived indices
export * from './index/index.js';

// Template rendering
export * from './render/index.js';

// init / add / build
export * from './kb/index.js';

// Per-user configuration
export * from './config/index.js';
