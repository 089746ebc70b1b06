/**
 * Render module — templates to markdown.
 */

export * from './bindings.js';
export * from './TemplateRenderer.js';
export * from './RenderPipeline.js';
