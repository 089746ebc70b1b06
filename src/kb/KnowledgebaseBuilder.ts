/**
 * KnowledgebaseBuilder — The `build` command.
 *
 * Indices are rebuilt to completion before anything is rendered; rendering
 * then runs datasets, projects, indices and the root document in order.
 */

import { IndexBuilder } from '../index/IndexBuilder.js';
import { RenderPipeline } from '../render/RenderPipeline.js';
import { systemClock, type Clock } from '../types/common.js';
import { defaultProjectName } from './Knowledgebase.js';
import type { BuildReport, Knowledgebase } from './types.js';

export interface BuildOptions {
  clock?: Clock;
}

export async function buildKnowledgebase(kb: Knowledgebase, options: BuildOptions = {}): Promise<BuildReport> {
  const clock = options.clock ?? systemClock;
  console.log('Building knowledgebase...');

  await new IndexBuilder(kb.store, { clock }).rebuild();

  const pipeline = new RenderPipeline(kb.repo, kb.store, {
    clock,
    defaultProjectName: defaultProjectName(kb.root),
  });

  const datasets = await pipeline.renderDatasets();
  console.log(`Generated ${datasets} dataset pages`);

  const projects = await pipeline.renderProjects();
  console.log(`Generated ${projects} project pages`);

  const indices = await pipeline.renderIndices();
  console.log(`Generated ${indices} index pages`);

  const root = await pipeline.renderRoot();
  console.log('Generated main README.md');

  console.log('✓ Build completed successfully!');
  return { datasets, projects, indices, root };
}
