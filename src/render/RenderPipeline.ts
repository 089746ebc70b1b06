/**
 * RenderPipeline — Turns records into markdown documents.
 *
 * Partitions render in a fixed order: datasets, projects, indices, then the
 * root document. For each partition the template is loaded and every record
 * is read and rendered before the first document is written, so a missing
 * template or a malformed record leaves that partition's output untouched.
 */

import type { RepoAdapter, RepoFile } from '../repo/types.js';
import type { RecordStore } from '../store/types.js';
import type { IndexDocument } from '../model/types.js';
import { CONFIG_FILE, ROOT_DOCUMENT, outputPath, type Partition } from '../repo/PathConvention.js';
import { parseRecord } from '../store/RecordParser.js';
import { StorageError, ValidationError } from '../core/errors.js';
import { systemClock, type Clock } from '../types/common.js';
import { TemplateRenderer } from './TemplateRenderer.js';
import { bindDataset, bindIndex, bindProject, bindRoot, type DocumentLink } from './bindings.js';

export interface RenderPipelineConfig {
  /** Source of `generated_date` (default: system clock) */
  clock?: Clock;
  /** Root document title when config.json carries no name */
  defaultProjectName: string;
}

/**
 * Documents written per partition by one run.
 */
export interface RenderCounts {
  datasets: number;
  projects: number;
  indices: number;
  root: number;
}

interface RenderedDocument {
  path: string;
  content: string;
}

export class RenderPipeline {
  private readonly repo: RepoAdapter;
  private readonly store: RecordStore;
  private readonly renderer: TemplateRenderer;
  private readonly clock: Clock;
  private readonly defaultProjectName: string;

  constructor(repo: RepoAdapter, store: RecordStore, config: RenderPipelineConfig) {
    this.repo = repo;
    this.store = store;
    this.renderer = new TemplateRenderer(repo);
    this.clock = config.clock ?? systemClock;
    this.defaultProjectName = config.defaultProjectName;
  }

  async renderAll(): Promise<RenderCounts> {
    const datasets = await this.renderDatasets();
    const projects = await this.renderProjects();
    const indices = await this.renderIndices();
    const root = await this.renderRoot();
    return { datasets, projects, indices, root };
  }

  async renderDatasets(): Promise<number> {
    const template = await this.renderer.load('dataset');
    const documents = (await this.store.list('datasets')).map(dataset => ({
      path: outputPath('datasets', dataset.slug),
      content: template.render(bindDataset(dataset, this.clock())),
    }));
    return this.writeAll(documents);
  }

  async renderProjects(): Promise<number> {
    const template = await this.renderer.load('project');
    const documents = (await this.store.list('projects')).map(project => ({
      path: outputPath('projects', project.slug),
      content: template.render(bindProject(project, this.clock())),
    }));
    return this.writeAll(documents);
  }

  async renderIndices(): Promise<number> {
    const template = await this.renderer.load('index');
    const documents: RenderedDocument[] = [];
    for (const [name, index] of await this.loadIndices()) {
      documents.push({
        path: outputPath('indices', name),
        content: template.render(bindIndex(name, index, this.clock())),
      });
    }
    return this.writeAll(documents);
  }

  /**
   * Render generated/README.md. Always writes exactly one document.
   */
  async renderRoot(): Promise<number> {
    const template = await this.renderer.load('root');
    const projectName = await this.readProjectName();

    const datasets = await this.store.list('datasets');
    const projects = await this.store.list('projects');
    const indices = await this.loadIndices();

    const links = {
      datasets: datasets.map((d): DocumentLink => ({ name: d.name, link: rootLink('datasets', d.slug) })),
      projects: projects.map((p): DocumentLink => ({ name: p.name, link: rootLink('projects', p.slug) })),
      indices: indices.map(([name, index]): DocumentLink => ({ name: index.title, link: rootLink('indices', name) })),
    };

    return this.writeAll([{
      path: ROOT_DOCUMENT,
      content: template.render(bindRoot(projectName, links, this.clock())),
    }]);
  }

  private async loadIndices(): Promise<Array<[string, IndexDocument]>> {
    const indices: Array<[string, IndexDocument]> = [];
    for (const name of await this.store.listIds('indices')) {
      const index = await this.store.get('indices', name);
      if (index !== null) {
        indices.push([name, index]);
      }
    }
    return indices;
  }

  /**
   * config.json's `name`, read without validating the rest of the file.
   */
  private async readProjectName(): Promise<string> {
    let file: RepoFile | null;
    try {
      file = await this.repo.getFile(CONFIG_FILE);
    } catch (err) {
      throw new StorageError(CONFIG_FILE, 'read', err);
    }
    if (!file) {
      return this.defaultProjectName;
    }

    const result = parseRecord(file.content);
    if (!result.success || result.data === undefined) {
      throw new ValidationError(CONFIG_FILE, [{
        path: '/',
        message: result.error ?? 'Unparseable config',
        keyword: 'parse',
      }]);
    }

    const name = result.data['name'];
    return typeof name === 'string' && name.length > 0 ? name : this.defaultProjectName;
  }

  private async writeAll(documents: RenderedDocument[]): Promise<number> {
    for (const document of documents) {
      const result = await this.repo.writeFile(document);
      if (!result.success) {
        throw new StorageError(document.path, 'write', result.error ?? 'unknown error');
      }
    }
    return documents.length;
  }
}

/**
 * Link from generated/README.md to a rendered document.
 */
function rootLink(partition: Partition, id: string): string {
  return `${partition}/${id}.md`;
}

export function createRenderPipeline(
  repo: RepoAdapter,
  store: RecordStore,
  config: RenderPipelineConfig
): RenderPipeline {
  return new RenderPipeline(repo, store, config);
}
