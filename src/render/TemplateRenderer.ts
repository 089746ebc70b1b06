/**
 * TemplateRenderer — Loads a knowledgebase's templates through nunjucks.
 */

import { join } from 'node:path';
import nunjucks from 'nunjucks';
import type { Environment, Template } from 'nunjucks';
import type { RepoAdapter } from '../repo/types.js';
import { TEMPLATES_DIR, templatePath, type TemplateKind } from '../repo/PathConvention.js';
import { NotFoundError, StorageError } from '../core/errors.js';
import { checkBindings, type BindingsByKind } from './bindings.js';

/**
 * A template ready to render variable tables of its kind.
 */
export interface LoadedTemplate<K extends TemplateKind> {
  kind: K;
  render(bindings: BindingsByKind[K]): string;
}

export class TemplateRenderer {
  private readonly repo: RepoAdapter;
  private readonly env: Environment;

  constructor(repo: RepoAdapter) {
    this.repo = repo;
    // Markdown output: no HTML escaping. Block tags swallow their own line.
    this.env = new nunjucks.Environment(
      new nunjucks.FileSystemLoader(join(repo.basePath, TEMPLATES_DIR), { noCache: true }),
      { autoescape: false, trimBlocks: true, lstripBlocks: true }
    );
  }

  /**
   * Load and compile the template for a kind.
   *
   * @throws NotFoundError when `templates/<kind>.jinja` is missing
   */
  async load<K extends TemplateKind>(kind: K): Promise<LoadedTemplate<K>> {
    const path = templatePath(kind);
    let present: boolean;
    try {
      present = await this.repo.fileExists(path);
    } catch (err) {
      throw new StorageError(path, 'read', err);
    }
    if (!present) {
      throw new NotFoundError('template', path);
    }

    const template: Template = this.env.getTemplate(path.slice(TEMPLATES_DIR.length + 1), true);

    return {
      kind,
      render: (bindings: BindingsByKind[K]): string => {
        checkBindings(kind, bindings);
        return template.render(bindings);
      },
    };
  }
}
