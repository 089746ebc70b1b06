/**
 * Tests for the knowledgebase workflows: locate, init, add and build.
 */

import { describe, it, expect, beforeAll, beforeEach, afterEach, vi } from 'vitest';
import { mkdir, rm, readFile, readdir, stat, writeFile } from 'node:fs/promises';
import { basename, join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';

import { defaultProjectName, locateKnowledgebase } from './Knowledgebase.js';
import { BUNDLED_TEMPLATE_DIR, initKnowledgebase, type InitResult } from './KnowledgebaseInitializer.js';
import { addDataset, addProject, createDatasetRecord, createProjectRecord, parseTags } from './EntryFactory.js';
import { buildKnowledgebase } from './KnowledgebaseBuilder.js';
import type { GitProbe } from './types.js';
import { SchemaRegistry } from '../schema/SchemaRegistry.js';
import { BUNDLED_SCHEMA_DIR } from '../schema/SchemaLoader.js';
import {
  DuplicateRecordError,
  InitializationError,
  NotFoundError,
  StorageError,
  ValidationError,
} from '../core/errors.js';

const FIXED = new Date('2024-03-05T09:07:02.000Z');
const clock = (): Date => FIXED;

function fakeGit(root: string | null): GitProbe {
  return { repositoryRoot: async () => root };
}

describe('knowledgebase workflows', () => {
  let schemas: SchemaRegistry;
  let testDir: string;

  beforeAll(async () => {
    schemas = await SchemaRegistry.load();
  });

  beforeEach(async () => {
    testDir = join(tmpdir(), `kbmd-kb-test-${randomUUID()}`);
    await mkdir(testDir, { recursive: true });
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(testDir, { recursive: true, force: true });
  });

  function init(options: { name?: string } = {}): Promise<InitResult> {
    return initKnowledgebase({ directory: testDir, git: fakeGit(testDir), clock, schemas, ...options });
  }

  describe('initKnowledgebase', () => {
    it('creates the layout', async () => {
      const kb = await init();
      const root = join(testDir, '.kbmd');

      expect(kb.root).toBe(root);
      for (const dir of ['templates', 'data/datasets', 'data/projects', 'data/indices',
        'generated/datasets', 'generated/projects', 'generated/indices']) {
        expect((await stat(join(root, dir))).isDirectory()).toBe(true);
      }
    });

    it('copies the bundled templates', async () => {
      await init();

      const copied = (await readdir(join(testDir, '.kbmd', 'templates'))).sort();
      expect(copied).toEqual(['dataset.jinja', 'index.jinja', 'project.jinja', 'root.jinja']);
      expect(await readFile(join(testDir, '.kbmd', 'templates', 'root.jinja'), 'utf-8')).toBe(
        await readFile(join(BUNDLED_TEMPLATE_DIR, 'root.jinja'), 'utf-8')
      );
    });

    it('writes empty indices and a validated config', async () => {
      const kb = await init({ name: 'lab-kb' });

      expect(await kb.store.listIds('indices')).toEqual(['by-filesystem', 'by-topic']);
      expect((await kb.store.get('indices', 'by-topic'))?.entries).toEqual([]);
      expect(await kb.store.getConfig()).toEqual({
        name: 'lab-kb',
        description: 'Knowledgebase for lab-kb',
        created: '2024-03-05T09:07:02.000Z',
        git_repo_path: testDir,
        custom_templates: false,
        auto_update_indices: true,
        generate_cross_references: true,
      });
    });

    it('names the knowledgebase after its directory by default', async () => {
      const kb = await init();

      expect(kb.config.name).toBe(basename(testDir));
    });

    it('refuses a directory outside git', async () => {
      const attempt = initKnowledgebase({ directory: testDir, git: fakeGit(null), clock, schemas });

      await expect(attempt).rejects.toThrow(InitializationError);
      await expect(stat(join(testDir, '.kbmd'))).rejects.toThrow();
    });

    it('reports a file in place of the directory as a storage failure', async () => {
      const file = join(testDir, 'plain.txt');
      await writeFile(file, 'not a directory');

      const attempt = initKnowledgebase({ directory: file, git: fakeGit(testDir), clock, schemas });

      await expect(attempt).rejects.toThrow(StorageError);
    });

    it('refuses an existing .kbmd', async () => {
      await init();

      await expect(init()).rejects.toThrow(`Cannot initialize knowledgebase in ${testDir}: .kbmd directory already exists`);
    });
  });

  describe('locateKnowledgebase', () => {
    it('walks up to the nearest .kbmd', async () => {
      await init();
      const nested = join(testDir, 'projects', 'deep');
      await mkdir(nested, { recursive: true });

      expect(await locateKnowledgebase(nested)).toBe(join(testDir, '.kbmd'));
      expect(defaultProjectName(join(testDir, '.kbmd'))).toBe(basename(testDir));
    });

    it('fails without a .kbmd above', async () => {
      await expect(locateKnowledgebase(testDir)).rejects.toThrow(NotFoundError);
    });
  });

  describe('entries', () => {
    it('parses comma-separated tags', () => {
      expect(parseTags(' raw, processed ,, qc ')).toEqual(['raw', 'processed', 'qc']);
      expect(parseTags('')).toEqual([]);
    });

    it('derives a dataset record', async () => {
      const target = join(testDir, 'Mouse Brain (2024)');
      await writeFile(target, 'data');
      const mtime = (await stat(target)).mtime.toISOString();

      const dataset = await createDatasetRecord({
        path: target,
        description: 'Slices',
        size: '4 KB',
        file_type: 'TIFF',
        data_source: 'Scope',
        file_count: 12,
        tags: ['imaging'],
      }, schemas, { clock });

      expect(dataset).toEqual({
        name: 'Mouse Brain (2024)',
        slug: 'mouse-brain-2024',
        path: target,
        description: 'Slices',
        size: '4 KB',
        file_type: 'TIFF',
        file_count: 12,
        data_source: 'Scope',
        last_modified: mtime,
        date_added: '2024-03-05T09:07:02.000Z',
        related_projects: [],
        tags: ['imaging'],
      });
    });

    it('stamps now and warns when the dataset path is missing', async () => {
      const missing = join(testDir, 'missing');

      const dataset = await createDatasetRecord({
        path: missing,
        name: 'Missing Set',
        description: 'd',
        size: '1 B',
        file_type: 'CSV',
        data_source: 's',
      }, schemas, { clock });

      expect(dataset.last_modified).toBe('2024-03-05T09:07:02.000Z');
      expect(console.warn).toHaveBeenCalledWith(`Warning: Path ${missing} does not exist`);
    });

    it('rejects a name with an empty slug', async () => {
      await expect(createDatasetRecord({
        path: testDir,
        name: '???',
        description: 'd',
        size: '1 B',
        file_type: 'CSV',
        data_source: 's',
      }, schemas, { clock })).rejects.toThrow("Invalid record dataset '???': /slug Name produces an empty slug");
    });

    it('derives a project record with defaults', async () => {
      const project = await createProjectRecord({
        path: join(testDir, 'atlas'),
        description: 'Mapping',
        objectives: 'Map it',
        date_started: '2023-01-01',
        principal_investigator: 'Dr. Example',
      }, schemas, { clock });

      expect(project.slug).toBe('atlas');
      expect(project.status).toBe('active');
      expect(project.date_added).toBe('2024-03-05T09:07:02.000Z');
      expect(project.collaborators).toEqual([]);
      expect(project).not.toHaveProperty('date_completed');
    });

    it('rejects an unknown status and a malformed date', async () => {
      const fields = {
        path: join(testDir, 'atlas'),
        description: 'Mapping',
        objectives: 'Map it',
        date_started: '2023-01-01',
        principal_investigator: 'Dr. Example',
      };

      await expect(createProjectRecord({ ...fields, status: 'paused' }, schemas, { clock }))
        .rejects.toThrow(ValidationError);
      await expect(createProjectRecord({ ...fields, date_started: '01/02/2023' }, schemas, { clock }))
        .rejects.toThrow(ValidationError);
    });

    it('rejects a duplicate slug unless forced', async () => {
      const kb = await init();
      const fields = {
        path: join(testDir, 'set'),
        name: 'Shared Set',
        description: 'First',
        size: '1 B',
        file_type: 'CSV',
        data_source: 's',
      };

      await addDataset(kb, fields, { clock });
      await expect(addDataset(kb, { ...fields, description: 'Second' }, { clock }))
        .rejects.toThrow(DuplicateRecordError);

      await addDataset(kb, { ...fields, description: 'Third' }, { clock, force: true });
      expect((await kb.store.get('datasets', 'shared-set'))?.description).toBe('Third');
    });
  });

  describe('buildKnowledgebase', () => {
    it('builds an empty knowledgebase', async () => {
      const kb = await init({ name: 'lab-kb' });

      const report = await buildKnowledgebase(kb, { clock });

      expect(report).toEqual({ datasets: 0, projects: 0, indices: 2, root: 1 });
      const readme = await readFile(join(kb.root, 'generated', 'README.md'), 'utf-8');
      expect(readme.startsWith('# lab-kb\n')).toBe(true);
      expect(console.log).toHaveBeenCalledWith('Generated 0 dataset pages');
      expect(console.log).toHaveBeenCalledWith('✓ Build completed successfully!');
    });

    it('builds hand-written records that omit defaulted fields', async () => {
      const kb = await initKnowledgebase({
        directory: testDir,
        git: fakeGit(testDir),
        clock,
        schemas: await SchemaRegistry.load(BUNDLED_SCHEMA_DIR, { clock }),
      });
      await writeFile(join(kb.root, 'data', 'datasets', 'hand.json'), JSON.stringify({
        name: 'Hand Set',
        slug: 'hand',
        path: '/scratch/hand',
        description: 'Written by hand',
        size: '1 MB',
        file_type: 'CSV',
        data_source: 'Bench',
        last_modified: '2024-01-01T10:00:00.123456',
      }));
      await writeFile(join(kb.root, 'data', 'projects', 'survey.json'), JSON.stringify({
        name: 'Survey',
        slug: 'survey',
        path: '/home/lab/survey',
        description: 'Field survey',
        objectives: 'Count things',
        status: 'active',
        date_started: '2023-05-01',
        principal_investigator: 'Dr. Example',
        collaborators: [{ name: 'A. Person', role: 'Technician' }],
      }));

      expect(await buildKnowledgebase(kb, { clock })).toEqual({ datasets: 1, projects: 1, indices: 2, root: 1 });

      const page = await readFile(join(kb.root, 'generated', 'datasets', 'hand.md'), 'utf-8');
      expect(page).toContain('\n- **Last modified:** 2024-01-01 10:00:00\n- **Added:** 2024-03-05 09:07:02\n');
      expect((await kb.store.get('indices', 'by-topic'))?.entries.map(group => group.category)).toEqual(['Untagged']);
    });

    it('rebuilds identically with a fixed clock', async () => {
      const kb = await init();
      await addDataset(kb, {
        path: join(testDir, 'scratch-set'),
        description: 'd',
        size: '1 B',
        file_type: 'CSV',
        data_source: 's',
      }, { clock });
      await addProject(kb, {
        path: join(testDir, 'atlas'),
        description: 'Mapping',
        objectives: 'Map it',
        date_started: '2023-01-01',
        principal_investigator: 'Dr. Example',
        tags: ['bio'],
      }, { clock });

      const outputs = ['README.md', 'datasets/scratch-set.md', 'projects/atlas.md',
        'indices/by-filesystem.md', 'indices/by-topic.md'].map(path => join(kb.root, 'generated', path));

      expect(await buildKnowledgebase(kb, { clock })).toEqual({ datasets: 1, projects: 1, indices: 2, root: 1 });
      const first = await Promise.all(outputs.map(path => readFile(path, 'utf-8')));
      const firstIndex = await readFile(join(kb.root, 'data', 'indices', 'by-topic.json'), 'utf-8');

      await buildKnowledgebase(kb, { clock });
      expect(await Promise.all(outputs.map(path => readFile(path, 'utf-8')))).toEqual(first);
      expect(await readFile(join(kb.root, 'data', 'indices', 'by-topic.json'), 'utf-8')).toBe(firstIndex);
    });
  });
});
