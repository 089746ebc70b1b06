/**
 * Tests for Repository Adapter module.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, rm, writeFile, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';

import {
  documentLink,
  getPartitionDirectory,
  outputPath,
  parseRecordPath,
  recordPath,
  slugify,
  templatePath,
} from './PathConvention.js';

import { createLocalRepoAdapter, LocalRepoAdapter } from './LocalRepoAdapter.js';

describe('PathConvention', () => {
  describe('slugify', () => {
    it('converts to lowercase', () => {
      expect(slugify('Hello World')).toBe('hello-world');
    });

    it('removes special characters', () => {
      expect(slugify('RNA-seq (batch #2)!')).toBe('rna-seq-batch-2');
    });

    it('collapses whitespace and dash runs', () => {
      expect(slugify('  mouse   brain -- atlas ')).toBe('mouse-brain-atlas');
    });

    it('trims leading/trailing dashes', () => {
      expect(slugify('--test--')).toBe('test');
    });

    it('drops non-ASCII letters', () => {
      expect(slugify('Überblick Daten')).toBe('berblick-daten');
    });

    it('returns an empty slug when nothing survives', () => {
      expect(slugify('!!! ???')).toBe('');
    });
  });

  describe('paths', () => {
    it('builds record paths', () => {
      expect(getPartitionDirectory('projects')).toBe('data/projects');
      expect(recordPath('datasets', 'rna-seq')).toBe('data/datasets/rna-seq.json');
      expect(recordPath('indices', 'by-topic')).toBe('data/indices/by-topic.json');
    });

    it('rejects an empty record id', () => {
      expect(() => recordPath('datasets', '  ')).toThrow('record id is required');
    });

    it('builds output and template paths', () => {
      expect(outputPath('indices', 'by-filesystem')).toBe('generated/indices/by-filesystem.md');
      expect(templatePath('root')).toBe('templates/root.jinja');
    });

    it('links from index pages to record pages', () => {
      expect(documentLink('datasets', 'rna-seq')).toBe('../datasets/rna-seq.md');
      expect(documentLink('projects', 'atlas')).toBe('../projects/atlas.md');
    });
  });

  describe('parseRecordPath', () => {
    it('parses a record path', () => {
      expect(parseRecordPath('data/projects/atlas.json')).toEqual({
        partition: 'projects',
        id: 'atlas',
        path: 'data/projects/atlas.json',
      });
    });

    it('normalizes backslashes', () => {
      expect(parseRecordPath('data\\datasets\\rna.json')?.id).toBe('rna');
    });

    it('returns null for unknown partitions and other files', () => {
      expect(parseRecordPath('data/notes/a.json')).toBeNull();
      expect(parseRecordPath('data/projects/atlas.md')).toBeNull();
      expect(parseRecordPath('generated/projects/atlas.json')).toBeNull();
    });
  });
});

describe('LocalRepoAdapter', () => {
  let testDir: string;
  let adapter: LocalRepoAdapter;

  beforeEach(async () => {
    testDir = join(tmpdir(), `kbmd-repo-test-${randomUUID()}`);
    await mkdir(testDir, { recursive: true });
    adapter = createLocalRepoAdapter({ basePath: testDir });
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  describe('getFile', () => {
    it('reads existing file', async () => {
      await writeFile(join(testDir, 'test.json'), '{"a":1}');

      const file = await adapter.getFile('test.json');

      expect(file).toEqual({ path: 'test.json', content: '{"a":1}', size: 7 });
    });

    it('returns null for missing file', async () => {
      expect(await adapter.getFile('nonexistent.json')).toBeNull();
    });
  });

  describe('fileExists', () => {
    it('is true for files only', async () => {
      await mkdir(join(testDir, 'data'), { recursive: true });
      await writeFile(join(testDir, 'data', 'a.json'), '{}');

      expect(await adapter.fileExists('data/a.json')).toBe(true);
      expect(await adapter.fileExists('data')).toBe(false);
      expect(await adapter.fileExists('data/b.json')).toBe(false);
    });
  });

  describe('listFiles', () => {
    beforeEach(async () => {
      await mkdir(join(testDir, 'data', 'datasets', 'nested'), { recursive: true });
      await writeFile(join(testDir, 'data', 'datasets', 'b.json'), '{}');
      await writeFile(join(testDir, 'data', 'datasets', 'a.json'), '{}');
      await writeFile(join(testDir, 'data', 'datasets', 'notes.txt'), 'x');
      await writeFile(join(testDir, 'data', 'datasets', 'nested', 'c.json'), '{}');
    });

    it('lists matching files sorted, skipping subdirectories', async () => {
      const files = await adapter.listFiles({ directory: 'data/datasets', pattern: '*.json' });

      expect(files).toEqual(['data/datasets/a.json', 'data/datasets/b.json']);
    });

    it('returns empty for a missing directory', async () => {
      expect(await adapter.listFiles({ directory: 'data/projects' })).toEqual([]);
    });
  });

  describe('createFile', () => {
    it('creates file and parent directories', async () => {
      const result = await adapter.createFile({ path: 'data/projects/p.json', content: '{}\n' });

      expect(result.success).toBe(true);
      expect(await readFile(join(testDir, 'data', 'projects', 'p.json'), 'utf-8')).toBe('{}\n');
    });

    it('fails if file exists', async () => {
      await writeFile(join(testDir, 'existing.json'), 'old');

      const result = await adapter.createFile({ path: 'existing.json', content: 'new' });

      expect(result).toEqual({ success: false, error: 'File already exists: existing.json' });
      expect(await readFile(join(testDir, 'existing.json'), 'utf-8')).toBe('old');
    });
  });

  describe('writeFile', () => {
    it('replaces an existing file', async () => {
      await writeFile(join(testDir, 'existing.json'), 'old');

      const result = await adapter.writeFile({ path: 'existing.json', content: 'new' });

      expect(result.success).toBe(true);
      expect(await readFile(join(testDir, 'existing.json'), 'utf-8')).toBe('new');
    });
  });

  describe('ensureDirectory', () => {
    it('creates nested directories idempotently', async () => {
      await adapter.ensureDirectory('generated/indices');
      await adapter.ensureDirectory('generated/indices');

      await writeFile(join(testDir, 'generated', 'indices', 'x.md'), '');
      expect(await adapter.fileExists('generated/indices/x.md')).toBe(true);
    });
  });
});
