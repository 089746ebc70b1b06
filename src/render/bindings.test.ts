/**
 * Tests for template bindings.
 */

import { describe, it, expect } from 'vitest';
import { bindDataset, bindIndex, checkBindings, displayTimestamp, formatTimestamp } from './bindings.js';
import { ValidationError } from '../core/errors.js';
import type { Dataset } from '../model/types.js';

const GENERATED = new Date('2024-03-05T09:07:02.123Z');

const dataset: Dataset = {
  name: 'RNA',
  slug: 'rna',
  path: '/scratch/rna',
  description: 'Reads',
  size: '1 GB',
  file_type: 'FASTQ',
  data_source: 'Sequencer',
  last_modified: '2024-01-01T10:20:30.000Z',
  date_added: '2024-01-02T00:00:00.000Z',
  related_projects: [],
  tags: ['genomics'],
};

describe('formatTimestamp', () => {
  it('formats in UTC without fractional seconds', () => {
    expect(formatTimestamp(GENERATED)).toBe('2024-03-05 09:07:02');
  });
});

describe('displayTimestamp', () => {
  it('converts an offset timestamp to UTC', () => {
    expect(displayTimestamp('2024-01-01T12:30:00+02:00')).toBe('2024-01-01 10:30:00');
  });

  it('shows a timestamp without an offset as written', () => {
    expect(displayTimestamp('2024-01-01T10:00:00.123456')).toBe('2024-01-01 10:00:00');
  });

  it('leaves other text alone', () => {
    expect(displayTimestamp('sometime in May')).toBe('sometime in May');
  });
});

describe('bindDataset', () => {
  it('binds every dataset variable', () => {
    const bindings = bindDataset(dataset, GENERATED);

    expect(bindings.generated_date).toBe('2024-03-05 09:07:02');
    expect(bindings.last_modified).toBe('2024-01-01 10:20:30');
    expect(bindings.date_added).toBe('2024-01-02 00:00:00');
    expect(bindings.size_bytes).toBeUndefined();
    expect(bindings.tags).toEqual(['genomics']);
  });

  it('passes the check for its kind', () => {
    expect(() => checkBindings('dataset', bindDataset(dataset, GENERATED))).not.toThrow();
  });
});

describe('bindIndex', () => {
  it('shows the calendar date of last_updated', () => {
    const bindings = bindIndex('by-topic', {
      title: 'Browse by Research Topic',
      description: 'Projects organized by research topic and domain',
      entries: [],
      last_updated: '2024-03-05T09:07:02.000Z',
    }, GENERATED);

    expect(bindings.name).toBe('by-topic');
    expect(bindings.last_updated).toBe('2024-03-05');
  });
});

describe('checkBindings', () => {
  it('rejects a missing required variable', () => {
    expect(() => checkBindings('root', {
      datasets: [],
      projects: [],
      indices: [],
      generated_date: '2024-03-05 09:07:02',
    })).toThrow("Invalid record bindings for template 'root': /project_name Missing required template variable");
  });

  it('rejects a null required variable', () => {
    expect(() => checkBindings('index', {
      name: 'by-topic',
      title: null,
      description: 'd',
      entries: [],
      last_updated: '2024-03-05',
      generated_date: '2024-03-05 09:07:02',
    })).toThrow(ValidationError);
  });

  it('rejects an undeclared variable', () => {
    try {
      checkBindings('root', {
        project_name: 'kb',
        datasets: [],
        projects: [],
        indices: [],
        generated_date: '2024-03-05 09:07:02',
        extra: true,
      });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ValidationError);
      if (err instanceof ValidationError) {
        expect(err.issues).toEqual([
          { path: '/extra', message: 'Undeclared template variable', keyword: 'additionalProperties' },
        ]);
      }
    }
  });
});
