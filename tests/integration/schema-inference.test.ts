/**
 * End-to-end schema inference on in-memory dataset exports
 */

import { describe, it, expect } from 'vitest';
import { Inferencer, inferRecordSchema, inferSchema } from '../../src/lib/inferencer/index.js';
import { InferenceError, ConfigError } from '../../src/utils/errors.js';

describe('Schema inference', () => {
  it('should describe a single record', () => {
    const tree = inferRecordSchema({ user: { id: 1, name: 'Al' }, tags: ['x', 'y'] });

    expect(tree).toEqual({
      user: {
        type: 'object',
        properties: {
          id: { type: 'integer', examples: ['1'] },
          name: { type: 'string', examples: ['Al'] },
        },
      },
      tags: { type: 'array', items: { type: 'string', examples: ['x'] } },
    });
  });

  it('should analyze only the first record of a list', () => {
    const result = inferSchema([{ a: 1 }, { b: 'x' }]);

    expect(result.tree).toEqual({ a: { type: 'integer', examples: ['1'] } });
    expect(result.metadata).toEqual({
      documentKind: 'list',
      recordsInDocument: 2,
      recordsAnalyzed: 1,
      representativeRecord: 0,
      pathsDiscovered: 2,
      leafFields: 1,
      dateKeysCollapsed: 0,
    });
  });

  it('should analyze the first value of a record map', () => {
    const result = inferSchema({
      'profile-a': { name: 'Ana', age: 31.5 },
      'profile-b': { email: 'b@example.com' },
    });

    expect(result.tree).toEqual({
      name: { type: 'string', examples: ['Ana'] },
      age: { type: 'float', examples: ['31.5'] },
    });
    expect(result.metadata.documentKind).toBe('map');
    expect(result.metadata.representativeRecord).toBe('profile-a');
  });

  it('should collapse date-keyed counters into one field', () => {
    const result = inferSchema([
      {
        name: 'Ana',
        matches: { '2021-11-08': 3, '2021-11-09': 5 },
      },
    ]);

    expect(result.tree).toEqual({
      name: { type: 'string', examples: ['Ana'] },
      matches: {
        type: 'object',
        properties: {
          'yyyy-mm-dd_1': { type: 'integer', examples: ['3', '5'] },
        },
      },
    });
    expect(result.metadata.dateKeysCollapsed).toBe(2);
  });

  it('should keep date keys literal when normalization is disabled', () => {
    const result = inferSchema([{ matches: { '2021-11-08': 3 } }], { dateFormats: [] });

    expect(result.tree).toEqual({
      matches: {
        type: 'object',
        properties: { '2021-11-08': { type: 'integer', examples: ['3'] } },
      },
    });
  });

  it('should cap examples at maxSamples', () => {
    const daily: Record<string, number> = {};
    for (let day = 1; day <= 12; day++) {
      daily[`2021-11-${String(day).padStart(2, '0')}`] = day;
    }

    const tree = inferRecordSchema({ daily });
    expect(tree).toEqual({
      daily: {
        type: 'object',
        properties: {
          'yyyy-mm-dd_1': {
            type: 'integer',
            examples: ['1', '2', '3', '4', '5', '6', '7', '8', '9', '10'],
          },
        },
      },
    });

    const small = inferRecordSchema({ daily }, { maxSamples: 2 });
    expect(small).toEqual({
      daily: {
        type: 'object',
        properties: { 'yyyy-mm-dd_1': { type: 'integer', examples: ['1', '2'] } },
      },
    });
  });

  it('should return an empty tree for an empty document', () => {
    const result = inferSchema([]);

    expect(result.tree).toEqual({});
    expect(result.metadata.recordsAnalyzed).toBe(0);
    expect(result.metadata.representativeRecord).toBeUndefined();
  });

  it('should reject documents that are not a list or mapping', () => {
    expect(() => inferSchema(42)).toThrow(InferenceError);
  });

  it('should reject a non-positive sample cap', () => {
    expect(() => inferSchema([{}], { maxSamples: 0 })).toThrow(ConfigError);
  });

  it('should reuse options through the Inferencer class', () => {
    const inferencer = new Inferencer({ includeExamples: false });
    expect(inferencer.infer([{ ok: true }]).tree).toEqual({ ok: { type: 'boolean' } });
  });
});
