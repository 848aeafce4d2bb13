import { describe, expect, it } from 'vitest';
import { z } from 'zod';
import type { DatabaseRow } from '../driver/types.js';
import { column, defineTable } from '../schema/table-definition.js';
import type { RawValue } from '../types/index.js';
import { DecodingError } from '../utils/errors.js';
import { DirectDecoder } from './index.js';

function row(values: Record<string, RawValue>): DatabaseRow {
  return {
    columnNames: Object.keys(values),
    get: (name) => values[name],
  };
}

function decodingError(fn: () => unknown): DecodingError {
  try {
    fn();
  } catch (error) {
    if (error instanceof DecodingError) return error;
    throw error;
  }
  throw new Error('expected a DecodingError');
}

describe('DirectDecoder', () => {
  const notes = defineTable('notes', [
    column('id', 'text', { primaryKey: true }),
    column('count', 'integer'),
    column('tags', 'text'),
  ]);

  it('should expose keys and nil checks', () => {
    const decoder = DirectDecoder.fromRow(row({ id: 'n1', body: null }));

    expect(decoder.allKeys).toEqual(['id', 'body']);
    expect(decoder.contains('id')).toBe(true);
    expect(decoder.contains('missing')).toBe(false);
    expect(decoder.isNil('body')).toBe(true);
    expect(decoder.isNil('missing')).toBe(true);
    expect(decoder.isNil('id')).toBe(false);
  });

  it('should report declared column types before inferring', () => {
    const decoder = DirectDecoder.fromValues({ count: '4', score: 1.5 }, { tableDefinition: notes });

    expect(decoder.columnType('count')).toBe('integer');
    expect(decoder.columnType('score')).toBe('double');
  });

  it('should decode typed values', () => {
    const decoder = DirectDecoder.fromRow(
      row({ id: 'n1', count: 3, done: 1, createdAt: '2023-03-15 13:20:00.000' })
    );

    expect(decoder.decode('id', 'string')).toBe('n1');
    expect(decoder.decode('count', 'integer')).toBe(3);
    expect(decoder.decode('done', 'boolean')).toBe(true);
    expect(decoder.decode('createdAt', 'date').getTime()).toBe(Date.UTC(2023, 2, 15, 13, 20));
  });

  it('should decode structured text with a schema', () => {
    const decoder = DirectDecoder.fromValues({ tags: '["a","b"]' });
    expect(decoder.decode('tags', z.array(z.string()))).toEqual(['a', 'b']);
  });

  it('should fail with keyNotFound for absent fields', () => {
    const decoder = DirectDecoder.fromRow(row({ id: 'n1' }));
    const error = decodingError(() => decoder.decode('title', 'string'));

    expect(error.kind).toBe('keyNotFound');
    expect(error.field).toBe('title');
    expect(error.availableColumns).toEqual(['id']);
    expect(error.message).toBe(
      'Key "title" not found while decoding string. Available columns: [id]'
    );
  });

  it('should fail with valueNotFound for null fields', () => {
    const decoder = DirectDecoder.fromRow(row({ id: null }));
    expect(decodingError(() => decoder.decode('id', 'string')).kind).toBe('valueNotFound');
  });

  it('should fail with typeMismatch for inconvertible values', () => {
    const decoder = DirectDecoder.fromRow(row({ count: 'lots' }));
    const error = decodingError(() => decoder.decode('count', 'integer'));

    expect(error.kind).toBe('typeMismatch');
    expect(error.target).toBe('integer');
  });

  it('should fail with dataCorrupted for unparseable structured text', () => {
    const decoder = DirectDecoder.fromValues({ tags: '[oops' });
    expect(decodingError(() => decoder.decode('tags', z.array(z.string()))).kind).toBe(
      'dataCorrupted'
    );
  });

  it('should only infer across types for undeclared fields', () => {
    const values = { count: '7', extra: '7' };
    const decoder = DirectDecoder.fromValues(values, { tableDefinition: notes, autoInfer: true });

    expect(decoder.decode('extra', 'integer')).toBe(7);
    expect(decodingError(() => decoder.decode('count', 'integer')).kind).toBe('typeMismatch');
  });

  it('should return null from decodeIfPresent for absent and nil fields', () => {
    const decoder = DirectDecoder.fromValues(new Map<string, unknown>([['title', null]]));

    expect(decoder.decodeIfPresent('title', 'string')).toBeNull();
    expect(decoder.decodeIfPresent('missing', 'string')).toBeNull();
  });

  it('should still fail decodeIfPresent on mismatched values', () => {
    const decoder = DirectDecoder.fromValues({ due: 'soon' });
    expect(decodingError(() => decoder.decodeIfPresent('due', 'date')).kind).toBe(
      'typeMismatch'
    );
  });
});
