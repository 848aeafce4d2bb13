import { describe, expect, it } from 'vitest';
import { SchemaMismatchError } from '../utils/errors.js';
import { parseStructured, serializeStructured } from './structured.js';

class Point {
  constructor(
    readonly x: number,
    readonly y: number
  ) {}
}

describe('serializeStructured', () => {
  it('should pass flat containers straight to JSON', () => {
    expect(serializeStructured({ a: [1, 'two', null], b: { c: true } })).toBe(
      '{"a":[1,"two",null],"b":{"c":true}}'
    );
  });

  it('should normalize dates, bigints and bytes', () => {
    const value = {
      at: new Date(Date.UTC(2024, 0, 2)),
      big: 2n ** 64n,
      small: 3n,
      bytes: new Uint8Array([1, 2, 3]),
    };
    expect(serializeStructured(value)).toBe(
      '{"at":"2024-01-02T00:00:00.000Z","big":"18446744073709551616","small":3,"bytes":"AQID"}'
    );
  });

  it('should turn maps into objects and sets into arrays', () => {
    expect(serializeStructured(new Map<string, number>([['a', 1]]))).toBe('{"a":1}');
    expect(serializeStructured(new Set(['x', 'y']))).toBe('["x","y"]');
  });

  it('should serialize class instances by their own fields', () => {
    expect(serializeStructured([new Point(1, 2)])).toBe('[{"x":1,"y":2}]');
  });

  it('should drop functions and undefined fields', () => {
    expect(serializeStructured({ a: 1, fn: () => 1, gone: undefined, when: new Date(0) })).toBe(
      '{"a":1,"when":"1970-01-01T00:00:00.000Z"}'
    );
  });

  it('should reject circular structures', () => {
    const node: Record<string, unknown> = { name: 'loop', at: new Date(0) };
    node.self = node;
    expect(() => serializeStructured(node)).toThrow(SchemaMismatchError);
  });
});

describe('parseStructured', () => {
  it('should report parse failures instead of throwing', () => {
    expect(parseStructured('[1,2]')).toEqual({ ok: true, value: [1, 2] });
    const failed = parseStructured('{oops');
    expect(failed.ok).toBe(false);
  });
});
