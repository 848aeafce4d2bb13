import { describe, expect, it } from 'vitest';
import { asRawValue, isStorageValue, storageValueOf, toBindable } from './storage-value.js';

describe('asRawValue', () => {
  it('should give each kind its raw representation', () => {
    expect(asRawValue({ kind: 'text', value: 'a' })).toBe('a');
    expect(asRawValue({ kind: 'structured', value: '[]' })).toBe('[]');
    expect(asRawValue({ kind: 'integer', value: 3n })).toBe(3n);
    expect(asRawValue({ kind: 'real', value: 0.5 })).toBe(0.5);
    expect(asRawValue({ kind: 'boolean', value: true })).toBe(1);
    expect(asRawValue({ kind: 'boolean', value: false })).toBe(0);
    expect(asRawValue({ kind: 'date', value: new Date(Date.UTC(2024, 5, 1, 8)) })).toBe(
      '2024-06-01 08:00:00.000'
    );
    expect(asRawValue(null)).toBeNull();
  });

  it('should bind blobs as buffers', () => {
    const raw = asRawValue({ kind: 'blob', value: new Uint8Array([9, 8]) });
    expect(Buffer.isBuffer(raw)).toBe(true);
    expect(raw).toEqual(Buffer.from([9, 8]));
  });
});

describe('storageValueOf', () => {
  it('should infer the kind of plain values', () => {
    expect(storageValueOf(1)).toEqual({ kind: 'integer', value: 1 });
    expect(storageValueOf(1.25)).toEqual({ kind: 'real', value: 1.25 });
    expect(storageValueOf('x')).toEqual({ kind: 'text', value: 'x' });
  });

  it('should return storage values unchanged', () => {
    const value = { kind: 'structured', value: '{}' } as const;
    expect(storageValueOf(value)).toBe(value);
  });
});

describe('isStorageValue', () => {
  it('should check the kind against the payload', () => {
    expect(isStorageValue({ kind: 'integer', value: 2 })).toBe(true);
    expect(isStorageValue({ kind: 'integer', value: 2.5 })).toBe(false);
    expect(isStorageValue({ kind: 'date', value: '2024-01-01' })).toBe(false);
    expect(isStorageValue({ kind: 'other', value: 1 })).toBe(false);
    expect(isStorageValue('text')).toBe(false);
  });
});

describe('toBindable', () => {
  it('should normalize filter values', () => {
    expect(toBindable(true)).toBe(1);
    expect(toBindable(undefined)).toBeNull();
    expect(toBindable({ kind: 'text', value: 'id-1' })).toBe('id-1');
  });
});
