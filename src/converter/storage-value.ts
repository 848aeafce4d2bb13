import type { RawValue, StorageValue } from '../types/index.js';
import { formatStorageDate } from './dates.js';

export type Scalar = string | number | bigint | boolean | Date | Uint8Array;

/** Anything accepted where a single bound value is expected (filters, ids, defaults). */
export type QueryValue = Scalar | StorageValue;

export function isStorageValue(value: unknown): value is StorageValue {
  if (typeof value !== 'object' || value === null) return false;
  if (!('kind' in value) || !('value' in value)) return false;

  const inner = value.value;
  switch (value.kind) {
    case 'text':
    case 'structured':
      return typeof inner === 'string';
    case 'integer':
      return typeof inner === 'bigint' || (typeof inner === 'number' && Number.isInteger(inner));
    case 'real':
      return typeof inner === 'number';
    case 'boolean':
      return typeof inner === 'boolean';
    case 'date':
      return inner instanceof Date;
    case 'blob':
      return inner instanceof Uint8Array;
    default:
      return false;
  }
}

export function isScalar(value: unknown): value is Scalar {
  switch (typeof value) {
    case 'string':
    case 'bigint':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    default:
      return value instanceof Date || value instanceof Uint8Array;
  }
}

export function storageValueOf(value: QueryValue): StorageValue {
  if (typeof value === 'string') return { kind: 'text', value };
  if (typeof value === 'number') {
    return Number.isInteger(value) ? { kind: 'integer', value } : { kind: 'real', value };
  }
  if (typeof value === 'bigint') return { kind: 'integer', value };
  if (typeof value === 'boolean') return { kind: 'boolean', value };
  if (value instanceof Date) return { kind: 'date', value };
  if (value instanceof Uint8Array) return { kind: 'blob', value };
  return value;
}

function toBuffer(bytes: Uint8Array): Buffer {
  return Buffer.isBuffer(bytes) ? bytes : Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

/** The canonical raw representation bound as a statement parameter. */
export function asRawValue(value: StorageValue | null): RawValue {
  if (value === null) return null;

  switch (value.kind) {
    case 'text':
    case 'structured':
      return value.value;
    case 'integer':
    case 'real':
      return value.value;
    case 'boolean':
      return value.value ? 1 : 0;
    case 'date':
      return formatStorageDate(value.value);
    case 'blob':
      return toBuffer(value.value);
  }
}

export function toBindable(value: QueryValue | null | undefined): RawValue {
  if (value === null || value === undefined) return null;
  return asRawValue(storageValueOf(value));
}
