import type { ZodTypeAny, z } from 'zod';
import type {
  ColumnType,
  InferredType,
  PrimitiveTarget,
  StorageValue,
  TargetType,
  TargetValue,
} from '../types/index.js';
import { SchemaMismatchError } from '../utils/errors.js';
import {
  MAX_STORAGE_YEAR,
  MIN_STORAGE_YEAR,
  dateFromEpochSeconds,
  isStorableDate,
  parseStorageDate,
} from './dates.js';
import { storageValueOf, isScalar } from './storage-value.js';
import { isStructured, parseStructured, serializeStructured } from './structured.js';

export function isSchemaTarget(target: TargetType): target is ZodTypeAny {
  return typeof target !== 'string';
}

export function describeTarget(target: TargetType): string {
  if (!isSchemaTarget(target)) return target;
  return target.description ?? 'structured value';
}

export function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (typeof value !== 'object') return typeof value;
  if (Array.isArray(value)) return 'array';
  return value.constructor?.name ?? 'object';
}

export function inferType(value: unknown): InferredType {
  if (value === null || value === undefined) {
    return { type: 'text', optional: true };
  }

  switch (typeof value) {
    case 'string':
      return { type: 'text', optional: false };
    case 'number':
      return { type: Number.isInteger(value) ? 'integer' : 'double', optional: false };
    case 'bigint':
      return { type: 'integer', optional: false };
    case 'boolean':
      return { type: 'boolean', optional: false };
    default:
      break;
  }

  if (value instanceof Date) return { type: 'date', optional: false };
  if (value instanceof Uint8Array || value instanceof ArrayBuffer) {
    return { type: 'blob', optional: false };
  }

  // arrays, maps, sets and objects are stored as structured text
  return { type: 'text', optional: false };
}

function mismatch(columnType: ColumnType, expected: string, value: unknown): SchemaMismatchError {
  return new SchemaMismatchError(columnType, `expected ${expected}, got ${describeValue(value)}`);
}

function toTextValue(value: unknown): StorageValue {
  if (typeof value === 'string') return { kind: 'text', value };
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) throw mismatch('text', 'a valid date', value);
    return { kind: 'text', value: value.toISOString() };
  }
  if (value instanceof Uint8Array) {
    return { kind: 'text', value: Buffer.from(value).toString('base64') };
  }
  if (isStructured(value)) {
    return { kind: 'structured', value: serializeStructured(value) };
  }
  if (typeof value === 'number' || typeof value === 'bigint' || typeof value === 'boolean') {
    return { kind: 'text', value: String(value) };
  }
  throw mismatch('text', 'a string, scalar or container', value);
}

/**
 * Converts a host value for a column of the given type. A missing value on a non-optional
 * column and a value the column type cannot hold both raise SchemaMismatchError.
 */
export function toStorageValue(
  value: unknown,
  columnType: ColumnType,
  optional: boolean
): StorageValue | null {
  if (value === null || value === undefined) {
    if (optional) return null;
    throw new SchemaMismatchError(columnType, 'non-optional column has no value');
  }

  switch (columnType) {
    case 'text':
      return toTextValue(value);

    case 'integer':
      if (typeof value === 'number' && Number.isInteger(value)) return { kind: 'integer', value };
      if (typeof value === 'bigint') return { kind: 'integer', value };
      throw mismatch(columnType, 'an integer', value);

    case 'real':
    case 'double':
      if (typeof value === 'number' && !Number.isNaN(value)) return { kind: 'real', value };
      if (typeof value === 'bigint') return { kind: 'real', value: Number(value) };
      throw mismatch(columnType, 'a number', value);

    case 'numeric':
      if (typeof value === 'bigint') return { kind: 'integer', value };
      if (typeof value === 'number' && !Number.isNaN(value)) {
        return Number.isInteger(value) ? { kind: 'integer', value } : { kind: 'real', value };
      }
      throw mismatch(columnType, 'a number', value);

    case 'boolean':
      if (typeof value === 'boolean') return { kind: 'boolean', value };
      throw mismatch(columnType, 'a boolean', value);

    case 'date':
      if (value instanceof Date && !Number.isNaN(value.getTime())) {
        if (isStorableDate(value)) return { kind: 'date', value };
        throw new SchemaMismatchError(
          columnType,
          `year ${value.getUTCFullYear()} is outside ${MIN_STORAGE_YEAR}-${MAX_STORAGE_YEAR}`
        );
      }
      throw mismatch(columnType, 'a valid Date', value);

    case 'blob':
      if (value instanceof Uint8Array) return { kind: 'blob', value };
      if (value instanceof ArrayBuffer) return { kind: 'blob', value: new Uint8Array(value) };
      throw mismatch(columnType, 'a Uint8Array', value);

    case 'any':
      if (isScalar(value)) return storageValueOf(value);
      if (value instanceof ArrayBuffer) return { kind: 'blob', value: new Uint8Array(value) };
      if (isStructured(value)) return { kind: 'structured', value: serializeStructured(value) };
      return { kind: 'text', value: String(value) };
  }
}

const INTEGER_TEXT = /^-?\d+$/;
const NUMBER_TEXT = /^-?(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?$/i;
const BASE64_TEXT = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

type PrimitiveConverters = {
  [K in PrimitiveTarget]: (raw: unknown, autoInfer: boolean) => TargetValue<K> | null;
};

const converters: PrimitiveConverters = {
  boolean(raw) {
    if (typeof raw === 'boolean') return raw;
    if (typeof raw === 'number') return raw !== 0;
    if (typeof raw === 'bigint') return raw !== 0n;
    if (typeof raw === 'string') {
      const lowered = raw.toLowerCase();
      if (lowered === 'true' || lowered === '1') return true;
      if (lowered === 'false' || lowered === '0') return false;
    }
    return null;
  },

  integer(raw, autoInfer) {
    if (typeof raw === 'number') return Number.isInteger(raw) ? raw : null;
    if (typeof raw === 'bigint') {
      const widened = Number(raw);
      return Number.isSafeInteger(widened) ? widened : null;
    }
    if (autoInfer && typeof raw === 'string' && INTEGER_TEXT.test(raw)) {
      const parsed = Number(raw);
      return Number.isSafeInteger(parsed) ? parsed : null;
    }
    return null;
  },

  number(raw, autoInfer) {
    if (typeof raw === 'number') return raw;
    if (typeof raw === 'bigint') return Number(raw);
    if (autoInfer && typeof raw === 'string' && NUMBER_TEXT.test(raw)) return Number(raw);
    return null;
  },

  bigint(raw, autoInfer) {
    if (typeof raw === 'bigint') return raw;
    if (typeof raw === 'number') return Number.isInteger(raw) ? BigInt(raw) : null;
    if (autoInfer && typeof raw === 'string' && INTEGER_TEXT.test(raw)) return BigInt(raw);
    return null;
  },

  string(raw, autoInfer) {
    if (typeof raw === 'string') return raw;
    if (!autoInfer) return null;
    if (typeof raw === 'number' || typeof raw === 'bigint' || typeof raw === 'boolean') {
      return String(raw);
    }
    if (raw instanceof Uint8Array) return Buffer.from(raw).toString('utf8');
    return null;
  },

  date(raw) {
    if (raw instanceof Date) return Number.isNaN(raw.getTime()) ? null : raw;
    if (typeof raw === 'number') return dateFromEpochSeconds(raw);
    if (typeof raw === 'bigint') return dateFromEpochSeconds(Number(raw));
    if (typeof raw === 'string') return parseStorageDate(raw);
    return null;
  },

  bytes(raw, autoInfer) {
    if (raw instanceof Uint8Array) return raw;
    if (autoInfer && typeof raw === 'string') {
      return raw.length > 0 && BASE64_TEXT.test(raw)
        ? Buffer.from(raw, 'base64')
        : Buffer.from(raw, 'utf8');
    }
    return null;
  },

  unknown(raw) {
    return raw;
  },
};

/**
 * Decodes a structured value. Text is parsed as JSON and validated against the schema; when
 * that fails the raw value itself is validated, so a schema the raw value already satisfies
 * still matches. Failures yield null.
 */
export function fromStructuredValue<S extends ZodTypeAny>(raw: unknown, schema: S): z.infer<S> | null {
  if (raw === null || raw === undefined) return null;

  if (typeof raw === 'string') {
    const parsed = parseStructured(raw);
    if (parsed.ok) {
      const result = schema.safeParse(parsed.value);
      if (result.success) return result.data;
    }
  }

  const direct = schema.safeParse(raw);
  return direct.success ? direct.data : null;
}

export function fromStorageValue<S extends ZodTypeAny>(
  raw: unknown,
  target: S,
  autoInfer?: boolean
): z.infer<S> | null;
export function fromStorageValue<T extends PrimitiveTarget>(
  raw: unknown,
  target: T,
  autoInfer?: boolean
): TargetValue<T> | null;
export function fromStorageValue(raw: unknown, target: TargetType, autoInfer?: boolean): unknown;
export function fromStorageValue(raw: unknown, target: TargetType, autoInfer = false): unknown {
  if (raw === null || raw === undefined) return null;
  if (isSchemaTarget(target)) return fromStructuredValue(raw, target);
  return converters[target](raw, autoInfer);
}

export { formatStorageDate, isStorableDate, parseStorageDate } from './dates.js';
export { serializeStructured, parseStructured, isStructured } from './structured.js';
export type { JsonValue } from './structured.js';
export {
  asRawValue,
  isScalar,
  isStorageValue,
  storageValueOf,
  toBindable,
} from './storage-value.js';
export type { QueryValue, Scalar } from './storage-value.js';
