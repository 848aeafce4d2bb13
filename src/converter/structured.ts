import { SchemaMismatchError } from '../utils/errors.js';

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export type ParsedStructure = { ok: true; value: unknown } | { ok: false; reason: string };

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/** Arrays, maps, sets and non-scalar objects are stored as structured text. */
export function isStructured(value: unknown): boolean {
  if (typeof value !== 'object' || value === null) return false;
  return !(value instanceof Date) && !(value instanceof Uint8Array) && !(value instanceof ArrayBuffer);
}

function isJsonPrimitive(value: unknown): boolean {
  return (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'boolean' ||
    (typeof value === 'number' && Number.isFinite(value))
  );
}

// Containers holding only JSON primitives and nested plain containers
function isFlat(value: unknown, seen: Set<object> = new Set()): boolean {
  if (isJsonPrimitive(value)) return true;
  if (typeof value !== 'object' || value === null || seen.has(value)) return false;
  seen.add(value);
  if (Array.isArray(value)) return value.every((item) => isFlat(item, seen));
  if (isPlainObject(value)) return Object.values(value).every((item) => isFlat(item, seen));
  return false;
}

function bytesToBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('base64');
}

function normalize(value: unknown, seen: WeakSet<object>): JsonValue | undefined {
  if (value === null) return null;

  switch (typeof value) {
    case 'string':
    case 'boolean':
      return value;
    case 'number':
      return Number.isFinite(value) ? value : null;
    case 'bigint':
      return Number.isSafeInteger(Number(value)) ? Number(value) : value.toString();
    case 'undefined':
    case 'function':
    case 'symbol':
      return undefined;
    default:
      break;
  }
  if (typeof value !== 'object') return undefined;

  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value.toISOString();
  }
  if (value instanceof Uint8Array) return bytesToBase64(value);
  if (value instanceof ArrayBuffer) return bytesToBase64(new Uint8Array(value));

  if (seen.has(value)) {
    throw new SchemaMismatchError('text', 'circular structure cannot be serialized');
  }
  seen.add(value);

  try {
    if (Array.isArray(value)) {
      return value.map((item) => normalize(item, seen) ?? null);
    }
    if (value instanceof Set) {
      return [...value].map((item) => normalize(item, seen) ?? null);
    }
    if (value instanceof Map) {
      const out: Record<string, JsonValue> = {};
      for (const [key, entry] of value) {
        const normalized = normalize(entry, seen);
        if (normalized !== undefined) out[String(key)] = normalized;
      }
      return out;
    }
    if ('toJSON' in value && typeof value.toJSON === 'function') {
      const json: unknown = value.toJSON();
      return json === value ? null : normalize(json, seen);
    }

    const out: Record<string, JsonValue> = {};
    for (const [key, entry] of Object.entries(value)) {
      const normalized = normalize(entry, seen);
      if (normalized !== undefined) out[key] = normalized;
    }
    return out;
  } finally {
    seen.delete(value);
  }
}

/**
 * Serializes a container to structured text. Flat containers go straight through
 * JSON.stringify; anything holding dates, bigints, bytes, maps, sets or class instances is
 * normalized field by field first.
 */
export function serializeStructured(value: unknown): string {
  if (isFlat(value)) {
    return JSON.stringify(value);
  }
  return JSON.stringify(normalize(value, new WeakSet()) ?? null);
}

export function parseStructured(text: string): ParsedStructure {
  try {
    const value: unknown = JSON.parse(text);
    return { ok: true, value };
  } catch (error) {
    return { ok: false, reason: error instanceof Error ? error.message : String(error) };
  }
}
