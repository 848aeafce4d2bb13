import type { ColumnType } from '../types/index.js';

const SQL_TYPES: Record<ColumnType, string> = {
  text: 'TEXT',
  integer: 'INTEGER',
  real: 'REAL',
  boolean: 'BOOLEAN',
  date: 'DATETIME',
  blob: 'BLOB',
  double: 'DOUBLE',
  numeric: 'NUMERIC',
  any: 'ANY',
};

// Checked in order; DATE also covers DATETIME.
const REVERSE_LOOKUP: [string, ColumnType][] = [
  ['TEXT', 'text'],
  ['INTEGER', 'integer'],
  ['REAL', 'real'],
  ['DOUBLE', 'double'],
  ['NUMERIC', 'numeric'],
  ['BOOLEAN', 'boolean'],
  ['DATE', 'date'],
  ['BLOB', 'blob'],
  ['ANY', 'any'],
];

export function sqlType(type: ColumnType): string {
  return SQL_TYPES[type];
}

export function fromSqlType(name: string): ColumnType {
  const upper = name.toUpperCase();
  for (const [fragment, type] of REVERSE_LOOKUP) {
    if (upper.includes(fragment)) {
      return type;
    }
  }
  return 'text';
}

export function isColumnType(value: unknown): value is ColumnType {
  return typeof value === 'string' && Object.hasOwn(SQL_TYPES, value);
}
