import type { ColumnDefinition, ColumnType, StorageValue, TableDefinition, TableOptions } from '../types/index.js';
import { SchemaDefinitionError } from '../utils/errors.js';

export interface ColumnOptions {
  primaryKey?: boolean;
  notNull?: boolean;
  unique?: boolean;
  defaultValue?: StorageValue;
}

export const DEFAULT_TABLE_OPTIONS: Readonly<TableOptions> = Object.freeze({ ifNotExists: true });

export function column(name: string, type: ColumnType, options: ColumnOptions = {}): ColumnDefinition {
  const definition: ColumnDefinition = {
    name,
    type,
    primaryKey: options.primaryKey ?? false,
    notNull: options.notNull ?? false,
    unique: options.unique ?? false,
  };
  if (options.defaultValue === undefined) {
    return Object.freeze(definition);
  }
  return Object.freeze({ ...definition, defaultValue: options.defaultValue });
}

/**
 * Builds a frozen table definition. Column names must be non-empty and unique; a primary key
 * does not imply NOT NULL.
 */
export function defineTable(
  name: string,
  columns: readonly ColumnDefinition[],
  options: TableOptions = DEFAULT_TABLE_OPTIONS
): TableDefinition {
  if (name.trim() === '') {
    throw new SchemaDefinitionError('Table name must not be empty');
  }

  const seen = new Set<string>();
  for (const col of columns) {
    if (col.name.trim() === '') {
      throw new SchemaDefinitionError(`Table "${name}" has a column without a name`);
    }
    if (seen.has(col.name)) {
      throw new SchemaDefinitionError(`Duplicate column "${col.name}" in table "${name}"`);
    }
    seen.add(col.name);
  }

  return Object.freeze({
    name,
    columns: Object.freeze(columns.map((col) => (Object.isFrozen(col) ? col : Object.freeze({ ...col })))),
    options: Object.freeze({ ...options }),
  });
}

export function findColumn(definition: TableDefinition, name: string): ColumnDefinition | undefined {
  return definition.columns.find((col) => col.name === name);
}
