import type { StorageConfig } from '../config/index.js';
import type { RawValue, TableOptions } from '../types/index.js';
import type { Logger } from '../utils/logger.js';

export interface DatabaseRow {
  readonly columnNames: readonly string[];
  get(column: string): RawValue | undefined;
}

export interface ColumnBuildOptions {
  primaryKey: boolean;
  notNull: boolean;
  unique: boolean;
  defaultValue: RawValue;
}

export interface TableBuilder {
  column(name: string, sqlType: string, options: ColumnBuildOptions): void;
}

export interface DatabaseConnection {
  execute(sql: string, args?: readonly RawValue[]): Promise<{ rowCount: number }>;

  tableExists(name: string): Promise<boolean>;

  createTable(
    name: string,
    options: Readonly<TableOptions>,
    build: (table: TableBuilder) => void
  ): Promise<void>;

  fetchRows(sql: string, args?: readonly RawValue[]): Promise<DatabaseRow[]>;
}

/**
 * Serialized access to one database. Write units run one at a time inside a transaction;
 * read units may run alongside them as the engine allows.
 */
export interface DatabaseQueue {
  read<T>(fn: (db: DatabaseConnection) => Promise<T>): Promise<T>;

  write<T>(fn: (db: DatabaseConnection) => Promise<T>): Promise<T>;

  close(): Promise<void>;
}

export interface QueueConfig extends StorageConfig {
  logger?: Logger;
}

export interface DatabaseFactory {
  readonly name: string;
  createQueue(config: QueueConfig): Promise<DatabaseQueue>;
}
