import { SQLCompiler } from './compiler/index.js';
import { type LoadConfigOptions, loadConfig } from './config/index.js';
import { asRawValue, type QueryValue, toBindable } from './converter/storage-value.js';
import { factoryRegistry } from './driver/registry.js';
import type { DatabaseConnection, DatabaseFactory, DatabaseQueue, DatabaseRow } from './driver/types.js';
import type { EntityConstructor } from './orm/metadata.js';
import {
  fromStorage,
  getRecordContract,
  recordId,
  toPartialStorageValues,
  toStorageValues,
} from './orm/record.js';
import { Repository } from './orm/repository.js';
import { type QueryFilter, type QuerySort, type Query, filter, query } from './query/index.js';
import { sqlType } from './schema/column-type.js';
import type { CompiledQuery, RawValue, TableDefinition } from './types/index.js';
import { EngineUnavailableError, StorageError, TableAlreadyExistsError } from './utils/errors.js';
import { type Logger, defaultLogger } from './utils/logger.js';

export interface DatabaseManagerOptions {
  logger?: Logger;
  /** Log every compiled statement at debug level. */
  logQueries?: boolean;
  quoteIdentifiers?: boolean;
}

export interface FetchOptions {
  filters?: readonly QueryFilter[];
  sort?: QuerySort;
  limit?: number;
  offset?: number;
}

export interface UpsertOptions {
  /** Defaults to the entity's id column. */
  conflictColumns?: readonly string[];
  updateColumns?: readonly string[];
}

function isList<T>(value: T | readonly T[]): value is readonly T[] {
  return Array.isArray(value);
}

/**
 * Binds records, queries and the engine queue together. Every operation compiles one
 * self-contained statement and submits it as a single read or write unit.
 */
export class DatabaseManager {
  private queue: DatabaseQueue;
  private compiler: SQLCompiler;
  private logger: Logger;
  private logQueries: boolean;

  constructor(queue: DatabaseQueue, options: DatabaseManagerOptions = {}) {
    this.queue = queue;
    this.compiler = new SQLCompiler({ quoteIdentifiers: options.quoteIdentifiers });
    this.logger = options.logger ?? defaultLogger;
    this.logQueries = options.logQueries ?? false;
  }

  async tableExists(name: string): Promise<boolean> {
    return this.queue.read((db) => db.tableExists(name));
  }

  /** Accepts a table definition or a decorated entity class. */
  async createTable(source: TableDefinition | Function): Promise<void> {
    const definition =
      typeof source === 'function' ? getRecordContract(source).tableDefinition : source;

    await this.queue.write(async (db) => {
      if (await db.tableExists(definition.name)) {
        if (!definition.options.ifNotExists) {
          throw new TableAlreadyExistsError(definition.name);
        }
        this.logger.debug(`Table "${definition.name}" already exists, skipping creation`);
        return;
      }

      await db.createTable(definition.name, definition.options, (table) => {
        for (const col of definition.columns) {
          table.column(col.name, sqlType(col.type), {
            primaryKey: col.primaryKey,
            notNull: col.notNull,
            unique: col.unique,
            defaultValue: col.defaultValue ? asRawValue(col.defaultValue) : null,
          });
        }
      });
      this.logger.info(`Created table "${definition.name}"`);
    });
  }

  async add<T extends object>(entity: EntityConstructor<T>, records: T | readonly T[]): Promise<void> {
    const { tableName } = getRecordContract(entity);

    if (isList(records)) {
      if (records.length === 0) return;
      const rows = records.map((record) => toStorageValues(entity, record));
      await this.write(query.insertMany(tableName, rows));
      return;
    }

    await this.write(query.insert(tableName, toStorageValues(entity, records)));
  }

  async fetch<T extends object>(entity: EntityConstructor<T>, options: FetchOptions = {}): Promise<T[]> {
    const { tableName } = getRecordContract(entity);
    return this.read(entity, query.select(tableName, options));
  }

  async delete<T extends object>(
    entity: EntityConstructor<T>,
    records: T | readonly T[]
  ): Promise<number> {
    const { tableName, idColumn } = getRecordContract(entity);

    if (isList(records)) {
      if (records.length === 0) return 0;
      const ids = records.map((record) => recordId(entity, record));
      return this.write(query.deleteMany(tableName, idColumn, ids));
    }

    return this.write(
      query.delete(tableName, [filter.equals(idColumn, recordId(entity, records))])
    );
  }

  /** Inserts the record, or updates it when a row with the same conflict columns exists. */
  async upsert<T extends object>(
    entity: EntityConstructor<T>,
    record: T,
    options: UpsertOptions = {}
  ): Promise<number> {
    const { tableName, idColumn } = getRecordContract(entity);

    return this.write(
      query.upsert(tableName, {
        values: toStorageValues(entity, record),
        conflictColumns: options.conflictColumns ?? [idColumn],
        updateColumns: options.updateColumns,
      })
    );
  }

  /** Updates the columns of the properties present on `values`. */
  async update<T extends object>(
    entity: EntityConstructor<T>,
    values: Partial<T>,
    filters: readonly QueryFilter[] = []
  ): Promise<number> {
    const { tableName } = getRecordContract(entity);
    return this.write(query.update(tableName, toPartialStorageValues(entity, values), filters));
  }

  async count<T extends object>(
    entity: EntityConstructor<T>,
    filters: readonly QueryFilter[] = []
  ): Promise<number> {
    const { tableName } = getRecordContract(entity);
    const compiled = this.compile(
      query.select(tableName, { fields: ['COUNT(*) AS total'], filters })
    );

    const rows = await this.queue.read((db) => db.fetchRows(compiled.sql, compiled.params));
    const total = rows[0]?.get('total');
    if (typeof total === 'number') return total;
    if (typeof total === 'bigint') return Number(total);
    throw new StorageError(`COUNT(*) on "${tableName}" returned no number`);
  }

  async read<T extends object>(entity: EntityConstructor<T>, q: Query): Promise<T[]> {
    const compiled = this.compile(q);
    return this.readCompiled(entity, compiled);
  }

  async write(q: Query): Promise<number> {
    const compiled = this.compile(q);
    return this.queue.write((db) => this.execute(db, compiled));
  }

  async readSql<T extends object>(
    entity: EntityConstructor<T>,
    sql: string,
    args: readonly (QueryValue | null)[] = []
  ): Promise<T[]> {
    return this.readCompiled(entity, { sql, params: args.map((a) => toBindable(a)) });
  }

  async writeSql(sql: string, args: readonly (QueryValue | null)[] = []): Promise<number> {
    const compiled = { sql, params: args.map((a) => toBindable(a)) };
    this.logStatement(compiled);
    return this.queue.write((db) => this.execute(db, compiled));
  }

  async fetchRows(sql: string, args: readonly (QueryValue | null)[] = []): Promise<DatabaseRow[]> {
    const params: RawValue[] = args.map((a) => toBindable(a));
    this.logStatement({ sql, params });
    return this.queue.read((db) => db.fetchRows(sql, params));
  }

  repository<T extends object>(entity: EntityConstructor<T>): Repository<T> {
    return new Repository(this, entity);
  }

  async close(): Promise<void> {
    await this.queue.close();
  }

  private compile(q: Query): CompiledQuery {
    const compiled = this.compiler.compile(q);
    this.logStatement(compiled);
    return compiled;
  }

  private async readCompiled<T extends object>(
    entity: EntityConstructor<T>,
    compiled: CompiledQuery
  ): Promise<T[]> {
    const rows = await this.queue.read((db) => db.fetchRows(compiled.sql, compiled.params));
    return rows.map((row) => fromStorage(entity, row));
  }

  private async execute(db: DatabaseConnection, compiled: CompiledQuery): Promise<number> {
    const { rowCount } = await db.execute(compiled.sql, compiled.params);
    return rowCount;
  }

  private logStatement(compiled: CompiledQuery): void {
    if (!this.logQueries) return;
    const params = compiled.params.map((p) => (typeof p === 'bigint' ? `${p}n` : JSON.stringify(p)));
    this.logger.debug(`${compiled.sql} -- [${params.join(', ')}]`);
  }
}

export interface CreateDatabaseManagerOptions extends LoadConfigOptions, DatabaseManagerOptions {
  /** Falls back to the factory registered with initStorage(). */
  factory?: DatabaseFactory;
}

export async function createDatabaseManager(
  options: CreateDatabaseManagerOptions = {}
): Promise<DatabaseManager> {
  const factory = options.factory ?? factoryRegistry.current;
  if (!factory) {
    throw new EngineUnavailableError();
  }

  const config = loadConfig({ overrides: options.overrides, env: options.env });
  const logger = options.logger ?? defaultLogger;
  const queue = await factory.createQueue({ ...config, logger });

  return new DatabaseManager(queue, {
    logger,
    logQueries: options.logQueries ?? config.logQueries,
    quoteIdentifiers: options.quoteIdentifiers,
  });
}
