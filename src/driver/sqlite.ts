import type { RawValue, TableOptions } from '../types/index.js';
import { StorageError } from '../utils/errors.js';
import { defaultLogger } from '../utils/logger.js';
import type {
  ColumnBuildOptions,
  DatabaseConnection,
  DatabaseFactory,
  DatabaseQueue,
  DatabaseRow,
  QueueConfig,
} from './types.js';

// STRICT tables only take INT, INTEGER, REAL, TEXT, BLOB and ANY
const STRICT_TYPES: Record<string, string> = {
  BOOLEAN: 'INTEGER',
  DATETIME: 'TEXT',
  DOUBLE: 'REAL',
  NUMERIC: 'ANY',
};

function quoteIdentifier(identifier: string): string {
  return `"${identifier.replaceAll('"', '""')}"`;
}

function sqlLiteral(value: RawValue): string {
  if (value === null) return 'NULL';
  if (typeof value === 'string') return `'${value.replaceAll("'", "''")}'`;
  if (typeof value === 'number' || typeof value === 'bigint') return String(value);
  return `X'${value.toString('hex')}'`;
}

function columnSql(name: string, sqlType: string, options: ColumnBuildOptions, strict: boolean): string {
  const type = strict ? (STRICT_TYPES[sqlType] ?? sqlType) : sqlType;
  let sql = `${quoteIdentifier(name)} ${type}`;
  if (options.primaryKey) sql += ' PRIMARY KEY';
  if (options.notNull) sql += ' NOT NULL';
  if (options.unique) sql += ' UNIQUE';
  if (options.defaultValue !== null) sql += ` DEFAULT ${sqlLiteral(options.defaultValue)}`;
  return sql;
}

export function createTableSql(
  name: string,
  options: Readonly<TableOptions>,
  columns: readonly string[]
): string {
  const tableOptions: string[] = [];
  if (options.withoutRowId) tableOptions.push('WITHOUT ROWID');
  if (options.strict) tableOptions.push('STRICT');

  return (
    `CREATE ${options.temporary ? 'TEMP ' : ''}TABLE ` +
    `${options.ifNotExists ? 'IF NOT EXISTS ' : ''}${quoteIdentifier(name)} ` +
    `(${columns.join(', ')})` +
    (tableOptions.length ? ` ${tableOptions.join(', ')}` : '')
  );
}

function toRawValue(value: unknown, column: string): RawValue {
  if (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'bigint' ||
    Buffer.isBuffer(value)
  ) {
    return value;
  }
  throw new StorageError(`Unsupported value type ${typeof value} in column "${column}"`);
}

function createRow(columnNames: readonly string[], values: unknown): DatabaseRow {
  if (!Array.isArray(values)) {
    throw new StorageError('Expected the engine to return rows as arrays');
  }

  const byName = new Map<string, RawValue>();
  columnNames.forEach((name, index) => {
    // first occurrence wins for duplicate result names
    if (!byName.has(name)) byName.set(name, toRawValue(values[index], name));
  });

  return {
    columnNames,
    get: (column) => byName.get(column),
  };
}

export async function createSQLiteQueue(config: QueueConfig): Promise<DatabaseQueue> {
  const Database = (await import('better-sqlite3')).default;
  const logger = config.logger ?? defaultLogger;

  const db = new Database(config.connectionString);
  // INTEGER results are read as bigint; the converters narrow safe values
  db.defaultSafeIntegers(true);

  db.pragma(`journal_mode = ${config.journalMode.toUpperCase()}`);
  db.pragma(`foreign_keys = ${config.foreignKeys ? 'ON' : 'OFF'}`);
  db.pragma(`busy_timeout = ${config.busyTimeoutMs}`);

  logger.debug(`Opened SQLite database at ${config.connectionString}`);

  const connection: DatabaseConnection = {
    async execute(sql: string, args: readonly RawValue[] = []): Promise<{ rowCount: number }> {
      const stmt = db.prepare(sql);
      const result = stmt.run(...args);
      return { rowCount: result.changes };
    },

    async tableExists(name: string): Promise<boolean> {
      const row = db
        .prepare(
          "SELECT 1 FROM sqlite_master WHERE type = 'table' AND name = ? " +
            "UNION ALL SELECT 1 FROM sqlite_temp_master WHERE type = 'table' AND name = ?"
        )
        .get(name, name);
      return row !== undefined;
    },

    async createTable(name, options, build): Promise<void> {
      const columns: string[] = [];
      build({
        column(columnName, sqlType, columnOptions) {
          columns.push(columnSql(columnName, sqlType, columnOptions, options.strict ?? false));
        },
      });
      db.exec(createTableSql(name, options, columns));
    },

    async fetchRows(sql: string, args: readonly RawValue[] = []): Promise<DatabaseRow[]> {
      const stmt = db.prepare(sql);
      if (!stmt.reader) {
        stmt.run(...args);
        return [];
      }

      const columnNames = stmt.columns().map((c) => c.name);
      const rows = stmt.raw(true).all(...args);
      return rows.map((values) => createRow(columnNames, values));
    },
  };

  let tail: Promise<unknown> = Promise.resolve();
  let closed = false;

  function ensureOpen(): void {
    if (closed) {
      throw new StorageError('Database queue is closed');
    }
  }

  return {
    async read<T>(fn: (db: DatabaseConnection) => Promise<T>): Promise<T> {
      ensureOpen();
      return fn(connection);
    },

    async write<T>(fn: (db: DatabaseConnection) => Promise<T>): Promise<T> {
      ensureOpen();

      const run = async (): Promise<T> => {
        db.prepare('BEGIN IMMEDIATE').run();
        try {
          const result = await fn(connection);
          db.prepare('COMMIT').run();
          return result;
        } catch (error) {
          if (db.inTransaction) {
            db.prepare('ROLLBACK').run();
          }
          throw error;
        }
      };

      const result = tail.then(run, run);
      // the chain only orders writes; each caller still sees its own failure through `result`
      tail = result.then(
        () => undefined,
        () => undefined
      );
      return result;
    },

    async close(): Promise<void> {
      if (closed) return;
      closed = true;
      await tail;
      db.close();
      logger.debug(`Closed SQLite database at ${config.connectionString}`);
    },
  };
}

export function createSQLiteFactory(): DatabaseFactory {
  return {
    name: 'sqlite',
    createQueue: createSQLiteQueue,
  };
}
