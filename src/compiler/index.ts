import { asRawValue, toBindable } from '../converter/storage-value.js';
import type {
  DeleteAction,
  DeleteManyAction,
  InsertAction,
  InsertManyAction,
  Query,
  QueryFilter,
  QuerySort,
  SelectAction,
  UpdateAction,
  UpsertAction,
} from '../query/index.js';
import type { CompiledQuery, RawValue, StorageRow } from '../types/index.js';
import { QueryCompileError } from '../utils/errors.js';

export interface CompilerOptions {
  /** Wrap table and column names in double quotes. Off by default. */
  quoteIdentifiers?: boolean;
}

interface CompilationState {
  params: RawValue[];
}

const ALWAYS_FALSE = '1=0';

const COMPARISONS = {
  equals: '=',
  notEquals: '!=',
  like: 'LIKE',
  greaterThan: '>',
  lessThan: '<',
} as const;

function sortedKeys(values: StorageRow): string[] {
  return Object.keys(values).sort();
}

function placeholders(count: number): string {
  return Array.from({ length: count }, () => '?').join(', ');
}

function bindColumn(values: StorageRow, column: string): RawValue {
  return asRawValue(values[column] ?? null);
}

export class SQLCompiler {
  private quoteIdentifiers: boolean;

  constructor(options: CompilerOptions = {}) {
    this.quoteIdentifiers = options.quoteIdentifiers ?? false;
  }

  compile(query: Query): CompiledQuery {
    const { table, action } = query;

    switch (action.type) {
      case 'select':
        return this.compileSelect(table, action);
      case 'insert':
        return this.compileInsert(table, action);
      case 'insertMany':
        return this.compileInsertMany(table, action);
      case 'update':
        return this.compileUpdate(table, action);
      case 'delete':
        return this.compileDelete(table, action);
      case 'deleteMany':
        return this.compileDeleteMany(table, action);
      case 'upsert':
        return this.compileUpsert(table, action);
    }
  }

  private compileSelect(table: string, action: SelectAction): CompiledQuery {
    const state: CompilationState = { params: [] };

    const columns = action.fields?.length
      ? action.fields.map((c) => this.quoteIdentifier(c)).join(', ')
      : '*';

    let sql = `SELECT ${columns} FROM ${this.quoteIdentifier(table)}`;
    sql += this.compileWhereClause(action.filters, state);
    sql += this.compileOrderBy(action.sort);
    sql += this.compileLimitOffset(action);

    return { sql, params: state.params };
  }

  private compileInsert(table: string, action: InsertAction): CompiledQuery {
    const columns = sortedKeys(action.values);
    if (columns.length === 0) {
      throw new QueryCompileError(`Cannot insert into "${table}" without values`);
    }

    const sql =
      `INSERT INTO ${this.quoteIdentifier(table)} (${this.columnList(columns)}) ` +
      `VALUES (${placeholders(columns.length)})`;

    return { sql, params: columns.map((c) => bindColumn(action.values, c)) };
  }

  private compileInsertMany(table: string, action: InsertManyAction): CompiledQuery {
    if (action.rows.length === 0) {
      throw new QueryCompileError(`Cannot insert empty array of rows into "${table}"`);
    }

    const columns = [...new Set(action.rows.flatMap((row) => Object.keys(row)))].sort();
    if (columns.length === 0) {
      throw new QueryCompileError(`Cannot insert into "${table}" without values`);
    }

    const group = `(${placeholders(columns.length)})`;
    const valueGroups = action.rows.map(() => group);
    const params = action.rows.flatMap((row) => columns.map((c) => bindColumn(row, c)));

    const sql =
      `INSERT INTO ${this.quoteIdentifier(table)} (${this.columnList(columns)}) ` +
      `VALUES ${valueGroups.join(', ')}`;

    return { sql, params };
  }

  private compileUpdate(table: string, action: UpdateAction): CompiledQuery {
    const columns = sortedKeys(action.values);
    if (columns.length === 0) {
      throw new QueryCompileError(`Cannot update "${table}" without values`);
    }

    const state: CompilationState = {
      params: columns.map((c) => bindColumn(action.values, c)),
    };
    const setClauses = columns.map((c) => `${this.quoteIdentifier(c)} = ?`);

    let sql = `UPDATE ${this.quoteIdentifier(table)} SET ${setClauses.join(', ')}`;
    sql += this.compileWhereClause(action.filters, state);

    return { sql, params: state.params };
  }

  private compileDelete(table: string, action: DeleteAction): CompiledQuery {
    const state: CompilationState = { params: [] };

    let sql = `DELETE FROM ${this.quoteIdentifier(table)}`;
    sql += this.compileWhereClause(action.filters, state);

    return { sql, params: state.params };
  }

  private compileDeleteMany(table: string, action: DeleteManyAction): CompiledQuery {
    const { predicate, values } = this.compileWhere({
      field: action.field,
      op: 'inSet',
      values: action.ids,
    });

    return { sql: `DELETE FROM ${this.quoteIdentifier(table)} WHERE ${predicate}`, params: values };
  }

  private compileUpsert(table: string, action: UpsertAction): CompiledQuery {
    const columns = sortedKeys(action.values);
    if (columns.length === 0) {
      throw new QueryCompileError(`Cannot upsert into "${table}" without values`);
    }
    if (action.conflictColumns.length === 0) {
      throw new QueryCompileError(`Upsert into "${table}" needs at least one conflict column`);
    }

    const conflictCols = action.conflictColumns.map((c) => this.quoteIdentifier(c)).join(', ');
    const updateCols = action.updateColumns
      ? [...action.updateColumns].sort()
      : columns.filter((c) => !action.conflictColumns.includes(c));

    let sql =
      `INSERT INTO ${this.quoteIdentifier(table)} (${this.columnList(columns)}) ` +
      `VALUES (${placeholders(columns.length)}) ON CONFLICT(${conflictCols})`;

    if (updateCols.length === 0) {
      sql += ' DO NOTHING';
    } else {
      const setClauses = updateCols.map(
        (c) => `${this.quoteIdentifier(c)} = excluded.${this.quoteIdentifier(c)}`
      );
      sql += ` DO UPDATE SET ${setClauses.join(', ')}`;
    }

    return { sql, params: columns.map((c) => bindColumn(action.values, c)) };
  }

  private compileWhereClause(
    filters: readonly QueryFilter[] | undefined,
    state: CompilationState
  ): string {
    if (!filters?.length) return '';

    const predicates: string[] = [];
    for (const f of filters) {
      const { predicate, values } = this.compileWhere(f);
      predicates.push(predicate);
      state.params.push(...values);
    }
    return ` WHERE ${predicates.join(' AND ')}`;
  }

  private compileWhere(f: QueryFilter): { predicate: string; values: RawValue[] } {
    const col = this.quoteIdentifier(f.field);

    if (f.op === 'inSet') {
      if (f.values.length === 0) {
        return { predicate: ALWAYS_FALSE, values: [] };
      }
      return {
        predicate: `${col} IN (${placeholders(f.values.length)})`,
        values: f.values.map((v) => toBindable(v)),
      };
    }

    return {
      predicate: `${col} ${COMPARISONS[f.op]} ?`,
      values: [toBindable(f.value)],
    };
  }

  private compileOrderBy(sort: QuerySort | undefined): string {
    if (!sort?.fields.length) return '';

    const parts = sort.fields.map((s) => {
      const direction = s.direction.toUpperCase();
      if (direction !== 'ASC' && direction !== 'DESC') {
        throw new QueryCompileError(
          `Invalid ORDER BY direction: ${s.direction}. Must be 'asc' or 'desc'.`
        );
      }
      return `${this.quoteIdentifier(s.field)} ${direction}`;
    });
    return ` ORDER BY ${parts.join(', ')}`;
  }

  private compileLimitOffset(action: SelectAction): string {
    let sql = '';
    if (action.limit !== undefined) {
      sql += ` LIMIT ${this.checkCount('LIMIT', action.limit)}`;
    } else if (action.offset !== undefined) {
      // SQLite only takes OFFSET after a LIMIT; -1 means no limit
      sql += ' LIMIT -1';
    }
    if (action.offset !== undefined) {
      sql += ` OFFSET ${this.checkCount('OFFSET', action.offset)}`;
    }
    return sql;
  }

  private checkCount(clause: string, value: number): number {
    if (!Number.isSafeInteger(value) || value < 0) {
      throw new QueryCompileError(`${clause} must be a non-negative integer, got ${value}`);
    }
    return value;
  }

  private columnList(columns: readonly string[]): string {
    return columns.map((c) => this.quoteIdentifier(c)).join(', ');
  }

  quoteIdentifier(identifier: string): string {
    if (!this.quoteIdentifiers || identifier === '*') return identifier;
    // Don't quote SQL expressions (functions, aliases, etc.)
    if (identifier.includes('(') || identifier.toLowerCase().includes(' as ')) {
      return identifier;
    }
    if (identifier.includes('.')) {
      return identifier
        .split('.')
        .map((part) => this.quoteIdentifier(part))
        .join('.');
    }
    return `"${identifier.replaceAll('"', '""')}"`;
  }
}

export function createCompiler(options: CompilerOptions = {}): SQLCompiler {
  return new SQLCompiler(options);
}
