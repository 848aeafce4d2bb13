import type { QueryValue } from '../converter/storage-value.js';
import type { StorageRow } from '../types/index.js';

export type FilterOperator = 'equals' | 'notEquals' | 'like' | 'greaterThan' | 'lessThan' | 'inSet';

export type ComparisonOperator = Exclude<FilterOperator, 'inSet'>;

export type QueryFilter =
  | { readonly field: string; readonly op: ComparisonOperator; readonly value: QueryValue }
  | { readonly field: string; readonly op: 'inSet'; readonly values: readonly QueryValue[] };

export type SortDirection = 'asc' | 'desc';

export interface SortField {
  readonly field: string;
  readonly direction: SortDirection;
}

export interface QuerySort {
  readonly fields: readonly SortField[];
}

export interface SelectAction {
  readonly type: 'select';
  /** Empty or omitted selects every column. */
  readonly fields?: readonly string[];
  readonly filters?: readonly QueryFilter[];
  readonly sort?: QuerySort;
  readonly limit?: number;
  readonly offset?: number;
}

export interface InsertAction {
  readonly type: 'insert';
  readonly values: StorageRow;
}

export interface InsertManyAction {
  readonly type: 'insertMany';
  readonly rows: readonly StorageRow[];
}

export interface UpdateAction {
  readonly type: 'update';
  readonly values: StorageRow;
  readonly filters?: readonly QueryFilter[];
}

export interface DeleteAction {
  readonly type: 'delete';
  /** No filters deletes every row. */
  readonly filters?: readonly QueryFilter[];
}

export interface DeleteManyAction {
  readonly type: 'deleteMany';
  readonly field: string;
  readonly ids: readonly QueryValue[];
}

export interface UpsertAction {
  readonly type: 'upsert';
  readonly values: StorageRow;
  readonly conflictColumns: readonly string[];
  /** Defaults to every value column that is not a conflict column. */
  readonly updateColumns?: readonly string[];
}

export type QueryAction =
  | SelectAction
  | InsertAction
  | InsertManyAction
  | UpdateAction
  | DeleteAction
  | DeleteManyAction
  | UpsertAction;

export type QueryActionType = QueryAction['type'];

export interface Query<A extends QueryAction = QueryAction> {
  readonly table: string;
  readonly action: A;
}

export const filter = {
  equals: (field: string, value: QueryValue): QueryFilter => ({ field, op: 'equals', value }),
  notEquals: (field: string, value: QueryValue): QueryFilter => ({ field, op: 'notEquals', value }),
  /** The pattern carries its own `%` and `_` wildcards. */
  like: (field: string, pattern: string): QueryFilter => ({ field, op: 'like', value: pattern }),
  greaterThan: (field: string, value: QueryValue): QueryFilter => ({
    field,
    op: 'greaterThan',
    value,
  }),
  lessThan: (field: string, value: QueryValue): QueryFilter => ({ field, op: 'lessThan', value }),
  inSet: (field: string, values: readonly QueryValue[]): QueryFilter => ({
    field,
    op: 'inSet',
    values,
  }),
};

export function sortBy(field: string, direction: SortDirection = 'asc'): QuerySort {
  return { fields: [{ field, direction }] };
}

export function sortByFields(fields: readonly SortField[]): QuerySort {
  return { fields };
}

type ActionOptions<A extends QueryAction> = Omit<A, 'type'>;

export const query = {
  select: (table: string, options: ActionOptions<SelectAction> = {}): Query<SelectAction> => ({
    table,
    action: { type: 'select', ...options },
  }),
  insert: (table: string, values: StorageRow): Query<InsertAction> => ({
    table,
    action: { type: 'insert', values },
  }),
  insertMany: (table: string, rows: readonly StorageRow[]): Query<InsertManyAction> => ({
    table,
    action: { type: 'insertMany', rows },
  }),
  update: (
    table: string,
    values: StorageRow,
    filters: readonly QueryFilter[] = []
  ): Query<UpdateAction> => ({
    table,
    action: { type: 'update', values, filters },
  }),
  delete: (table: string, filters: readonly QueryFilter[] = []): Query<DeleteAction> => ({
    table,
    action: { type: 'delete', filters },
  }),
  deleteMany: (table: string, field: string, ids: readonly QueryValue[]): Query<DeleteManyAction> => ({
    table,
    action: { type: 'deleteMany', field, ids },
  }),
  upsert: (table: string, options: ActionOptions<UpsertAction>): Query<UpsertAction> => ({
    table,
    action: { type: 'upsert', ...options },
  }),
};
