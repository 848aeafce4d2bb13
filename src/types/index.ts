import type { ZodTypeAny, z } from 'zod';

export type ColumnType =
  | 'text'
  | 'integer'
  | 'real'
  | 'double'
  | 'numeric'
  | 'boolean'
  | 'date'
  | 'blob'
  | 'any';

export interface ColumnDefinition {
  readonly name: string;
  readonly type: ColumnType;
  readonly primaryKey: boolean;
  readonly notNull: boolean;
  readonly unique: boolean;
  readonly defaultValue?: StorageValue;
}

export interface TableOptions {
  ifNotExists?: boolean;
  temporary?: boolean;
  withoutRowId?: boolean;
  strict?: boolean;
}

export interface TableDefinition {
  readonly name: string;
  readonly columns: readonly ColumnDefinition[];
  readonly options: Readonly<TableOptions>;
}

/**
 * A value ready to be handed to the engine. `structured` holds serialized JSON text for
 * arrays, maps and nested objects stored in a single text column.
 */
export type StorageValue =
  | { readonly kind: 'text'; readonly value: string }
  | { readonly kind: 'integer'; readonly value: number | bigint }
  | { readonly kind: 'real'; readonly value: number }
  | { readonly kind: 'boolean'; readonly value: boolean }
  | { readonly kind: 'date'; readonly value: Date }
  | { readonly kind: 'blob'; readonly value: Uint8Array }
  | { readonly kind: 'structured'; readonly value: string };

export type StorageValueKind = StorageValue['kind'];

/** What the engine binds and returns. */
export type RawValue = string | number | bigint | Buffer | null;

export type StorageRow = Record<string, StorageValue | null>;

export type PrimitiveTarget =
  | 'string'
  | 'integer'
  | 'number'
  | 'bigint'
  | 'boolean'
  | 'date'
  | 'bytes'
  | 'unknown';

export type TargetType = PrimitiveTarget | ZodTypeAny;

export type TargetValue<T extends TargetType> = T extends ZodTypeAny
  ? z.infer<T>
  : T extends 'string'
    ? string
    : T extends 'integer' | 'number'
      ? number
      : T extends 'bigint'
        ? bigint
        : T extends 'boolean'
          ? boolean
          : T extends 'date'
            ? Date
            : T extends 'bytes'
              ? Uint8Array
              : unknown;

export interface InferredType {
  type: ColumnType;
  optional: boolean;
}

export interface CompiledQuery {
  sql: string;
  params: RawValue[];
}
