import type { ZodTypeAny, z } from 'zod';
import {
  describeTarget,
  fromStorageValue,
  inferType,
  isSchemaTarget,
  parseStructured,
} from '../converter/index.js';
import type { DatabaseRow } from '../driver/types.js';
import { findColumn } from '../schema/table-definition.js';
import type {
  ColumnType,
  PrimitiveTarget,
  TableDefinition,
  TargetType,
  TargetValue,
} from '../types/index.js';
import { DecodingError } from '../utils/errors.js';

export interface DecoderOptions {
  tableDefinition?: TableDefinition;
  /** Lets fields without a table-definition entry coerce across types (numeric text, etc). */
  autoInfer?: boolean;
}

/**
 * Keyed access to one row, decoding each field straight into its target type without
 * building an intermediate document. Only flat fields are supported; structured values are
 * decoded from their serialized text.
 */
export class DirectDecoder {
  private readonly values: ReadonlyMap<string, unknown>;
  private readonly tableDefinition: TableDefinition | undefined;
  private readonly autoInfer: boolean;

  private constructor(values: ReadonlyMap<string, unknown>, options: DecoderOptions) {
    this.values = values;
    this.tableDefinition = options.tableDefinition;
    this.autoInfer = options.autoInfer ?? false;
  }

  static fromRow(row: DatabaseRow, options: DecoderOptions = {}): DirectDecoder {
    const values = new Map<string, unknown>();
    for (const name of row.columnNames) {
      values.set(name, row.get(name));
    }
    return new DirectDecoder(values, options);
  }

  static fromValues(
    values: Readonly<Record<string, unknown>> | ReadonlyMap<string, unknown>,
    options: DecoderOptions = {}
  ): DirectDecoder {
    const copy = values instanceof Map ? new Map(values) : new Map(Object.entries(values));
    return new DirectDecoder(copy, options);
  }

  get allKeys(): string[] {
    return [...this.values.keys()];
  }

  contains(field: string): boolean {
    return this.values.has(field);
  }

  isNil(field: string): boolean {
    const value = this.values.get(field);
    return value === null || value === undefined;
  }

  columnType(field: string): ColumnType {
    const declared = this.declaredColumn(field);
    if (declared) return declared;
    return inferType(this.values.get(field)).type;
  }

  decode<S extends ZodTypeAny>(field: string, target: S): z.infer<S>;
  decode<T extends PrimitiveTarget>(field: string, target: T): TargetValue<T>;
  decode(field: string, target: TargetType): unknown;
  decode(field: string, target: TargetType): unknown {
    const describe = describeTarget(target);

    if (!this.values.has(field)) {
      throw new DecodingError('keyNotFound', field, describe, this.allKeys);
    }

    const raw = this.values.get(field);
    if (raw === null || raw === undefined) {
      throw new DecodingError('valueNotFound', field, describe, this.allKeys);
    }

    const inference = this.declaredColumn(field) ? false : this.autoInfer;
    const value = fromStorageValue(raw, target, inference);
    if (value !== null && value !== undefined) {
      return value;
    }

    if (isSchemaTarget(target) && typeof raw === 'string') {
      const parsed = parseStructured(raw);
      if (!parsed.ok) {
        throw new DecodingError('dataCorrupted', field, describe, this.allKeys, parsed.reason);
      }
    }
    throw new DecodingError('typeMismatch', field, describe, this.allKeys);
  }

  decodeIfPresent<S extends ZodTypeAny>(field: string, target: S): z.infer<S> | null;
  decodeIfPresent<T extends PrimitiveTarget>(field: string, target: T): TargetValue<T> | null;
  decodeIfPresent(field: string, target: TargetType): unknown;
  decodeIfPresent(field: string, target: TargetType): unknown {
    if (this.isNil(field)) return null;
    return this.decode(field, target);
  }

  private declaredColumn(field: string): ColumnType | undefined {
    if (!this.tableDefinition) return undefined;
    return findColumn(this.tableDefinition, field)?.type;
  }
}
