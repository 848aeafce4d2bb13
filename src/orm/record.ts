import {
  inferType,
  isScalar,
  isStorageValue,
  storageValueOf,
  toStorageValue,
} from '../converter/index.js';
import { DirectDecoder } from '../decoder/index.js';
import type { DatabaseRow } from '../driver/types.js';
import { column, defineTable } from '../schema/table-definition.js';
import type {
  ColumnDefinition,
  ColumnType,
  PrimitiveTarget,
  StorageRow,
  StorageValue,
  TableDefinition,
  TargetType,
} from '../types/index.js';
import {
  RecordConversionError,
  RecordDefinitionError,
  SchemaMismatchError,
} from '../utils/errors.js';
import { type EntityConstructor, type FieldMetadata, metadataStorage } from './metadata.js';

export interface RecordField {
  readonly propertyName: string;
  readonly columnName: string;
  /** Undefined for schema-less fields. */
  readonly column?: ColumnDefinition;
  readonly target: TargetType;
  readonly optional: boolean;
}

/** Everything needed to move one entity type in and out of its table. */
export interface RecordContract {
  readonly typeName: string;
  readonly tableName: string;
  readonly idField: string;
  readonly idColumn: string;
  readonly fields: readonly RecordField[];
  readonly tableDefinition: TableDefinition;
}

const DEFAULT_TARGETS: Record<ColumnType, PrimitiveTarget> = {
  text: 'string',
  integer: 'integer',
  real: 'number',
  double: 'number',
  numeric: 'number',
  boolean: 'boolean',
  date: 'date',
  blob: 'bytes',
  any: 'unknown',
};

const contracts = new WeakMap<Function, RecordContract>();

function toColumnDefinition(field: FieldMetadata, type: ColumnType): ColumnDefinition {
  let defaultValue: StorageValue | undefined;
  if (field.defaultValue !== undefined) {
    defaultValue = isStorageValue(field.defaultValue)
      ? field.defaultValue
      : (toStorageValue(field.defaultValue, type, false) ?? undefined);
  }

  return column(field.columnName, type, {
    primaryKey: field.primaryKey,
    notNull: field.notNull,
    unique: field.unique,
    defaultValue,
  });
}

function toRecordField(field: FieldMetadata): RecordField {
  if (field.type === undefined) {
    return {
      propertyName: field.propertyName,
      columnName: field.columnName,
      target: field.target ?? 'unknown',
      optional: field.optional ?? false,
    };
  }

  return {
    propertyName: field.propertyName,
    columnName: field.columnName,
    column: toColumnDefinition(field, field.type),
    target: field.target ?? DEFAULT_TARGETS[field.type],
    optional: !field.notNull,
  };
}

function buildContract(entity: Function): RecordContract {
  const metadata = metadataStorage.getEntityMetadata(entity);
  if (!metadata || metadata.fields.size === 0) {
    throw new RecordDefinitionError(
      `${entity.name || 'Anonymous class'} is not a registered entity. ` +
        'Decorate it with @Entity and declare its fields with @Column or @Field.'
    );
  }

  const fields = [...metadata.fields.values()].map(toRecordField);

  const primaryKey = fields.find((f) => f.column?.primaryKey);
  const idField = metadata.idField ?? primaryKey?.propertyName ?? 'id';
  const id = fields.find((f) => f.propertyName === idField);
  if (!id) {
    throw new RecordDefinitionError(
      `Id field "${idField}" of ${entity.name} is not a declared field. ` +
        `Declared fields: [${fields.map((f) => f.propertyName).join(', ')}]`
    );
  }

  const columns = fields.flatMap((f) => (f.column ? [f.column] : []));

  return Object.freeze({
    typeName: entity.name,
    tableName: metadata.tableName,
    idField,
    idColumn: id.columnName,
    fields: Object.freeze(fields),
    tableDefinition: defineTable(metadata.tableName, columns, metadata.tableOptions),
  });
}

export function getRecordContract(entity: Function): RecordContract {
  let contract = contracts.get(entity);
  if (!contract) {
    contract = buildContract(entity);
    contracts.set(entity, contract);
  }
  return contract;
}

function fieldToStorage(field: RecordField, value: unknown): StorageValue | null {
  if (field.column) {
    return toStorageValue(value, field.column.type, !field.column.notNull);
  }
  const inferred = inferType(value);
  return toStorageValue(value, inferred.type, inferred.optional);
}

/**
 * Column -> value map for one record. Undefined schema-less fields and undefined columns that
 * carry a default are left out so the engine fills them in.
 */
export function toStorageValues(entity: Function, record: object): StorageRow {
  const contract = getRecordContract(entity);
  const row: StorageRow = {};

  for (const field of contract.fields) {
    const value: unknown = Reflect.get(record, field.propertyName);
    if (value === undefined && (!field.column || field.column.defaultValue !== undefined)) {
      continue;
    }
    row[field.columnName] = fieldToStorage(field, value);
  }

  return row;
}

/** Like toStorageValues, restricted to the properties present on `values`. */
export function toPartialStorageValues(entity: Function, values: object): StorageRow {
  const contract = getRecordContract(entity);
  const row: StorageRow = {};

  for (const field of contract.fields) {
    if (!Object.hasOwn(values, field.propertyName)) continue;
    const value: unknown = Reflect.get(values, field.propertyName);
    row[field.columnName] = fieldToStorage(field, value);
  }

  return row;
}

export function recordId(entity: Function, record: object): StorageValue {
  const contract = getRecordContract(entity);
  const value: unknown = Reflect.get(record, contract.idField);
  const field = contract.fields.find((f) => f.propertyName === contract.idField);

  if (field?.column) {
    const id = toStorageValue(value, field.column.type, false);
    if (id) return id;
  } else if (isScalar(value)) {
    return storageValueOf(value);
  }

  throw new SchemaMismatchError(
    field?.column?.type ?? 'any',
    `id field "${contract.idField}" of ${contract.typeName} holds no convertible value`
  );
}

function decodeRecord<T extends object>(entity: EntityConstructor<T>, decoder: DirectDecoder): T {
  const contract = getRecordContract(entity);

  try {
    const values: Record<string, unknown> = {};
    for (const field of contract.fields) {
      if (field.optional) {
        // absent and nil optional fields stay undefined, matching `prop?: T`
        const value = decoder.decodeIfPresent(field.columnName, field.target);
        if (value !== null) values[field.propertyName] = value;
      } else {
        values[field.propertyName] = decoder.decode(field.columnName, field.target);
      }
    }
    return Object.assign(new entity(), values);
  } catch (error) {
    throw new RecordConversionError(contract.typeName, decoder.allKeys, error);
  }
}

export function fromStorage<T extends object>(entity: EntityConstructor<T>, row: DatabaseRow): T {
  const { tableDefinition } = getRecordContract(entity);
  return decodeRecord(entity, DirectDecoder.fromRow(row, { tableDefinition, autoInfer: true }));
}

export function fromStorageValues<T extends object>(
  entity: EntityConstructor<T>,
  values: Readonly<Record<string, unknown>>
): T {
  const { tableDefinition } = getRecordContract(entity);
  return decodeRecord(entity, DirectDecoder.fromValues(values, { tableDefinition, autoInfer: true }));
}
