import type { QueryValue } from '../converter/storage-value.js';
import type { ColumnType, TableOptions, TargetType } from '../types/index.js';
import { type FieldMetadata, metadataStorage } from './metadata.js';

export interface ColumnOptions {
  name?: string;
  primaryKey?: boolean;
  notNull?: boolean;
  unique?: boolean;
  defaultValue?: QueryValue;
  /** Decode target, e.g. a zod schema for structured text. */
  target?: TargetType;
}

export interface EntityOptions {
  name?: string;
  idField?: string;
  tableOptions?: TableOptions;
}

export interface FieldOptions {
  name?: string;
  optional?: boolean;
}

function defined(metadata: Partial<FieldMetadata>): Partial<FieldMetadata> {
  const result: Partial<FieldMetadata> = {};
  for (const [key, value] of Object.entries(metadata)) {
    if (value !== undefined) Reflect.set(result, key, value);
  }
  return result;
}

export function Entity(tableNameOrOptions?: string | EntityOptions): ClassDecorator {
  return (target: Function) => {
    const options =
      typeof tableNameOrOptions === 'string' ? { name: tableNameOrOptions } : tableNameOrOptions;

    metadataStorage.registerEntity(target, {
      tableName: options?.name ?? target.name.toLowerCase(),
      idField: options?.idField,
      tableOptions: options?.tableOptions && { ifNotExists: true, ...options.tableOptions },
    });
  };
}

export function Column(type: ColumnType, options: ColumnOptions = {}): PropertyDecorator {
  return (target: object, propertyKey: string | symbol) => {
    const propertyName = String(propertyKey);
    metadataStorage.registerField(
      target.constructor,
      propertyName,
      defined({
        type,
        columnName: options.name,
        primaryKey: options.primaryKey,
        notNull: options.notNull,
        unique: options.unique,
        defaultValue: options.defaultValue,
        target: options.target,
      })
    );
  };
}

/** Marks the primary key. Primary keys declared this way are NOT NULL. */
export function PrimaryKey(): PropertyDecorator {
  return (target: object, propertyKey: string | symbol) => {
    metadataStorage.registerField(target.constructor, String(propertyKey), {
      primaryKey: true,
      notNull: true,
    });
  };
}

export function NotNull(): PropertyDecorator {
  return (target: object, propertyKey: string | symbol) => {
    metadataStorage.registerField(target.constructor, String(propertyKey), { notNull: true });
  };
}

export function Unique(): PropertyDecorator {
  return (target: object, propertyKey: string | symbol) => {
    metadataStorage.registerField(target.constructor, String(propertyKey), { unique: true });
  };
}

export function Default(value: QueryValue): PropertyDecorator {
  return (target: object, propertyKey: string | symbol) => {
    metadataStorage.registerField(target.constructor, String(propertyKey), {
      defaultValue: value,
    });
  };
}

/**
 * A field stored without a table-definition entry. Its column type is inferred from the
 * value on every write, and it is decoded into `target` with cross-type inference.
 */
export function Field(target: TargetType, options: FieldOptions = {}): PropertyDecorator {
  return (prototype: object, propertyKey: string | symbol) => {
    const propertyName = String(propertyKey);
    metadataStorage.registerField(
      prototype.constructor,
      propertyName,
      defined({ target, columnName: options.name, optional: options.optional ?? false })
    );
  };
}
