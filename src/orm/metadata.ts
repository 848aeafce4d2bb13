import type { QueryValue } from '../converter/storage-value.js';
import type { ColumnType, TableOptions, TargetType } from '../types/index.js';

export interface EntityMetadata {
  tableName: string;
  idField?: string;
  tableOptions: TableOptions;
  fields: Map<string, FieldMetadata>;
}

export interface FieldMetadata {
  propertyName: string;
  columnName: string;
  /** Undefined for schema-less fields, whose column type is inferred from each value. */
  type?: ColumnType;
  primaryKey: boolean;
  notNull: boolean;
  unique: boolean;
  defaultValue?: QueryValue;
  /** Decode target; defaults to the one matching the column type. */
  target?: TargetType;
  /** Only consulted for schema-less fields; column fields are optional unless NOT NULL. */
  optional?: boolean;
}

export type EntityConstructor<T = unknown> = new (...args: unknown[]) => T;

class MetadataStorage {
  private entities: Map<Function, EntityMetadata> = new Map();

  registerEntity(target: Function, options: Partial<Omit<EntityMetadata, 'fields'>>): void {
    const entity = this.ensureEntity(target);
    if (options.tableName !== undefined) entity.tableName = options.tableName;
    if (options.idField !== undefined) entity.idField = options.idField;
    if (options.tableOptions !== undefined) entity.tableOptions = options.tableOptions;
  }

  registerField(target: Function, propertyName: string, metadata: Partial<FieldMetadata>): void {
    const entity = this.ensureEntity(target);

    const existing = entity.fields.get(propertyName) ?? {
      propertyName,
      columnName: propertyName,
      primaryKey: false,
      notNull: false,
      unique: false,
    };

    entity.fields.set(propertyName, { ...existing, ...metadata });
  }

  getEntityMetadata(target: Function): EntityMetadata | undefined {
    return this.entities.get(target);
  }

  hasEntity(target: Function): boolean {
    return this.entities.has(target);
  }

  private ensureEntity(target: Function): EntityMetadata {
    let entity = this.entities.get(target);
    if (!entity) {
      entity = {
        tableName: target.name.toLowerCase(),
        tableOptions: { ifNotExists: true },
        fields: new Map(),
      };
      this.entities.set(target, entity);
    }
    return entity;
  }

  clear(): void {
    this.entities.clear();
  }
}

export const metadataStorage = new MetadataStorage();
