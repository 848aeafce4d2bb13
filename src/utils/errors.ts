import type { ColumnType } from '../types/index.js';

export class StorageError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StorageError';
  }
}

export class TableAlreadyExistsError extends StorageError {
  readonly tableName: string;

  constructor(tableName: string) {
    super(
      `Table "${tableName}" already exists. ` +
        'Set the ifNotExists option on the table definition to skip existing tables.'
    );
    this.name = 'TableAlreadyExistsError';
    this.tableName = tableName;
  }
}

export type DecodingErrorKind = 'keyNotFound' | 'valueNotFound' | 'typeMismatch' | 'dataCorrupted';

export class DecodingError extends StorageError {
  readonly kind: DecodingErrorKind;
  readonly field: string;
  readonly target: string;
  readonly availableColumns: readonly string[];

  constructor(
    kind: DecodingErrorKind,
    field: string,
    target: string,
    availableColumns: readonly string[],
    detail?: string
  ) {
    super(
      `${describeDecodingKind(kind, field, target)}` +
        `${detail ? ` (${detail})` : ''}. Available columns: [${availableColumns.join(', ')}]`
    );
    this.name = 'DecodingError';
    this.kind = kind;
    this.field = field;
    this.target = target;
    this.availableColumns = availableColumns;
  }
}

function describeDecodingKind(kind: DecodingErrorKind, field: string, target: string): string {
  switch (kind) {
    case 'keyNotFound':
      return `Key "${field}" not found while decoding ${target}`;
    case 'valueNotFound':
      return `Value for key "${field}" is null but ${target} is required`;
    case 'typeMismatch':
      return `Cannot convert value of "${field}" to ${target}`;
    case 'dataCorrupted':
      return `Value of "${field}" is not valid structured text for ${target}`;
  }
}

export class RecordConversionError extends StorageError {
  readonly typeName: string;
  readonly availableColumns: readonly string[];

  constructor(typeName: string, availableColumns: readonly string[], cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      `Failed to decode ${typeName} from database row. ` +
        `Available columns: [${availableColumns.join(', ')}]. Error: ${reason}`,
      { cause }
    );
    this.name = 'RecordConversionError';
    this.typeName = typeName;
    this.availableColumns = availableColumns;
  }
}

export class EngineUnavailableError extends StorageError {
  constructor() {
    super(
      'No database factory available. Pass a factory to createDatabaseManager() ' +
        'or register a default with initStorage().'
    );
    this.name = 'EngineUnavailableError';
  }
}

export class SchemaMismatchError extends StorageError {
  readonly columnType: ColumnType;

  constructor(columnType: ColumnType, detail: string) {
    super(`Cannot store value as ${columnType.toUpperCase()}: ${detail}`);
    this.name = 'SchemaMismatchError';
    this.columnType = columnType;
  }
}

export class SchemaDefinitionError extends StorageError {
  constructor(message: string) {
    super(message);
    this.name = 'SchemaDefinitionError';
  }
}

export class RecordDefinitionError extends StorageError {
  constructor(message: string) {
    super(message);
    this.name = 'RecordDefinitionError';
  }
}

export class QueryCompileError extends StorageError {
  constructor(message: string) {
    super(message);
    this.name = 'QueryCompileError';
  }
}
