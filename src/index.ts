export * from './types/index.js';

export * from './orm/index.js';

export {
  DatabaseManager,
  createDatabaseManager,
} from './manager.js';
export type {
  DatabaseManagerOptions,
  CreateDatabaseManagerOptions,
  FetchOptions,
  UpsertOptions,
} from './manager.js';

export {
  createSQLiteFactory,
  createSQLiteQueue,
  FactoryRegistry,
  factoryRegistry,
  initStorage,
  shutdownStorage,
} from './driver/index.js';
export type {
  ColumnBuildOptions,
  DatabaseConnection,
  DatabaseFactory,
  DatabaseQueue,
  DatabaseRow,
  InitStorageOptions,
  QueueConfig,
  TableBuilder,
} from './driver/index.js';

export { SQLCompiler, createCompiler } from './compiler/index.js';
export type { CompilerOptions } from './compiler/index.js';

export { filter, query, sortBy, sortByFields } from './query/index.js';
export type {
  ComparisonOperator,
  FilterOperator,
  Query,
  QueryAction,
  QueryActionType,
  QueryFilter,
  QuerySort,
  SortDirection,
  SortField,
  SelectAction,
  InsertAction,
  InsertManyAction,
  UpdateAction,
  DeleteAction,
  DeleteManyAction,
  UpsertAction,
} from './query/index.js';

export { DirectDecoder } from './decoder/index.js';
export type { DecoderOptions } from './decoder/index.js';

export {
  describeTarget,
  fromStorageValue,
  fromStructuredValue,
  inferType,
  isSchemaTarget,
  toStorageValue,
  formatStorageDate,
  parseStorageDate,
  serializeStructured,
  parseStructured,
  isStructured,
  asRawValue,
  toBindable,
  storageValueOf,
  isStorageValue,
  isScalar,
} from './converter/index.js';
export type { JsonValue, QueryValue, Scalar } from './converter/index.js';

export { column, defineTable, findColumn, DEFAULT_TABLE_OPTIONS } from './schema/table-definition.js';
export { sqlType, fromSqlType, isColumnType } from './schema/column-type.js';

export { ConfigError, DEFAULT_CONFIG, StorageConfigSchema, loadConfig } from './config/index.js';
export type { LoadConfigOptions, StorageConfig, StorageConfigInput } from './config/index.js';

export {
  StorageError,
  TableAlreadyExistsError,
  DecodingError,
  RecordConversionError,
  EngineUnavailableError,
  SchemaMismatchError,
  SchemaDefinitionError,
  RecordDefinitionError,
  QueryCompileError,
} from './utils/errors.js';
export type { DecodingErrorKind } from './utils/errors.js';

export { defaultLogger, silentLogger } from './utils/logger.js';
export type { Logger } from './utils/logger.js';
