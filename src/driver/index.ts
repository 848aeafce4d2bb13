export type {
  ColumnBuildOptions,
  DatabaseConnection,
  DatabaseFactory,
  DatabaseQueue,
  DatabaseRow,
  QueueConfig,
  TableBuilder,
} from './types.js';

export { createSQLiteFactory, createSQLiteQueue, createTableSql } from './sqlite.js';

export { FactoryRegistry, factoryRegistry, initStorage, shutdownStorage } from './registry.js';
export type { InitStorageOptions } from './registry.js';
