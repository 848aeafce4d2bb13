export { Entity, Column, Field, PrimaryKey, NotNull, Unique, Default } from './decorators.js';
export type { ColumnOptions, EntityOptions, FieldOptions } from './decorators.js';

export { metadataStorage } from './metadata.js';
export type { EntityMetadata, FieldMetadata, EntityConstructor } from './metadata.js';

export {
  getRecordContract,
  toStorageValues,
  toPartialStorageValues,
  recordId,
  fromStorage,
  fromStorageValues,
} from './record.js';
export type { RecordContract, RecordField } from './record.js';

export { Repository } from './repository.js';
export type { FindOneOptions } from './repository.js';
