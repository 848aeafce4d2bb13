import type { QueryValue } from '../converter/storage-value.js';
import type { DatabaseManager, FetchOptions } from '../manager.js';
import { type QueryFilter, filter, query } from '../query/index.js';
import type { EntityConstructor } from './metadata.js';
import { getRecordContract } from './record.js';

export type FindOneOptions = Omit<FetchOptions, 'limit'>;

/** Typed access to one entity's table. */
export class Repository<T extends object> {
  private manager: DatabaseManager;
  private entity: EntityConstructor<T>;

  constructor(manager: DatabaseManager, entity: EntityConstructor<T>) {
    this.manager = manager;
    this.entity = entity;
  }

  get tableName(): string {
    return getRecordContract(this.entity).tableName;
  }

  async find(options: FetchOptions = {}): Promise<T[]> {
    return this.manager.fetch(this.entity, options);
  }

  async findOne(options: FindOneOptions = {}): Promise<T | null> {
    const results = await this.find({ ...options, limit: 1 });
    return results[0] ?? null;
  }

  async findById(id: QueryValue): Promise<T | null> {
    return this.findOne({ filters: [this.idFilter(id)] });
  }

  async add(records: T | readonly T[]): Promise<void> {
    await this.manager.add(this.entity, records);
  }

  /** Inserts the record or replaces the row holding the same id. */
  async save(record: T): Promise<void> {
    await this.manager.upsert(this.entity, record);
  }

  async remove(records: T | readonly T[]): Promise<number> {
    return this.manager.delete(this.entity, records);
  }

  async removeById(id: QueryValue): Promise<boolean> {
    const removed = await this.manager.write(query.delete(this.tableName, [this.idFilter(id)]));
    return removed > 0;
  }

  async count(filters: readonly QueryFilter[] = []): Promise<number> {
    return this.manager.count(this.entity, filters);
  }

  private idFilter(id: QueryValue): QueryFilter {
    return filter.equals(getRecordContract(this.entity).idColumn, id);
  }
}
