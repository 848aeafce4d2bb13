import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { z } from 'zod';
import { createSQLiteFactory } from '../../src/driver/sqlite.js';
import { type DatabaseManager, createDatabaseManager } from '../../src/manager.js';
import { Column, Entity, Field, NotNull, PrimaryKey } from '../../src/orm/decorators.js';
import { filter, query, sortBy } from '../../src/query/index.js';
import { column, defineTable } from '../../src/schema/table-definition.js';
import { TableAlreadyExistsError } from '../../src/utils/errors.js';
import { silentLogger } from '../../src/utils/logger.js';

const CREATED_AT = new Date(1_700_000_000 * 1000);

@Entity('notes')
class Note {
  @Column('text')
  @PrimaryKey()
  id!: string;

  @Column('text')
  title?: string;

  @Column('date')
  createdAt?: Date;

  @Column('text', { target: z.array(z.string()) })
  tags?: string[];

  @Column('text', { target: z.record(z.number()) })
  counters?: Record<string, number>;
}

@Entity('readings')
class Reading {
  @Column('text')
  @PrimaryKey()
  id!: string;

  @Field('number')
  value!: number;
}

@Entity('slots')
class Slot {
  @Column('integer')
  @PrimaryKey()
  id!: number;

  @Column('integer', { name: 'order' })
  @NotNull()
  position!: number;
}

@Entity('ledger')
class LedgerEntry {
  @Column('integer')
  @PrimaryKey()
  id!: number;

  @Column('integer', { target: 'bigint' })
  @NotNull()
  amount!: bigint;
}

function note(values: Partial<Note> & { id: string }): Note {
  return Object.assign(new Note(), values);
}

describe('notes end to end', () => {
  let manager: DatabaseManager;

  beforeEach(async () => {
    manager = await createDatabaseManager({
      factory: createSQLiteFactory(),
      env: {},
      logger: silentLogger,
    });
    await manager.createTable(Note);
  });

  afterEach(async () => {
    await manager.close();
  });

  it('should store and fetch a note with its timestamp', async () => {
    await manager.add(Note, note({ id: 'n1', title: 'First', createdAt: CREATED_AT }));

    const fetched = await manager.fetch(Note);
    expect(fetched).toHaveLength(1);

    const [first] = fetched;
    expect(first?.id).toBe('n1');
    expect(first?.title).toBe('First');
    const delta = Math.abs((first?.createdAt?.getTime() ?? 0) - CREATED_AT.getTime());
    expect(delta).toBeLessThan(1000);
  });

  it('should store dates in the engine text form', async () => {
    await manager.add(Note, note({ id: 'n1', createdAt: CREATED_AT }));
    const rows = await manager.fetchRows('SELECT createdAt FROM notes');
    expect(rows[0]?.get('createdAt')).toBe('2023-11-14 22:13:20.000');
  });

  it('should round-trip structured values including empty containers', async () => {
    await manager.add(Note, [
      note({ id: 'full', tags: ['work', 'urgent'], counters: { views: 3 } }),
      note({ id: 'empty', tags: [], counters: {} }),
    ]);

    const [empty, full] = await manager.fetch(Note, { sort: sortBy('id') });
    expect(full?.tags).toEqual(['work', 'urgent']);
    expect(full?.counters).toEqual({ views: 3 });
    expect(empty?.tags).toEqual([]);
    expect(empty?.counters).toEqual({});
  });

  it('should reject creating an existing table without ifNotExists', async () => {
    const definition = defineTable('notes', [column('id', 'text', { primaryKey: true })], {});
    await expect(manager.createTable(definition)).rejects.toThrow(TableAlreadyExistsError);
    await expect(manager.createTable(definition)).rejects.toThrow(
      'Table "notes" already exists.'
    );
  });

  it('should insert heterogeneous rows with nulls for missing columns', async () => {
    const inserted = await manager.write(
      query.insertMany('notes', [
        { id: { kind: 'text', value: 'a' }, title: { kind: 'text', value: 'only title' } },
        { id: { kind: 'text', value: 'b' }, createdAt: { kind: 'date', value: CREATED_AT } },
      ])
    );
    expect(inserted).toBe(2);

    const rows = await manager.fetchRows('SELECT id, title, createdAt FROM notes ORDER BY id');
    expect(rows.map((r) => [r.get('id'), r.get('title'), r.get('createdAt')])).toEqual([
      ['a', 'only title', null],
      ['b', null, '2023-11-14 22:13:20.000'],
    ]);
  });

  it('should delete by id and match nothing for an empty id list', async () => {
    await manager.add(Note, [note({ id: 'a' }), note({ id: 'b' })]);

    expect(await manager.write(query.deleteMany('notes', 'id', []))).toBe(0);
    expect(await manager.delete(Note, note({ id: 'a' }))).toBe(1);

    const remaining = await manager.fetch(Note, { filters: [filter.notEquals('id', 'x')] });
    expect(remaining.map((n) => n.id)).toEqual(['b']);
  });
});

describe('schema-less fields', () => {
  it('should infer storage types on write and decode with inference', async () => {
    const manager = await createDatabaseManager({
      factory: createSQLiteFactory(),
      env: {},
      logger: silentLogger,
    });
    await manager.createTable(
      defineTable('readings', [column('id', 'text', { primaryKey: true }), column('value', 'any')])
    );

    await manager.add(Reading, Object.assign(new Reading(), { id: 'r1', value: 2.5 }));
    await manager.writeSql('INSERT INTO readings (id, value) VALUES (?, ?)', ['r2', '42']);

    const readings = await manager.fetch(Reading, { sort: sortBy('id') });
    expect(readings.map((r) => r.value)).toEqual([2.5, 42]);
    await manager.close();
  });
});

describe('quoted identifiers', () => {
  it('should handle reserved words as column names', async () => {
    const manager = await createDatabaseManager({
      factory: createSQLiteFactory(),
      env: {},
      logger: silentLogger,
      quoteIdentifiers: true,
    });
    await manager.createTable(Slot);

    await manager.add(Slot, [
      Object.assign(new Slot(), { id: 1, position: 2 }),
      Object.assign(new Slot(), { id: 2, position: 1 }),
    ]);

    const slots = await manager.fetch(Slot, { sort: sortBy('order') });
    expect(slots.map((s) => s.id)).toEqual([2, 1]);
    await manager.close();
  });
});

describe('large integers', () => {
  it('should keep integers above 2^53 exact', async () => {
    const manager = await createDatabaseManager({
      factory: createSQLiteFactory(),
      env: {},
      logger: silentLogger,
    });
    await manager.createTable(LedgerEntry);

    const amount = 2n ** 60n + 1n;
    await manager.add(LedgerEntry, Object.assign(new LedgerEntry(), { id: 1, amount }));

    const [entry] = await manager.fetch(LedgerEntry);
    expect(entry?.id).toBe(1);
    expect(entry?.amount).toBe(1152921504606846977n);

    const rows = await manager.fetchRows('SELECT amount FROM ledger');
    expect(rows[0]?.get('amount')).toBe(amount);
    expect(await manager.count(LedgerEntry)).toBe(1);
    await manager.close();
  });
});
