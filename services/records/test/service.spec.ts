import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { RecordStore } from '../src/contracts/recordStore';
import {
  ConstraintViolationError,
  DuplicateKeyError,
  NotFoundError,
  StoreError,
  ValidationError,
} from '../src/errors';
import { RecordService, toPatch } from '../src/service/recordService';
import type { SqlRecordStore } from '../src/storage/sqlRecordStore';
import { createSqliteStore, makeTempDir, removeDir } from './helpers';

describe('RecordService', () => {
  let dir: string;
  let store: SqlRecordStore;
  let service: RecordService;

  beforeEach(async () => {
    dir = makeTempDir();
    store = await createSqliteStore(dir, () => 1_000);
    service = new RecordService(store);
  });

  afterEach(() => {
    removeDir(dir);
  });

  it('create -> duplicate -> update -> delete scenario', async () => {
    const alice = await service.create({ externalKey: 'E1', name: 'Alice' });
    expect(alice).toEqual({ id: 1, externalKey: 'E1', name: 'Alice', createdAt: 1_000, updatedAt: 1_000 });

    await expect(service.create({ externalKey: 'E1', name: 'Bob' })).rejects.toBeInstanceOf(DuplicateKeyError);
    expect(await store.count()).toBe(1);

    const renamed = await service.update(1, { name: 'Alicia' });
    expect(renamed.externalKey).toBe('E1');
    expect(renamed.name).toBe('Alicia');

    await service.delete(1);
    expect(await store.findById(1)).toBeNull();
  });

  it('round-trips every supplied field', async () => {
    const input = { externalKey: 'E5', name: 'Eve', rights: 'read', status: 'active', remarks: 'contractor' };
    const created = await service.create(input);
    expect(await store.findById(created.id)).toMatchObject(input);
  });

  it('rejects moving onto an external key held by another record', async () => {
    await service.create({ externalKey: 'E1', name: 'Alice' });
    await service.create({ externalKey: 'E2', name: 'Bob' });

    const attempt = service.update(2, { externalKey: 'E1' });
    await expect(attempt).rejects.toBeInstanceOf(DuplicateKeyError);
    await expect(attempt).rejects.toThrow("External key 'E1' is already used by another record.");
    expect((await service.get(2)).externalKey).toBe('E2');
  });

  it('accepts an update that keeps its own external key', async () => {
    await service.create({ externalKey: 'E1', name: 'Alice' });
    const updated = await service.update(1, { externalKey: 'E1', name: 'Alicia' });
    expect(updated).toMatchObject({ id: 1, externalKey: 'E1', name: 'Alicia' });
  });

  it('reports NotFound for updates and deletes of missing ids', async () => {
    await expect(service.update(42, { name: 'Nobody' })).rejects.toBeInstanceOf(NotFoundError);
    await expect(service.delete(42)).rejects.toThrow('Record with ID 42 not found.');
    await expect(service.get(42)).rejects.toBeInstanceOf(NotFoundError);
  });

  it('rejects an update with nothing to change', async () => {
    await service.create({ externalKey: 'E1', name: 'Alice' });
    await expect(service.update(1, { name: '', remarks: null })).rejects.toBeInstanceOf(ValidationError);
  });

  it('treats blank search as no filter', async () => {
    await service.create({ externalKey: 'E1', name: 'Alice' });
    await service.create({ externalKey: 'E2', name: 'Bob' });

    const all = await store.listAll();
    expect(await service.search('')).toEqual(all);
    expect(await service.search('   ')).toEqual(all);
    expect(await service.search()).toEqual(all);
    expect((await service.search('bob')).map((r) => r.name)).toEqual(['Bob']);
    expect(await service.search('zzz')).toEqual([]);
  });

  it('pages listings and reports the filtered total', async () => {
    for (let i = 1; i <= 3; i += 1) {
      await service.create({ externalKey: `E${i}`, name: `Person ${i}` });
    }

    const page = await service.list({ skip: 1, limit: 1 });
    expect(page.records.map((r) => r.id)).toEqual([2]);
    expect(page).toMatchObject({ total: 3, skip: 1, limit: 1 });

    const defaults = await service.list({ search: ' ' });
    expect(defaults).toMatchObject({ total: 3, skip: 0, limit: 100 });
  });

  it('exports without changing the store', async () => {
    await service.create({ externalKey: 'E1', name: 'Alice' });

    const json = await service.exportAll('json');
    const csv = await service.exportAll('csv');

    expect(JSON.parse(json)).toEqual(await store.listAll());
    expect(csv.split('\n')).toHaveLength(2);
    expect(await store.count()).toBe(1);
  });
});

describe('RecordService against a stub store', () => {
  function stubStore(overrides: Partial<RecordStore> = {}): RecordStore {
    return {
      initialize: vi.fn(async () => undefined),
      listAll: vi.fn(async () => []),
      count: vi.fn(async () => 0),
      findByExternalKey: vi.fn(async () => null),
      findById: vi.fn(async () => null),
      insert: vi.fn(async () => 1),
      update: vi.fn(async () => 1),
      delete: vi.fn(async () => 1),
      ...overrides,
    };
  }

  it('reports a create race caught by the unique constraint as DuplicateKey', async () => {
    const store = stubStore({
      insert: vi.fn(async () => {
        throw new ConstraintViolationError('UNIQUE constraint failed: records.external_key');
      }),
    });

    await expect(new RecordService(store).create({ externalKey: 'E1', name: 'Late' })).rejects.toBeInstanceOf(
      DuplicateKeyError,
    );
  });

  it('passes store failures through untouched', async () => {
    const failure = new StoreError('disk I/O error');
    const store = stubStore({
      listAll: vi.fn(async () => {
        throw failure;
      }),
    });

    await expect(new RecordService(store).search('x')).rejects.toBe(failure);
  });

  it('sends only non-empty declared fields to the store', async () => {
    const update = vi.fn(async () => 1);
    const store = stubStore({
      update,
      findById: vi.fn(async () => ({ id: 3, externalKey: 'E3', name: 'N', createdAt: 1, updatedAt: 2 })),
    });

    await new RecordService(store).update(3, { name: 'N', rights: '', status: null, remarks: undefined });

    expect(update).toHaveBeenCalledWith(3, { name: 'N' });
  });

  it('normalizes blank search before listing', async () => {
    const listAll = vi.fn(async () => []);
    const store = stubStore({ listAll });

    await new RecordService(store, { defaultLimit: 25 }).list({ search: '  ' });

    expect(listAll).toHaveBeenCalledWith({ search: undefined, skip: 0, limit: 25 });
  });

  it('passes non-blank search text through untrimmed', async () => {
    const listAll = vi.fn(async () => []);
    const count = vi.fn(async () => 0);
    const store = stubStore({ listAll, count });

    await new RecordService(store).list({ search: ' Smith' });

    expect(listAll).toHaveBeenCalledWith({ search: ' Smith', skip: 0, limit: 100 });
    expect(count).toHaveBeenCalledWith(' Smith');
  });
});

describe('toPatch', () => {
  it('keeps declared fields with values', () => {
    expect(toPatch({ externalKey: 'E1', name: '', rights: null, status: 'on' })).toEqual({
      externalKey: 'E1',
      status: 'on',
    });
  });
});
