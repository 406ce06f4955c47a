import { beforeEach, describe, expect, it, vi } from 'vitest';
import type { DocumentCollection, DocumentStore } from '../../../infrastructure/document-store.js';
import { createInMemoryDocumentStore } from '../../../infrastructure/memory/document-store.memory.js';
import { sanitizeUpdate, scopePipeline } from '../scoped-collection.js';
import { createScopedStore, createTenantStoreFactory } from '../scoped-store.js';

describe('scoped collections', () => {
  let store: DocumentStore;
  let raw: DocumentCollection;

  beforeEach(async () => {
    store = createInMemoryDocumentStore();
    raw = store.collection('clients');
    await raw.insertMany([
      { _id: 'c1', name: 'Aster', agency_id: 'T1' },
      { _id: 'c2', name: 'Birch', agency_id: 'T1' },
      { _id: 'c3', name: 'Cedar', agency_id: 'T2' },
      { _id: 'c4', name: 'Legacy' },
    ]);
  });

  it('returns only the tenant documents for an empty filter', async () => {
    const clients = createScopedStore(store, 'T1').collection('clients');
    expect((await clients.find({})).map(doc => doc._id)).toEqual(['c1', 'c2']);
    expect(await clients.countDocuments({})).toBe(2);
  });

  it('overrides a caller-supplied scope field', async () => {
    const clients = createScopedStore(store, 'T1').collection('clients');
    expect(await clients.find({ agency_id: 'T2' })).toEqual([]);
    expect(await clients.findOne({ _id: 'c3' })).toBeNull();
  });

  it('keeps documents without the scope field invisible', async () => {
    const clients = createScopedStore(store, 'T1').collection('clients');
    expect(await clients.findOne({ name: 'Legacy' })).toBeNull();
  });

  it('stamps inserts with the tenant, replacing any supplied value', async () => {
    const clients = createScopedStore(store, 'T1').collection('clients');
    await clients.insertOne({ _id: 'c5', name: 'Dahlia', agency_id: 'T2' });
    await clients.insertMany([{ _id: 'c6', name: 'Elm' }]);

    expect(await raw.findOne({ _id: 'c5' })).toEqual({ _id: 'c5', name: 'Dahlia', agency_id: 'T1' });
    expect(await raw.findOne({ _id: 'c6' })).toEqual({ _id: 'c6', name: 'Elm', agency_id: 'T1' });
  });

  it('does not mutate the caller document when stamping', async () => {
    const clients = createScopedStore(store, 'T1').collection('clients');
    const input = { name: 'Fern' };
    await clients.insertOne(input);
    expect(input).toEqual({ name: 'Fern' });
  });

  it('limits updates and deletes to the tenant', async () => {
    const t2 = createScopedStore(store, 'T2').collection('clients');
    const result = await t2.updateMany({}, { $set: { flagged: true } });
    expect(result.matchedCount).toBe(1);
    expect(await raw.countDocuments({ flagged: true })).toBe(1);

    expect(await t2.deleteMany({})).toEqual({ deletedCount: 1 });
    expect(await raw.countDocuments({})).toBe(3);
  });

  it('ignores attempts to move a document to another tenant', async () => {
    const clients = createScopedStore(store, 'T1').collection('clients');
    await clients.updateOne({ _id: 'c1' }, { $set: { agency_id: 'T2', name: 'Aster Co' } });
    expect(await raw.findOne({ _id: 'c1' })).toEqual({ _id: 'c1', name: 'Aster Co', agency_id: 'T1' });
  });

  it('stamps upserted documents from the scoped filter', async () => {
    const clients = createScopedStore(store, 'T2').collection('clients');
    const result = await clients.updateOne({ _id: 'c9' }, { $set: { name: 'Gorse' } }, { upsert: true });
    expect(result.upsertedId).toBe('c9');
    expect(await raw.findOne({ _id: 'c9' })).toEqual({ _id: 'c9', name: 'Gorse', agency_id: 'T2' });
  });

  it('matches a manual tenant filter when aggregating', async () => {
    const clients = createScopedStore(store, 'T1').collection('clients');
    const pipeline = [{ $sort: { name: -1 } }, { $project: { name: 1 } }];

    const scoped = await clients.aggregate(pipeline);
    const manual = await raw.aggregate([{ $match: { agency_id: 'T1' } }, ...pipeline]);
    expect(scoped).toEqual(manual);
    expect(scoped).toEqual([
      { _id: 'c2', name: 'Birch' },
      { _id: 'c1', name: 'Aster' },
    ]);
  });

  it('resolves the task collections to studio_id', async () => {
    const tasks = createScopedStore(store, 'T1').collection('tasks');
    await tasks.insertOne({ _id: 'task-1', title: 'Venue' });
    expect(tasks.scopeField).toBe('studio_id');
    expect(await store.collection('tasks').findOne({ _id: 'task-1' })).toEqual({
      _id: 'task-1',
      title: 'Venue',
      studio_id: 'T1',
    });
  });
});

describe('createScopedStore', () => {
  it('refuses an empty tenant id', () => {
    expect(() => createScopedStore(createInMemoryDocumentStore(), '')).toThrow('Scoped store requires a tenant id');
  });

  it('reuses collection handles within a tenant view', () => {
    const scoped = createScopedStore(createInMemoryDocumentStore(), 'T1');
    expect(scoped.collection('clients')).toBe(scoped.collection('clients'));
  });

  it('builds a fresh view per tenant from the factory', () => {
    const factory = createTenantStoreFactory(createInMemoryDocumentStore());
    expect(factory.forTenant('T1').tenantId).toBe('T1');
    expect(factory.forTenant('T2').collection('clients').tenantId).toBe('T2');
  });

  it('prepends the scope stage without touching the caller pipeline', () => {
    const pipeline = [{ $limit: 1 }];
    expect(scopePipeline(pipeline, 'agency_id', 'T1')).toEqual([{ $match: { agency_id: 'T1' } }, { $limit: 1 }]);
    expect(pipeline).toEqual([{ $limit: 1 }]);
  });
});

describe('sanitizeUpdate', () => {
  it('drops scope field paths from every operator', () => {
    expect(
      sanitizeUpdate(
        {
          $set: { agency_id: 'T2', 'agency_id.x': 1, name: 'n' },
          $unset: { agency_id: '' },
          $inc: { count: 1 },
          $rename: { agency_id: 'old', legacy: 'agency_id', a: 'b' },
        },
        'agency_id',
      ),
    ).toEqual({
      $set: { name: 'n' },
      $unset: {},
      $inc: { count: 1 },
      $rename: { a: 'b' },
    });
  });

  it('keeps operators beyond the common ones', () => {
    expect(
      sanitizeUpdate(
        {
          $min: { budget: 100, agency_id: 'T2' },
          $addToSet: { tags: 'vip', 'agency_id.tags': 'x' },
          $currentDate: { updated_at: true },
        },
        'agency_id',
      ),
    ).toEqual({
      $min: { budget: 100 },
      $addToSet: { tags: 'vip' },
      $currentDate: { updated_at: true },
    });
  });
});

describe('scoped updates with driver-only operators', () => {
  it('forwards them to the raw collection with the scope filter', async () => {
    const store = createInMemoryDocumentStore();
    const raw = store.collection('clients');
    const updateOne = vi
      .spyOn(raw, 'updateOne')
      .mockResolvedValue({ matchedCount: 1, modifiedCount: 1, upsertedId: null });

    await createScopedStore(store, 'T1')
      .collection('clients')
      .updateOne({ _id: 'c1' }, { $addToSet: { tags: 'vip', agency_id: 'T2' }, $max: { visits: 3 } });

    expect(updateOne).toHaveBeenCalledWith(
      { _id: 'c1', agency_id: 'T1' },
      { $addToSet: { tags: 'vip' }, $max: { visits: 3 } },
      undefined,
    );
  });
});
