import { describe, expect, it, vi } from 'vitest';
import { MongoNetworkError, type Collection, type Db, type Document as MongoDocument } from 'mongodb';
import { StoreUnavailableError } from '../../common/errors.js';
import { createMongoCollection, createMongoDocumentStoreFromDb } from '../mongo/document-store.mongo.js';

function createCollectionStub(overrides: Record<string, unknown> = {}) {
  const stub = {
    collectionName: 'tasks',
    findOne: vi.fn(async () => ({ _id: 'a', title: 'Venue' })),
    insertMany: vi.fn(async () => ({ insertedCount: 2, insertedIds: { 0: 'x', 1: 'y' } })),
    updateOne: vi.fn(async () => ({ matchedCount: 0, modifiedCount: 0, upsertedId: 'new-id' })),
    findOneAndUpdate: vi.fn(async () => null),
    createIndex: vi.fn(async () => 'sequence_counter_key'),
    ...overrides,
  };
  return { stub, collection: stub as unknown as Collection<MongoDocument> };
}

describe('createMongoCollection', () => {
  it('passes queries through to the driver', async () => {
    const { stub, collection } = createCollectionStub();
    const tasks = createMongoCollection(collection);

    expect(tasks.name).toBe('tasks');
    expect(await tasks.findOne({ _id: 'a' })).toEqual({ _id: 'a', title: 'Venue' });
    expect(stub.findOne).toHaveBeenCalledWith({ _id: 'a' }, { sort: undefined, skip: undefined, projection: undefined });
  });

  it('normalizes insert and upsert results', async () => {
    const { collection } = createCollectionStub();
    const tasks = createMongoCollection(collection);

    expect(await tasks.insertMany([{ a: 1 }, { a: 2 }])).toEqual({ insertedCount: 2, insertedIds: ['x', 'y'] });
    expect(await tasks.updateOne({ a: 3 }, { $set: { b: 1 } }, { upsert: true })).toEqual({
      matchedCount: 0,
      modifiedCount: 0,
      upsertedId: 'new-id',
    });
  });

  it('defaults findOneAndUpdate to returning the previous document', async () => {
    const { stub, collection } = createCollectionStub();
    const tasks = createMongoCollection(collection);

    expect(await tasks.findOneAndUpdate({ _key: 'k' }, { $inc: { seq: 1 } })).toBeNull();
    expect(stub.findOneAndUpdate).toHaveBeenCalledWith(
      { _key: 'k' },
      { $inc: { seq: 1 } },
      { upsert: undefined, returnDocument: 'before', projection: undefined },
    );
  });

  it('translates connectivity failures into StoreUnavailableError', async () => {
    const networkError = new MongoNetworkError('connection refused');
    const { collection } = createCollectionStub({
      findOne: vi.fn(async () => {
        throw networkError;
      }),
    });
    const tasks = createMongoCollection(collection);

    const failure = await tasks.findOne({}).catch((err: unknown) => err);
    expect(failure).toBeInstanceOf(StoreUnavailableError);
    expect(failure).toMatchObject({
      statusCode: 503,
      code: 'STORE_UNAVAILABLE',
      message: 'Document store unavailable during findOne on tasks',
      cause: networkError,
    });
  });

  it('rethrows other driver errors unchanged', async () => {
    const duplicate = Object.assign(new Error('E11000 duplicate key error'), { code: 11000 });
    const { collection } = createCollectionStub({
      updateOne: vi.fn(async () => {
        throw duplicate;
      }),
    });
    const tasks = createMongoCollection(collection);

    await expect(tasks.updateOne({}, { $set: { a: 1 } })).rejects.toBe(duplicate);
  });
});

describe('createMongoDocumentStoreFromDb', () => {
  it('caches collection handles and delegates close', async () => {
    const { collection } = createCollectionStub();
    const db = { collection: vi.fn(() => collection) };
    const onClose = vi.fn(async () => {});
    const store = createMongoDocumentStoreFromDb(db as unknown as Db, onClose);

    expect(store.collection('tasks')).toBe(store.collection('tasks'));
    expect(db.collection).toHaveBeenCalledTimes(1);
    await store.close();
    expect(onClose).toHaveBeenCalledTimes(1);
  });
});
