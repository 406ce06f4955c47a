import {
  MongoClient,
  MongoNetworkError,
  MongoServerSelectionError,
  type Collection,
  type Db,
  type Document as MongoDocument,
} from 'mongodb';
import { StoreUnavailableError } from '../../common/errors.js';
import type { MongoConfig } from '../../config/index.js';
import type { Document, DocumentCollection, DocumentStore } from '../document-store.js';

function isConnectivityError(err: unknown): boolean {
  return err instanceof MongoNetworkError || err instanceof MongoServerSelectionError;
}

async function translate<T>(collection: string, operation: string, run: () => Promise<T>): Promise<T> {
  try {
    return await run();
  } catch (err) {
    if (isConnectivityError(err)) {
      throw new StoreUnavailableError(`Document store unavailable during ${operation} on ${collection}`, err);
    }
    throw err;
  }
}

function toDocument(doc: MongoDocument | null): Document | null {
  return doc ? { ...doc } : null;
}

export function createMongoCollection(collection: Collection<MongoDocument>): DocumentCollection {
  const name = collection.collectionName;

  return {
    name,
    findOne(filter, options = {}) {
      return translate(name, 'findOne', async () =>
        toDocument(await collection.findOne(filter, { sort: options.sort, skip: options.skip, projection: options.projection })),
      );
    },
    find(filter, options = {}) {
      return translate(name, 'find', async () => {
        let cursor = collection.find(filter, { projection: options.projection });
        if (options.sort) cursor = cursor.sort(options.sort);
        if (options.skip) cursor = cursor.skip(options.skip);
        if (options.limit) cursor = cursor.limit(options.limit);
        const docs = await cursor.toArray();
        return docs.map(doc => ({ ...doc }));
      });
    },
    countDocuments(filter) {
      return translate(name, 'countDocuments', () => collection.countDocuments(filter));
    },
    insertOne(document) {
      return translate(name, 'insertOne', async () => {
        const result = await collection.insertOne({ ...document });
        return { insertedId: String(result.insertedId) };
      });
    },
    insertMany(documents) {
      return translate(name, 'insertMany', async () => {
        const result = await collection.insertMany(documents.map(doc => ({ ...doc })), { ordered: true });
        return {
          insertedCount: result.insertedCount,
          insertedIds: Object.values(result.insertedIds).map(id => String(id)),
        };
      });
    },
    updateOne(filter, update, options = {}) {
      return translate(name, 'updateOne', async () => {
        const result = await collection.updateOne(filter, update, { upsert: options.upsert });
        return {
          matchedCount: result.matchedCount,
          modifiedCount: result.modifiedCount,
          upsertedId: result.upsertedId ? String(result.upsertedId) : null,
        };
      });
    },
    updateMany(filter, update, options = {}) {
      return translate(name, 'updateMany', async () => {
        const result = await collection.updateMany(filter, update, { upsert: options.upsert });
        return {
          matchedCount: result.matchedCount,
          modifiedCount: result.modifiedCount,
          upsertedId: result.upsertedId ? String(result.upsertedId) : null,
        };
      });
    },
    deleteOne(filter) {
      return translate(name, 'deleteOne', async () => ({ deletedCount: (await collection.deleteOne(filter)).deletedCount }));
    },
    deleteMany(filter) {
      return translate(name, 'deleteMany', async () => ({ deletedCount: (await collection.deleteMany(filter)).deletedCount }));
    },
    findOneAndUpdate(filter, update, options = {}) {
      return translate(name, 'findOneAndUpdate', async () =>
        toDocument(
          await collection.findOneAndUpdate(filter, update, {
            upsert: options.upsert,
            returnDocument: options.returnDocument ?? 'before',
            projection: options.projection,
          }),
        ),
      );
    },
    aggregate(pipeline) {
      return translate(name, 'aggregate', async () => {
        const docs = await collection.aggregate(pipeline).toArray();
        return docs.map(doc => ({ ...doc }));
      });
    },
    createIndex(index) {
      return translate(name, 'createIndex', () =>
        collection.createIndex(index.keys, { unique: index.unique, name: index.name }),
      );
    },
  };
}

export function createMongoDocumentStoreFromDb(db: Db, onClose: () => Promise<void>): DocumentStore {
  const collections = new Map<string, DocumentCollection>();
  return {
    collection(name) {
      let collection = collections.get(name);
      if (!collection) {
        collection = createMongoCollection(db.collection(name));
        collections.set(name, collection);
      }
      return collection;
    },
    close: onClose,
  };
}

/**
 * Connects lazily: the driver opens its pool on the first operation, so
 * building the store never blocks process start.
 */
export function createMongoDocumentStore(config: MongoConfig): DocumentStore {
  const client = new MongoClient(config.uri);
  return createMongoDocumentStoreFromDb(client.db(config.dbName), () => client.close());
}
