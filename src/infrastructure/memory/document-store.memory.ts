import { v4 as uuid } from 'uuid';
import type {
  Document,
  DocumentCollection,
  DocumentStore,
  Filter,
  FindOptions,
  IndexSpec,
  UpdateOptions,
  UpdateResult,
  UpdateSpec,
} from '../document-store.js';
import {
  applyProjection,
  applyUpdate,
  matchesFilter,
  resolvePath,
  runPipeline,
  seedFromFilter,
  sortDocuments,
  valuesEqual,
} from './query.js';

export class DuplicateKeyError extends Error {
  readonly code = 11000;

  constructor(collection: string, index: string) {
    super(`E11000 duplicate key error collection: ${collection} index: ${index}`);
    this.name = 'DuplicateKeyError';
  }
}

// Every collection has a unique _id index, as in MongoDB.
const ID_INDEX: IndexSpec = { keys: { _id: 1 }, unique: true, name: '_id_' };

function indexName(index: IndexSpec): string {
  return index.name ?? Object.entries(index.keys).map(([key, direction]) => `${key}_${direction}`).join('_');
}

// Every method body runs synchronously once entered, so each operation is
// atomic with respect to the others, findOneAndUpdate included.
export function createInMemoryCollection(name: string): DocumentCollection {
  const docs: Document[] = [];
  const uniqueIndexes: IndexSpec[] = [];

  function assertUnique(candidate: Document, ignore?: Document, staged: Document[] = []) {
    for (const index of [ID_INDEX, ...uniqueIndexes]) {
      const paths = Object.keys(index.keys);
      const clash = [...docs, ...staged].some(
        existing =>
          existing !== ignore &&
          paths.every(path => valuesEqual(resolvePath(existing, path), resolvePath(candidate, path))),
      );
      if (clash) {
        throw new DuplicateKeyError(name, indexName(index));
      }
    }
  }

  function prepare(document: Document): Document {
    const stored = structuredClone(document);
    if (stored._id === undefined) {
      stored._id = uuid();
    }
    return stored;
  }

  function insert(document: Document): Document {
    const stored = prepare(document);
    assertUnique(stored);
    docs.push(stored);
    return stored;
  }

  function select(filter: Filter, options: FindOptions = {}): Document[] {
    let matched = sortDocuments(docs.filter(doc => matchesFilter(doc, filter)), options.sort);
    if (options.skip) {
      matched = matched.slice(options.skip);
    }
    if (options.limit) {
      matched = matched.slice(0, options.limit);
    }
    return matched;
  }

  function modify(target: Document, update: UpdateSpec): boolean {
    const before = structuredClone(target);
    const next = structuredClone(target);
    applyUpdate(next, update, false);
    assertUnique(next, target);
    for (const key of Object.keys(target)) {
      delete target[key];
    }
    Object.assign(target, next);
    return !valuesEqual(before, target);
  }

  function upsert(filter: Filter, update: UpdateSpec): Document {
    const seed = seedFromFilter(filter);
    applyUpdate(seed, update, true);
    return insert(seed);
  }

  function update(filter: Filter, spec: UpdateSpec, options: UpdateOptions, many: boolean): UpdateResult {
    const matched = docs.filter(doc => matchesFilter(doc, filter));
    const targets = many ? matched : matched.slice(0, 1);
    if (targets.length === 0 && options.upsert) {
      const inserted = upsert(filter, spec);
      return { matchedCount: 0, modifiedCount: 0, upsertedId: String(inserted._id) };
    }
    let modifiedCount = 0;
    for (const target of targets) {
      if (modify(target, spec)) {
        modifiedCount += 1;
      }
    }
    return { matchedCount: targets.length, modifiedCount, upsertedId: null };
  }

  function remove(filter: Filter, many: boolean): number {
    let deletedCount = 0;
    for (let index = docs.length - 1; index >= 0; index -= 1) {
      if (matchesFilter(docs[index], filter)) {
        docs.splice(index, 1);
        deletedCount += 1;
        if (!many) break;
      }
    }
    return deletedCount;
  }

  return {
    name,
    async findOne(filter, options) {
      const [first] = select(filter, { ...options, limit: 1 });
      return first ? applyProjection(structuredClone(first), options?.projection) : null;
    },
    async find(filter, options) {
      return select(filter, options).map(doc => applyProjection(structuredClone(doc), options?.projection));
    },
    async countDocuments(filter) {
      return docs.filter(doc => matchesFilter(doc, filter)).length;
    },
    async insertOne(document) {
      return { insertedId: String(insert(document)._id) };
    },
    async insertMany(documents) {
      // All-or-nothing: the whole batch is checked before any write lands.
      const staged: Document[] = [];
      for (const document of documents) {
        const stored = prepare(document);
        assertUnique(stored, undefined, staged);
        staged.push(stored);
      }
      docs.push(...staged);
      return { insertedCount: staged.length, insertedIds: staged.map(doc => String(doc._id)) };
    },
    async updateOne(filter, spec, options = {}) {
      return update(filter, spec, options, false);
    },
    async updateMany(filter, spec, options = {}) {
      return update(filter, spec, options, true);
    },
    async deleteOne(filter) {
      return { deletedCount: remove(filter, false) };
    },
    async deleteMany(filter) {
      return { deletedCount: remove(filter, true) };
    },
    async findOneAndUpdate(filter, spec, options = {}) {
      const target = docs.find(doc => matchesFilter(doc, filter));
      if (!target) {
        if (!options.upsert) {
          return null;
        }
        const inserted = upsert(filter, spec);
        return options.returnDocument === 'after'
          ? applyProjection(structuredClone(inserted), options.projection)
          : null;
      }
      const before = structuredClone(target);
      modify(target, spec);
      const result = options.returnDocument === 'after' ? structuredClone(target) : before;
      return applyProjection(result, options.projection);
    },
    async aggregate(pipeline) {
      return runPipeline(docs.map(doc => structuredClone(doc)), pipeline);
    },
    async createIndex(index) {
      const created = indexName(index);
      if (index.unique && !uniqueIndexes.some(existing => indexName(existing) === created)) {
        uniqueIndexes.push(index);
      }
      return created;
    },
  };
}

export function createInMemoryDocumentStore(): DocumentStore {
  const collections = new Map<string, DocumentCollection>();

  return {
    collection(name) {
      let collection = collections.get(name);
      if (!collection) {
        collection = createInMemoryCollection(name);
        collections.set(name, collection);
      }
      return collection;
    },
    async close() {
      collections.clear();
    },
  };
}
