// Raw, unscoped document-store contract. Both the MongoDB adapter and the
// in-memory stand-in implement it; the scope guard wraps it.

export type Document = Record<string, unknown>;

export type Filter = Record<string, unknown>;

export type SortDirection = 1 | -1;

export type Sort = Record<string, SortDirection>;

export type Projection = Record<string, 0 | 1>;

export type PipelineStage = Record<string, unknown>;

export type UpdateOperator = `$${string}`;

/**
 * MongoDB update document. The named operators are the ones the in-memory
 * store applies; any other operator is passed through to the driver.
 */
export interface UpdateSpec {
  [operator: UpdateOperator]: Record<string, unknown> | undefined;
  $set?: Document;
  $unset?: Record<string, '' | 1 | true>;
  $inc?: Record<string, number>;
  $setOnInsert?: Document;
  $push?: Document;
  $rename?: Record<string, string>;
}

export interface FindOptions {
  sort?: Sort;
  skip?: number;
  limit?: number;
  projection?: Projection;
}

export interface UpdateOptions {
  upsert?: boolean;
}

export interface FindOneAndUpdateOptions extends UpdateOptions {
  returnDocument?: 'before' | 'after';
  projection?: Projection;
}

export interface InsertOneResult {
  insertedId: string;
}

export interface InsertManyResult {
  insertedCount: number;
  insertedIds: string[];
}

export interface UpdateResult {
  matchedCount: number;
  modifiedCount: number;
  upsertedId: string | null;
}

export interface DeleteResult {
  deletedCount: number;
}

export interface IndexSpec {
  keys: Record<string, SortDirection>;
  unique?: boolean;
  name?: string;
}

export interface DocumentCollection {
  readonly name: string;
  findOne(filter: Filter, options?: FindOptions): Promise<Document | null>;
  find(filter: Filter, options?: FindOptions): Promise<Document[]>;
  countDocuments(filter: Filter): Promise<number>;
  insertOne(document: Document): Promise<InsertOneResult>;
  insertMany(documents: Document[]): Promise<InsertManyResult>;
  updateOne(filter: Filter, update: UpdateSpec, options?: UpdateOptions): Promise<UpdateResult>;
  updateMany(filter: Filter, update: UpdateSpec, options?: UpdateOptions): Promise<UpdateResult>;
  deleteOne(filter: Filter): Promise<DeleteResult>;
  deleteMany(filter: Filter): Promise<DeleteResult>;
  /** Single atomic read-modify-write. */
  findOneAndUpdate(filter: Filter, update: UpdateSpec, options?: FindOneAndUpdateOptions): Promise<Document | null>;
  aggregate(pipeline: PipelineStage[]): Promise<Document[]>;
  createIndex(index: IndexSpec): Promise<string>;
}

export interface DocumentStore {
  collection(name: string): DocumentCollection;
  close(): Promise<void>;
}
