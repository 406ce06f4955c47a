import type { TenantId } from '../../common/types.js';
import type {
  Document,
  DocumentCollection,
  Filter,
  PipelineStage,
  UpdateOperator,
  UpdateSpec,
} from '../../infrastructure/document-store.js';

export interface ScopedCollection extends Omit<DocumentCollection, 'createIndex'> {
  readonly tenantId: TenantId;
  readonly scopeField: string;
}

// The guard's value is spread last so it always wins over a caller-supplied
// scope field. Documents missing the field never match.
export function mergeScopeFilter(filter: Filter | undefined, scopeField: string, tenantId: TenantId): Filter {
  return { ...(filter ?? {}), [scopeField]: tenantId };
}

export function stampDocument(document: Document, scopeField: string, tenantId: TenantId): Document {
  return { ...document, [scopeField]: tenantId };
}

export function scopePipeline(pipeline: PipelineStage[], scopeField: string, tenantId: TenantId): PipelineStage[] {
  return [{ $match: { [scopeField]: tenantId } }, ...pipeline];
}

function touchesScopeField(path: string, scopeField: string): boolean {
  return path === scopeField || path.startsWith(`${scopeField}.`);
}

function isOperator(key: string): key is UpdateOperator {
  return key.startsWith('$');
}

/**
 * Drops every update operator entry that would rewrite the tenant field.
 * Other entries pass through under whatever operator they use.
 */
export function sanitizeUpdate(update: UpdateSpec, scopeField: string): UpdateSpec {
  const sanitized: UpdateSpec = {};
  for (const [operator, entries] of Object.entries(update)) {
    if (!isOperator(operator) || !entries) continue;
    const kept: Record<string, unknown> = {};
    for (const [path, value] of Object.entries(entries)) {
      if (touchesScopeField(path, scopeField)) continue;
      // $rename names its target in the value.
      if (operator === '$rename' && typeof value === 'string' && touchesScopeField(value, scopeField)) continue;
      kept[path] = value;
    }
    sanitized[operator] = kept;
  }
  return sanitized;
}

export function createScopedCollection(
  raw: DocumentCollection,
  tenantId: TenantId,
  scopeField: string,
): ScopedCollection {
  const scope = (filter?: Filter) => mergeScopeFilter(filter, scopeField, tenantId);

  return {
    name: raw.name,
    tenantId,
    scopeField,
    findOne(filter, options) {
      return raw.findOne(scope(filter), options);
    },
    find(filter, options) {
      return raw.find(scope(filter), options);
    },
    countDocuments(filter) {
      return raw.countDocuments(scope(filter));
    },
    insertOne(document) {
      return raw.insertOne(stampDocument(document, scopeField, tenantId));
    },
    insertMany(documents) {
      return raw.insertMany(documents.map(document => stampDocument(document, scopeField, tenantId)));
    },
    updateOne(filter, update, options) {
      return raw.updateOne(scope(filter), sanitizeUpdate(update, scopeField), options);
    },
    updateMany(filter, update, options) {
      return raw.updateMany(scope(filter), sanitizeUpdate(update, scopeField), options);
    },
    deleteOne(filter) {
      return raw.deleteOne(scope(filter));
    },
    deleteMany(filter) {
      return raw.deleteMany(scope(filter));
    },
    findOneAndUpdate(filter, update, options) {
      return raw.findOneAndUpdate(scope(filter), sanitizeUpdate(update, scopeField), options);
    },
    aggregate(pipeline) {
      return raw.aggregate(scopePipeline(pipeline, scopeField, tenantId));
    },
  };
}
