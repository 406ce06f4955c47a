import type { Logger } from '../../common/logger.js';
import { systemClock, type AuditEntry, type Clock, type TenantId } from '../../common/types.js';
import type { TenantStoreFactory } from '../scope/scoped-store.js';
import {
  AUDIT_COLLECTION,
  buildAuditEntries,
  fromAuditDocument,
  toAuditDocument,
  type ChangeSet,
} from './audit-entry.model.js';

export const DEFAULT_HISTORY_LIMIT = 100;

export interface RecordAuditInput {
  entityId: string;
  actorId: string;
  tenantId: TenantId;
  changes: ChangeSet;
  comment?: string;
}

export interface HistoryOptions {
  limit?: number;
}

export interface AuditLogService {
  /**
   * Appends one entry per changed field. Rejects when the batch cannot be
   * written; callers must then treat their own mutation as failed.
   */
  record(input: RecordAuditInput): Promise<AuditEntry[]>;
  recordCreation(entityId: string, actorId: string, tenantId: TenantId): Promise<AuditEntry[]>;
  history(tenantId: TenantId, entityId: string, options?: HistoryOptions): Promise<AuditEntry[]>;
  recentActivity(tenantId: TenantId, options?: HistoryOptions): Promise<AuditEntry[]>;
}

export interface AuditLogDeps {
  stores: TenantStoreFactory;
  logger: Logger;
  clock?: Clock;
}

export function createAuditLogService(deps: AuditLogDeps): AuditLogService {
  const { stores, logger } = deps;
  const clock = deps.clock ?? systemClock;

  async function record(input: RecordAuditInput): Promise<AuditEntry[]> {
    const entries = buildAuditEntries({ ...input, timestamp: clock() });
    if (entries.length === 0) {
      return [];
    }
    const collection = stores.forTenant(input.tenantId).collection(AUDIT_COLLECTION);
    try {
      await collection.insertMany(entries.map(toAuditDocument));
    } catch (err) {
      logger.error(
        { err, tenantId: input.tenantId, entityId: input.entityId, fields: entries.map(entry => entry.field) },
        'Failed to write audit entries',
      );
      throw err;
    }
    return entries;
  }

  async function list(tenantId: TenantId, filter: Record<string, unknown>, options: HistoryOptions): Promise<AuditEntry[]> {
    const collection = stores.forTenant(tenantId).collection(AUDIT_COLLECTION);
    const docs = await collection.find(filter, {
      sort: { timestamp: -1 },
      limit: options.limit ?? DEFAULT_HISTORY_LIMIT,
    });
    return docs.map(doc => fromAuditDocument(doc, tenantId));
  }

  return {
    record,
    recordCreation(entityId, actorId, tenantId) {
      return record({ entityId, actorId, tenantId, changes: { creation: [null, 'Task Created'] } });
    },
    history(tenantId, entityId, options = {}) {
      return list(tenantId, { task_id: entityId }, options);
    },
    recentActivity(tenantId, options = {}) {
      return list(tenantId, {}, options);
    },
  };
}
