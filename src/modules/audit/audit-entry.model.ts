import { v4 as uuid } from 'uuid';
import type { AuditEntry, AuditValue, TenantId } from '../../common/types.js';
import type { Document } from '../../infrastructure/document-store.js';

export const AUDIT_COLLECTION = 'task_history';

export const BLOCKED_STATUS = 'blocked';

export type FieldChange = readonly [oldValue: unknown, newValue: unknown];

export type ChangeSet = Record<string, FieldChange>;

export function formatAuditValue(value: unknown): AuditValue {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'string') {
    return value;
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (typeof value === 'object') {
    return JSON.stringify(value);
  }
  return String(value);
}

export function isBlockTransition(changes: ChangeSet): boolean {
  const status = changes.status;
  return status !== undefined && status[1] === BLOCKED_STATUS;
}

export interface BuildEntriesInput {
  entityId: string;
  actorId: string;
  tenantId: TenantId;
  changes: ChangeSet;
  comment?: string;
  timestamp: Date;
}

// A block transition carries the comment on its status entry only; any
// other mutation keeps the comment on every entry.
export function buildAuditEntries(input: BuildEntriesInput): AuditEntry[] {
  const blocked = isBlockTransition(input.changes);
  return Object.entries(input.changes).map(([field, [oldValue, newValue]]) => {
    const entry: AuditEntry = {
      id: uuid(),
      entityId: input.entityId,
      actorId: input.actorId,
      field,
      oldValue: formatAuditValue(oldValue),
      newValue: formatAuditValue(newValue),
      tenantId: input.tenantId,
      timestamp: input.timestamp,
    };
    const carriesComment = blocked ? field === 'status' : true;
    if (input.comment !== undefined && carriesComment) {
      entry.comment = input.comment;
    }
    return entry;
  });
}

// task_history keeps its legacy snake_case layout; the tenant id lives in
// the collection's scope field, which the scope guard stamps on insert.
export function toAuditDocument(entry: AuditEntry): Document {
  return {
    id: entry.id,
    task_id: entry.entityId,
    changed_by: entry.actorId,
    field: entry.field,
    old_value: entry.oldValue,
    new_value: entry.newValue,
    comment: entry.comment ?? null,
    timestamp: entry.timestamp,
  };
}

function readString(doc: Document, key: string): string {
  const value = doc[key];
  return typeof value === 'string' ? value : '';
}

function readAuditValue(doc: Document, key: string): AuditValue {
  const value = doc[key];
  return typeof value === 'string' ? value : null;
}

function readTimestamp(doc: Document): Date {
  const value = doc.timestamp;
  if (value instanceof Date) return value;
  if (typeof value === 'string' || typeof value === 'number') return new Date(value);
  return new Date(0);
}

// Entries written before ids were assigned only carry _id.
function readEntryId(doc: Document): string {
  if (typeof doc.id === 'string' && doc.id.length > 0) return doc.id;
  return doc._id === undefined || doc._id === null ? '' : String(doc._id);
}

export function fromAuditDocument(doc: Document, tenantId: TenantId): AuditEntry {
  const entry: AuditEntry = {
    id: readEntryId(doc),
    entityId: readString(doc, 'task_id'),
    actorId: readString(doc, 'changed_by'),
    field: readString(doc, 'field'),
    oldValue: readAuditValue(doc, 'old_value'),
    newValue: readAuditValue(doc, 'new_value'),
    tenantId,
    timestamp: readTimestamp(doc),
  };
  const comment = doc.comment;
  if (typeof comment === 'string') {
    entry.comment = comment;
  }
  return entry;
}
