import { beforeEach, describe, expect, it, vi } from 'vitest';
import { createSilentLogger } from '../../../common/logger.js';
import type { DocumentStore } from '../../../infrastructure/document-store.js';
import { createInMemoryDocumentStore } from '../../../infrastructure/memory/document-store.memory.js';
import { createTenantStoreFactory } from '../../scope/scoped-store.js';
import { formatAuditValue } from '../audit-entry.model.js';
import { createAuditLogService, type AuditLogService } from '../audit-log.service.js';

describe('formatAuditValue', () => {
  it('stores values as strings and keeps null', () => {
    expect(formatAuditValue(null)).toBeNull();
    expect(formatAuditValue(undefined)).toBeNull();
    expect(formatAuditValue('open')).toBe('open');
    expect(formatAuditValue(3)).toBe('3');
    expect(formatAuditValue(false)).toBe('false');
    expect(formatAuditValue(new Date('2026-01-02T03:04:05Z'))).toBe('2026-01-02T03:04:05.000Z');
    expect(formatAuditValue({ a: 1 })).toBe('{"a":1}');
  });
});

describe('createAuditLogService', () => {
  let store: DocumentStore;
  let now: Date;
  let audit: AuditLogService;
  const logger = createSilentLogger();

  beforeEach(() => {
    store = createInMemoryDocumentStore();
    now = new Date('2026-05-01T10:00:00Z');
    audit = createAuditLogService({ stores: createTenantStoreFactory(store), logger, clock: () => now });
  });

  it('writes one entry per changed field with a shared timestamp', async () => {
    const entries = await audit.record({
      entityId: 'task-1',
      actorId: 'u1',
      tenantId: 'T1',
      changes: { status: ['todo', 'in_progress'], priority: ['low', 'high'] },
    });

    expect(entries).toHaveLength(2);
    expect(entries.map(entry => entry.field)).toEqual(['status', 'priority']);
    expect(entries[0].timestamp).toEqual(now);
    expect(entries[1].timestamp).toEqual(now);
    expect(entries[0].id).not.toBe(entries[1].id);

    const stored = await store.collection('task_history').find({ task_id: 'task-1' });
    expect(stored).toHaveLength(2);
    expect(stored[0]).toMatchObject({
      id: entries[0].id,
      task_id: 'task-1',
      changed_by: 'u1',
      field: 'status',
      old_value: 'todo',
      new_value: 'in_progress',
      comment: null,
      studio_id: 'T1',
    });
  });

  it('puts the comment only on the status entry of a block transition', async () => {
    const entries = await audit.record({
      entityId: 'task-1',
      actorId: 'u1',
      tenantId: 'T1',
      changes: { status: ['in_progress', 'blocked'], assignee: ['u2', 'u3'] },
      comment: 'waiting on venue',
    });

    expect(entries.find(entry => entry.field === 'status')?.comment).toBe('waiting on venue');
    expect(entries.find(entry => entry.field === 'assignee')?.comment).toBeUndefined();
  });

  it('keeps the comment on every entry of other mutations', async () => {
    const entries = await audit.record({
      entityId: 'task-1',
      actorId: 'u1',
      tenantId: 'T1',
      changes: { status: ['blocked', 'todo'], title: ['a', 'b'] },
      comment: 'unblocked',
    });
    expect(entries.map(entry => entry.comment)).toEqual(['unblocked', 'unblocked']);
  });

  it('writes nothing for an empty change map', async () => {
    expect(await audit.record({ entityId: 'task-1', actorId: 'u1', tenantId: 'T1', changes: {} })).toEqual([]);
    expect(await store.collection('task_history').countDocuments({})).toBe(0);
  });

  it('rethrows a failed write after logging it', async () => {
    const failure = new Error('write failed');
    vi.spyOn(store.collection('task_history'), 'insertMany').mockRejectedValueOnce(failure);
    const error = vi.spyOn(logger, 'error');

    await expect(
      audit.record({ entityId: 'task-1', actorId: 'u1', tenantId: 'T1', changes: { status: ['todo', 'done'] } }),
    ).rejects.toBe(failure);
    expect(error).toHaveBeenCalledWith(
      { err: failure, tenantId: 'T1', entityId: 'task-1', fields: ['status'] },
      'Failed to write audit entries',
    );
  });

  it('records task creation as a single entry', async () => {
    const [entry] = await audit.recordCreation('task-9', 'u1', 'T1');
    expect(entry).toMatchObject({ field: 'creation', oldValue: null, newValue: 'Task Created', entityId: 'task-9' });
  });

  it('returns history newest first within the tenant', async () => {
    await audit.record({ entityId: 'task-1', actorId: 'u1', tenantId: 'T1', changes: { title: ['a', 'b'] } });
    now = new Date('2026-05-01T11:00:00Z');
    await audit.record({ entityId: 'task-1', actorId: 'u2', tenantId: 'T1', changes: { title: ['b', 'c'] } });
    await audit.record({ entityId: 'task-1', actorId: 'u3', tenantId: 'T2', changes: { title: ['x', 'y'] } });
    await audit.record({ entityId: 'task-2', actorId: 'u1', tenantId: 'T1', changes: { title: ['m', 'n'] } });

    const history = await audit.history('T1', 'task-1');
    expect(history.map(entry => [entry.actorId, entry.newValue])).toEqual([
      ['u2', 'c'],
      ['u1', 'b'],
    ]);
    expect(history.every(entry => entry.tenantId === 'T1')).toBe(true);

    expect(await audit.history('T1', 'task-1', { limit: 1 })).toHaveLength(1);
    expect((await audit.recentActivity('T1')).map(entry => entry.entityId)).toEqual(['task-1', 'task-2', 'task-1']);
  });

  it('falls back to the stored _id for entries written without an id', async () => {
    await store.collection('task_history').insertOne({
      _id: 'legacy-1',
      task_id: 'task-7',
      changed_by: 'u1',
      field: 'status',
      old_value: 'todo',
      new_value: 'done',
      timestamp: new Date('2025-12-01T08:00:00Z'),
      studio_id: 'T1',
    });

    const [entry] = await audit.history('T1', 'task-7');
    expect(entry).toEqual({
      id: 'legacy-1',
      entityId: 'task-7',
      actorId: 'u1',
      field: 'status',
      oldValue: 'todo',
      newValue: 'done',
      tenantId: 'T1',
      timestamp: new Date('2025-12-01T08:00:00Z'),
    });
  });
});
