import { IdentifierCollisionError } from '../../common/errors.js';
import type { Logger } from '../../common/logger.js';
import { systemClock, type Clock, type SequenceCounter, type TenantId } from '../../common/types.js';
import type { DocumentStore } from '../../infrastructure/document-store.js';
import { resolveScopeField, type ScopeFieldPolicy } from '../scope/scope-field.policy.js';
import type { TenantStoreFactory } from '../scope/scoped-store.js';

export const SEQUENCE_COUNTERS_COLLECTION = 'sequence_counters';

export interface NextSequenceOptions {
  /** Overrides the clock-derived period (UTC year). */
  period?: string;
  /**
   * Caller-side existence check for an issued identifier, for data that was
   * numbered outside this generator.
   */
  isTaken?: (identifier: string) => Promise<boolean>;
}

export interface SequenceService {
  next(tenantId: TenantId, category: string, options?: NextSequenceOptions): Promise<string>;
  counter(tenantId: TenantId, category: string, period?: string): Promise<SequenceCounter | null>;
  current(tenantId: TenantId, category: string, period?: string): Promise<number>;
  initialize(tenantId: TenantId, category: string, startingAt: number, period?: string): Promise<void>;
  ensureIndexes(): Promise<void>;
}

export interface SequenceServiceDeps {
  store: DocumentStore;
  stores: TenantStoreFactory;
  logger: Logger;
  clock?: Clock;
  padWidth?: number;
  policy?: ScopeFieldPolicy;
}

function padNumber(n: number, width: number): string {
  const s = String(n);
  return s.length >= width ? s : '0'.repeat(width - s.length) + s;
}

export function normalizeCategory(category: string): string {
  const normalized = category.trim().toUpperCase();
  if (!normalized) {
    throw new Error('Sequence category must not be empty');
  }
  return normalized;
}

export function sequenceKey(tenantId: TenantId, category: string, period: string): string {
  return `${tenantId}|${normalizeCategory(category)}|${period}`;
}

export function formatIdentifier(category: string, period: string, seq: number, padWidth = 4): string {
  return `${normalizeCategory(category)}-${period}-${padNumber(seq, padWidth)}`;
}

function readSeq(doc: Record<string, unknown> | null): number {
  const seq = doc?.seq;
  if (typeof seq !== 'number' || !Number.isInteger(seq) || seq < 0) {
    throw new Error('invalid sequence state');
  }
  return seq;
}

export function createSequenceService(deps: SequenceServiceDeps): SequenceService {
  const { store, stores, logger } = deps;
  const clock = deps.clock ?? systemClock;
  const padWidth = deps.padWidth ?? 4;
  const policy = deps.policy ?? resolveScopeField;

  function currentPeriod(): string {
    return String(clock().getUTCFullYear());
  }

  // One round trip: increment-or-create and read back the new value. The key
  // lives in _id, whose built-in unique index makes concurrent first upserts
  // collapse onto one document without any index setup.
  async function increment(tenantId: TenantId, category: string, period: string): Promise<number> {
    const counters = stores.forTenant(tenantId).collection(SEQUENCE_COUNTERS_COLLECTION);
    const doc = await counters.findOneAndUpdate(
      { _id: sequenceKey(tenantId, category, period) },
      {
        $inc: { seq: 1 },
        $setOnInsert: { category: normalizeCategory(category), period },
      },
      { upsert: true, returnDocument: 'after' },
    );
    return readSeq(doc);
  }

  async function next(tenantId: TenantId, category: string, options: NextSequenceOptions = {}): Promise<string> {
    const period = options.period ?? currentPeriod();
    const log = logger.child({ tenantId, category: normalizeCategory(category), period });

    const first = formatIdentifier(category, period, await increment(tenantId, category, period), padWidth);
    if (!options.isTaken || !(await options.isTaken(first))) {
      log.debug({ identifier: first }, 'Issued identifier');
      return first;
    }

    log.warn({ identifier: first }, 'Issued identifier already exists, retrying once');
    const second = formatIdentifier(category, period, await increment(tenantId, category, period), padWidth);
    if (await options.isTaken(second)) {
      log.error({ identifier: second }, 'Identifier collision persisted after retry; counter is behind existing data');
      throw new IdentifierCollisionError(second);
    }
    log.debug({ identifier: second }, 'Issued identifier');
    return second;
  }

  async function counter(tenantId: TenantId, category: string, period?: string): Promise<SequenceCounter | null> {
    const targetPeriod = period ?? currentPeriod();
    const key = sequenceKey(tenantId, category, targetPeriod);
    const counters = stores.forTenant(tenantId).collection(SEQUENCE_COUNTERS_COLLECTION);
    const doc = await counters.findOne({ _id: key });
    if (!doc) {
      return null;
    }
    return { key, category: normalizeCategory(category), period: targetPeriod, seq: readSeq(doc) };
  }

  return {
    next,
    counter,
    async current(tenantId, category, period) {
      return (await counter(tenantId, category, period))?.seq ?? 0;
    },
    async initialize(tenantId, category, startingAt, period) {
      if (!Number.isInteger(startingAt) || startingAt < 0) {
        throw new Error('Starting counter must be a non-negative integer');
      }
      const targetPeriod = period ?? currentPeriod();
      const key = sequenceKey(tenantId, category, targetPeriod);
      const counters = stores.forTenant(tenantId).collection(SEQUENCE_COUNTERS_COLLECTION);
      const result = await counters.updateOne(
        { _id: key },
        { $setOnInsert: { category: normalizeCategory(category), period: targetPeriod, seq: startingAt } },
        { upsert: true },
      );
      if (result.upsertedId === null) {
        throw new Error(
          `Counter ${key} already exists; refusing to overwrite it to avoid identifier collisions`,
        );
      }
      logger.info({ tenantId, key, startingAt }, 'Counter initialized');
    },
    async ensureIndexes() {
      const scopeField = policy(SEQUENCE_COUNTERS_COLLECTION);
      await store.collection(SEQUENCE_COUNTERS_COLLECTION).createIndex({
        keys: { [scopeField]: 1, category: 1, period: 1 },
        unique: true,
        name: 'sequence_counter_lookup',
      });
    },
  };
}

