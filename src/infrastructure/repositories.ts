import type { AppConfig } from '../config/index.js';
import type { Logger } from '../common/logger.js';
import { systemClock, type Clock } from '../common/types.js';
import { createAuditLogService, type AuditLogService } from '../modules/audit/audit-log.service.js';
import {
  createAuthorizationService,
  type AuthorizationService,
} from '../modules/auth/authorization.service.js';
import { resolveScopeField, type ScopeFieldPolicy } from '../modules/scope/scope-field.policy.js';
import { createTenantStoreFactory, type TenantStoreFactory } from '../modules/scope/scoped-store.js';
import { createSequenceService, type SequenceService } from '../modules/sequences/sequence.service.js';
import {
  createTenantConfigRepository,
  type TenantConfigRepository,
} from '../modules/tenant-config/tenant-config.repository.js';
import type { DocumentStore } from './document-store.js';
import { createInMemoryDocumentStore } from './memory/document-store.memory.js';
import { createMongoDocumentStore } from './mongo/document-store.mongo.js';

export interface ServiceBundle {
  store: DocumentStore;
  stores: TenantStoreFactory;
  tenantConfig: TenantConfigRepository;
  authorization: AuthorizationService;
  sequences: SequenceService;
  audit: AuditLogService;
  dispose: () => Promise<void>;
}

export interface ServiceBundleOptions {
  logger: Logger;
  clock?: Clock;
  padWidth?: number;
  policy?: ScopeFieldPolicy;
}

export function createDocumentStoreFromConfig(config: AppConfig): DocumentStore {
  switch (config.persistence.provider) {
    case 'memory':
      return createInMemoryDocumentStore();
    case 'mongo':
    default:
      return createMongoDocumentStore(config.persistence.mongo);
  }
}

export function createServiceBundle(store: DocumentStore, options: ServiceBundleOptions): ServiceBundle {
  const { logger } = options;
  const clock = options.clock ?? systemClock;
  const policy = options.policy ?? resolveScopeField;
  const stores = createTenantStoreFactory(store, policy);
  const tenantConfig = createTenantConfigRepository(logger.child({ component: 'tenant-config' }));
  return {
    store,
    stores,
    tenantConfig,
    authorization: createAuthorizationService({
      stores,
      tenantConfig,
      logger: logger.child({ component: 'authorization' }),
    }),
    sequences: createSequenceService({
      store,
      stores,
      logger: logger.child({ component: 'sequences' }),
      clock,
      padWidth: options.padWidth,
      policy,
    }),
    audit: createAuditLogService({ stores, logger: logger.child({ component: 'audit' }), clock }),
    dispose: () => store.close(),
  };
}

export function createInMemoryServiceBundle(options: ServiceBundleOptions): ServiceBundle {
  return createServiceBundle(createInMemoryDocumentStore(), options);
}

export function createServiceBundleFromConfig(config: AppConfig, logger: Logger): ServiceBundle {
  return createServiceBundle(createDocumentStoreFromConfig(config), {
    logger,
    padWidth: config.sequences.padWidth,
  });
}
