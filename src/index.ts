export * from './common/errors.js';
export * from './common/types.js';
export { createLogger, createSilentLogger, type Logger } from './common/logger.js';
export { loadConfig, type AppConfig } from './config/index.js';
export type * from './infrastructure/document-store.js';
export { createInMemoryDocumentStore } from './infrastructure/memory/document-store.memory.js';
export { createMongoDocumentStore, createMongoDocumentStoreFromDb } from './infrastructure/mongo/document-store.mongo.js';
export {
  createDocumentStoreFromConfig,
  createInMemoryServiceBundle,
  createServiceBundle,
  createServiceBundleFromConfig,
  type ServiceBundle,
} from './infrastructure/repositories.js';
export * from './modules/scope/scope-field.policy.js';
export * from './modules/scope/scoped-collection.js';
export * from './modules/scope/scoped-store.js';
export * from './modules/auth/authorization.service.js';
export { parseIdentity } from './modules/auth/identity.js';
export * from './modules/sequences/sequence.service.js';
export * from './modules/audit/audit-entry.model.js';
export * from './modules/audit/audit-log.service.js';
export { defaultTenantConfig, DEFAULT_VERTICALS } from './modules/tenant-config/tenant-config.model.js';
export { buildApp, type AppDependencies } from './app.js';
export { createJwtIdentityResolver, type JwtIdentityOptions } from './modules/auth/jwt-identity.resolver.js';
export type { IdentityResolver } from './modules/auth/auth.middleware.js';
