import type { TenantId } from '../../common/types.js';
import type { DocumentStore } from '../../infrastructure/document-store.js';
import { createScopedCollection, type ScopedCollection } from './scoped-collection.js';
import { resolveScopeField, type ScopeFieldPolicy } from './scope-field.policy.js';

/**
 * Tenant view of the document store. Every collection handle it hands out is
 * already filtered to the tenant, so callers need no per-call discipline.
 */
export interface ScopedStore {
  readonly tenantId: TenantId;
  collection(name: string): ScopedCollection;
}

export interface TenantStoreFactory {
  forTenant(tenantId: TenantId): ScopedStore;
}

export function createScopedStore(
  store: DocumentStore,
  tenantId: TenantId,
  policy: ScopeFieldPolicy = resolveScopeField,
): ScopedStore {
  if (!tenantId) {
    throw new Error('Scoped store requires a tenant id');
  }
  const handles = new Map<string, ScopedCollection>();
  return {
    tenantId,
    collection(name) {
      let handle = handles.get(name);
      if (!handle) {
        handle = createScopedCollection(store.collection(name), tenantId, policy(name));
        handles.set(name, handle);
      }
      return handle;
    },
  };
}

export function createTenantStoreFactory(
  store: DocumentStore,
  policy: ScopeFieldPolicy = resolveScopeField,
): TenantStoreFactory {
  return {
    forTenant(tenantId) {
      return createScopedStore(store, tenantId, policy);
    },
  };
}
