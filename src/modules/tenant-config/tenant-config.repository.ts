import type { Logger } from '../../common/logger.js';
import type { TenantConfig } from '../../common/types.js';
import type { ScopedStore } from '../scope/scoped-store.js';
import {
  TENANT_CONFIG_COLLECTION,
  defaultTenantConfig,
  parseStoredVerticals,
} from './tenant-config.model.js';

export interface TenantConfigRepository {
  /** Configured verticals, or the defaults when the tenant has none stored. */
  load(store: ScopedStore): Promise<TenantConfig>;
}

export function createTenantConfigRepository(logger: Logger): TenantConfigRepository {
  async function readStored(store: ScopedStore): Promise<TenantConfig | undefined> {
    const doc = await store.collection(TENANT_CONFIG_COLLECTION).findOne({});
    if (!doc) {
      return undefined;
    }
    const verticals = parseStoredVerticals(doc);
    if (!verticals) {
      logger.warn({ tenantId: store.tenantId }, 'Tenant config has no usable vertical list, using defaults');
      return undefined;
    }
    return { tenantId: store.tenantId, verticals };
  }

  return {
    async load(store) {
      return (await readStored(store)) ?? defaultTenantConfig(store.tenantId);
    },
  };
}
