import { ForbiddenError } from '../../common/errors.js';
import type { Logger } from '../../common/logger.js';
import { FINANCE_ROLES, type Identity, type Role, type VerticalId } from '../../common/types.js';
import type { TenantStoreFactory } from '../scope/scoped-store.js';
import type { TenantConfigRepository } from '../tenant-config/tenant-config.repository.js';

/**
 * Exact set membership: no role implies another, so callers list every role
 * they accept.
 */
export function requireRole(identity: Identity, ...allowed: Role[]): Identity {
  if (!allowed.includes(identity.role)) {
    throw new ForbiddenError(`Requires one of: ${allowed.join(', ')}`);
  }
  return identity;
}

export function hasFinanceAccess(identity: Identity): boolean {
  return FINANCE_ROLES.includes(identity.role) || identity.financeAccess === true;
}

export function requireFinanceAccess(identity: Identity): Identity {
  if (!hasFinanceAccess(identity)) {
    throw new ForbiddenError('Finance data is restricted to owners, admins and members with finance access');
  }
  return identity;
}

/**
 * Owners see everything. Everyone else sees their allow-list intersected with
 * the configured verticals, and an empty allow-list means no restriction has
 * been configured yet, so it grants every vertical.
 */
export function selectVerticals(identity: Identity, configured: readonly VerticalId[]): VerticalId[] {
  if (identity.role === 'owner') {
    return [...configured];
  }
  const allowList = identity.allowedVerticals ?? [];
  if (allowList.length === 0) {
    return [...configured];
  }
  return configured.filter(id => allowList.includes(id));
}

export interface AuthorizationServiceDeps {
  stores: TenantStoreFactory;
  tenantConfig: TenantConfigRepository;
  logger: Logger;
}

export interface AuthorizationService {
  resolveVerticals(identity: Identity): Promise<VerticalId[]>;
  canAccessVertical(identity: Identity, verticalId: VerticalId): Promise<boolean>;
}

export function createAuthorizationService(deps: AuthorizationServiceDeps): AuthorizationService {
  const { stores, tenantConfig, logger } = deps;

  async function resolveVerticals(identity: Identity): Promise<VerticalId[]> {
    const config = await tenantConfig.load(stores.forTenant(identity.tenantId));
    const verticals = selectVerticals(
      identity,
      config.verticals.map(vertical => vertical.id),
    );
    logger.debug({ userId: identity.userId, tenantId: identity.tenantId, verticals }, 'Resolved verticals');
    return verticals;
  }

  return {
    resolveVerticals,
    async canAccessVertical(identity, verticalId) {
      return (await resolveVerticals(identity)).includes(verticalId);
    },
  };
}
