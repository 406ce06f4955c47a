import type { FastifyInstance, FastifyRequest, preHandlerAsyncHookHandler } from 'fastify';
import { AuthError } from '../../common/errors.js';
import type { Identity, Role } from '../../common/types.js';
import type { ScopedStore, TenantStoreFactory } from '../scope/scoped-store.js';
import { requireFinanceAccess, requireRole } from './authorization.service.js';

/**
 * Supplied by the authentication collaborator. Returns undefined when the
 * request carries no credentials at all.
 */
export type IdentityResolver = (request: FastifyRequest) => Promise<Identity | undefined>;

export interface TenancyOptions {
  stores: TenantStoreFactory;
  resolveIdentity: IdentityResolver;
  publicPaths?: string[];
}

export function registerTenancy(app: FastifyInstance, options: TenancyOptions) {
  const publicPaths = options.publicPaths ?? ['/health'];

  app.decorateRequest('identity', undefined);
  app.decorateRequest('db', undefined);

  app.addHook('onRequest', async request => {
    const [path] = (request.raw.url ?? '').split('?');
    if (publicPaths.includes(path)) {
      return;
    }
    const identity = await options.resolveIdentity(request);
    if (!identity) {
      throw new AuthError('Missing identity');
    }
    request.identity = identity;
    request.db = options.stores.forTenant(identity.tenantId);
    request.log = request.log.child({ tenantId: identity.tenantId, userId: identity.userId });
  });
}

export function requireIdentity(request: FastifyRequest): Identity {
  if (!request.identity) {
    throw new AuthError('Missing identity');
  }
  return request.identity;
}

export function requireScopedStore(request: FastifyRequest): ScopedStore {
  if (!request.db) {
    throw new AuthError('Missing identity');
  }
  return request.db;
}

export function roleGuard(...allowed: Role[]): preHandlerAsyncHookHandler {
  return async function checkRole(request) {
    const identity = requireIdentity(request);
    try {
      requireRole(identity, ...allowed);
    } catch (err) {
      request.log.warn({ role: identity.role, allowed }, 'Access denied');
      throw err;
    }
  };
}

export function financeGuard(): preHandlerAsyncHookHandler {
  return async function checkFinanceAccess(request) {
    const identity = requireIdentity(request);
    try {
      requireFinanceAccess(identity);
    } catch (err) {
      request.log.warn({ role: identity.role }, 'Finance access denied');
      throw err;
    }
  };
}
