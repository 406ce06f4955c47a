import type { FastifyInstance } from 'fastify';
import { financeGuard, requireIdentity } from './auth.middleware.js';
import { hasFinanceAccess, type AuthorizationService } from './authorization.service.js';

export interface AuthRoutesOptions {
  authorization: AuthorizationService;
}

export async function authRoutes(app: FastifyInstance, options: AuthRoutesOptions) {
  const { authorization } = options;

  app.get('/me/permissions', async req => {
    const identity = requireIdentity(req);
    return {
      userId: identity.userId,
      tenantId: identity.tenantId,
      role: identity.role,
      financeAccess: hasFinanceAccess(identity),
      verticals: await authorization.resolveVerticals(identity),
    };
  });

  app.get('/me/verticals', async req => {
    return { verticals: await authorization.resolveVerticals(requireIdentity(req)) };
  });

  app.get('/finance/access', { preHandler: financeGuard() }, async () => {
    return { financeAccess: true };
  });
}
