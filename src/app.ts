import Fastify from 'fastify';
import { isAppError } from './common/errors.js';
import { createSilentLogger, type Logger } from './common/logger.js';
import { createInMemoryServiceBundle, type ServiceBundle } from './infrastructure/repositories.js';
import { auditRoutes } from './modules/audit/audit.routes.js';
import { registerTenancy, type IdentityResolver } from './modules/auth/auth.middleware.js';
import { authRoutes } from './modules/auth/auth.routes.js';
import { sequenceRoutes } from './modules/sequences/sequence.routes.js';

export interface AppDependencies {
  services?: ServiceBundle;
  logger?: Logger;
  resolveIdentity: IdentityResolver;
}

export function buildApp(deps: AppDependencies) {
  const logger = deps.logger ?? createSilentLogger();
  const app = Fastify({ logger });
  const services = deps.services ?? createInMemoryServiceBundle({ logger });

  app.setErrorHandler((err, request, reply) => {
    if (isAppError(err)) {
      if (err.statusCode >= 500) {
        request.log.error({ err }, err.message);
      } else {
        request.log.warn({ code: err.code }, err.message);
      }
      return reply.code(err.statusCode).send({ error: err.message, code: err.code });
    }
    if (err.statusCode && err.statusCode < 500) {
      return reply.code(err.statusCode).send({ error: err.message, code: err.code ?? 'BAD_REQUEST' });
    }
    request.log.error({ err }, 'Unhandled error');
    return reply.code(500).send({ error: 'Internal Server Error', code: 'INTERNAL' });
  });

  // Identity and tenant scoping for everything except public paths
  registerTenancy(app, {
    stores: services.stores,
    resolveIdentity: deps.resolveIdentity,
  });

  app.register(authRoutes, { authorization: services.authorization });
  app.register(sequenceRoutes, { prefix: '/sequences', sequences: services.sequences });
  app.register(auditRoutes, { audit: services.audit });

  app.addHook('onClose', async () => {
    await services.dispose();
  });

  app.get('/health', async () => ({ status: 'ok' }));
  return app;
}
