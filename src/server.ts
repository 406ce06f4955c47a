import { buildApp } from './app.js';
import { createLogger } from './common/logger.js';
import { loadConfig } from './config/index.js';
import { createServiceBundleFromConfig } from './infrastructure/repositories.js';
import { createJwtIdentityResolver } from './modules/auth/jwt-identity.resolver.js';

const config = loadConfig();
const logger = createLogger(config.logging);

process.on('unhandledRejection', reason => {
  logger.fatal({ err: reason }, 'Unhandled rejection');
  process.exit(1);
});

const start = async () => {
  const { jwtSecret, issuer, audience } = config.auth;
  if (!jwtSecret) {
    logger.fatal('AUTH_JWT_SECRET is required');
    process.exit(1);
  }
  logger.info({ provider: config.persistence.provider }, 'Creating services...');
  const services = createServiceBundleFromConfig(config, logger);
  await services.sequences.ensureIndexes();
  const app = buildApp({
    services,
    logger,
    resolveIdentity: createJwtIdentityResolver({ secret: jwtSecret, issuer, audience, logger }),
  });

  const shutdown = async (signal: string) => {
    logger.info({ signal }, 'Shutting down');
    await app.close();
    process.exit(0);
  };
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch(err => {
        logger.error({ err }, 'Error during shutdown');
        process.exit(1);
      });
    });
  }

  try {
    await app.listen({ port: config.server.port, host: config.server.host });
  } catch (err) {
    logger.fatal({ err }, 'Error starting server');
    process.exit(1);
  }
};

void start();
