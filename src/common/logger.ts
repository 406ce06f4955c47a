import type { FastifyBaseLogger } from 'fastify';
import pino from 'pino';
import type { LoggingConfig } from '../config/index.js';

// The pino shape Fastify exposes as request.log / app.log, so services and
// routes share one logger instance.
export type Logger = FastifyBaseLogger;

export function createLogger(config: LoggingConfig): Logger {
  return pino({
    name: config.name,
    level: config.level,
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}
