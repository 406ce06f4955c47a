export type PersistenceProvider = 'mongo' | 'memory';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface ServerConfig {
  port: number;
  host: string;
}

export interface LoggingConfig {
  name: string;
  level: LogLevel;
}

export interface MongoConfig {
  uri: string;
  dbName: string;
}

export interface PersistenceConfig {
  provider: PersistenceProvider;
  mongo: MongoConfig;
}

export interface SequenceConfig {
  padWidth: number;
}

export interface AuthConfig {
  jwtSecret?: string;
  issuer?: string;
  audience?: string;
}

export interface AppConfig {
  server: ServerConfig;
  auth: AuthConfig;
  logging: LoggingConfig;
  persistence: PersistenceConfig;
  sequences: SequenceConfig;
}

const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function readIntFromEnv(envName: string): number | undefined {
  const raw = process.env[envName];
  if (!raw) {
    return undefined;
  }
  const parsed = Number.parseInt(raw, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : undefined;
}

function readProviderFromEnv(envName: string): PersistenceProvider {
  const raw = (process.env[envName] ?? 'mongo').toLowerCase();
  if (raw === 'memory') return 'memory';
  return 'mongo';
}

function readLogLevelFromEnv(envName: string): LogLevel {
  const raw = (process.env[envName] ?? 'info').toLowerCase();
  return LOG_LEVELS.find(level => level === raw) ?? 'info';
}

export function loadConfig(): AppConfig {
  const port = readIntFromEnv('PORT') ?? 3000;
  const host = process.env.HOST || '0.0.0.0';
  const level = readLogLevelFromEnv('LOG_LEVEL');
  const provider = readProviderFromEnv('DB_PROVIDER');
  const uri = process.env.MONGO_URI || 'mongodb://localhost:27017';
  const dbName = process.env.DB_NAME || 'agency-core';
  const padWidth = readIntFromEnv('SEQUENCE_PAD_WIDTH') ?? 4;

  return {
    server: { port, host },
    auth: {
      jwtSecret: process.env.AUTH_JWT_SECRET || undefined,
      issuer: process.env.AUTH_JWT_ISSUER || undefined,
      audience: process.env.AUTH_JWT_AUDIENCE || undefined,
    },
    logging: { name: 'agency-core', level },
    persistence: {
      provider,
      mongo: { uri, dbName },
    },
    sequences: { padWidth },
  };
}
