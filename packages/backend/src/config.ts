import path from 'node:path';
import type { AuthConfig } from './auth.js';
import { isLogLevel, type LogLevel } from './logger.js';
import type { PersistenceConfig } from './persistence/index.js';
import { DEFAULT_BROADCAST_CAPACITY } from './services/coordinator.js';

export type BackendConfig = {
  port: number;
  logLevel: LogLevel;
  snapshotIntervalMs: number;
  broadcastCapacity: number;
  persistence: PersistenceConfig;
  auth: AuthConfig;
};

const HOUR_MS = 60 * 60 * 1000;

const parseNumber = (value: string | undefined, fallback: number) => {
  const parsed = Number.parseInt(value ?? `${fallback}`, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

const parseLogLevel = (): LogLevel => {
  const level = (process.env.LOG_LEVEL ?? 'info').trim().toLowerCase();

  if (!isLogLevel(level)) {
    throw new Error(`LOG_LEVEL must be one of fatal, error, warn, info, debug, trace, silent (received ${level})`);
  }

  return level;
};

const parseAuthConfig = (): AuthConfig => {
  const mode = (process.env.AUTH_MODE ?? 'token').toLowerCase();

  if (mode === 'local') {
    return {
      mode: 'local',
      defaultUserName: process.env.DEFAULT_USER_NAME?.trim() || 'local-user'
    };
  }

  if (mode !== 'token') {
    throw new Error(`Unsupported AUTH_MODE ${mode}`);
  }

  const tokenSecret = process.env.AUTH_TOKEN_SECRET;

  if (!tokenSecret) {
    throw new Error('AUTH_TOKEN_SECRET must be defined when using token authentication');
  }

  const ttlHours = Math.max(1, parseNumber(process.env.AUTH_TOKEN_TTL_HOURS, 24 * 365));
  const googleClientId = process.env.GOOGLE_CLIENT_ID?.trim();

  return {
    mode: 'token',
    tokenSecret,
    tokenTtlMs: ttlHours * HOUR_MS,
    ...(googleClientId ? { googleClientId } : {})
  };
};

const parsePersistenceConfig = (): PersistenceConfig => {
  const driver = (process.env.PERSISTENCE_DRIVER ?? 'filesystem').toLowerCase();

  if (driver === 'mongo') {
    const uri = process.env.MONGO_URI;

    if (!uri) {
      throw new Error('MONGO_URI must be defined when using mongo persistence');
    }

    return {
      driver: 'mongo',
      uri,
      database: process.env.MONGO_DATABASE ?? 'switchyard',
      collection: process.env.MONGO_COLLECTION ?? 'snapshots'
    };
  }

  if (driver === 'memory') {
    return { driver: 'memory' };
  }

  if (driver !== 'filesystem') {
    throw new Error(`Unsupported PERSISTENCE_DRIVER ${driver}`);
  }

  const dataDir = process.env.DATA_DIR ?? path.resolve(process.cwd(), 'data');

  return {
    driver: 'filesystem',
    dataFile: path.join(dataDir, 'store.json'),
    backupDir: process.env.BACKUP_DIR ?? path.join(dataDir, 'backups'),
    maxBackups: Math.max(0, parseNumber(process.env.MAX_BACKUPS, 10))
  };
};

export const loadConfig = (): BackendConfig => ({
  port: parseNumber(process.env.PORT, 3000),
  logLevel: parseLogLevel(),
  snapshotIntervalMs: Math.max(100, parseNumber(process.env.SNAPSHOT_INTERVAL_MS, 10_000)),
  broadcastCapacity: Math.max(1, parseNumber(process.env.BROADCAST_CAPACITY, DEFAULT_BROADCAST_CAPACITY)),
  persistence: parsePersistenceConfig(),
  auth: parseAuthConfig()
});
