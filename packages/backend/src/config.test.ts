import assert from 'node:assert/strict';
import path from 'node:path';
import test from 'node:test';
import { loadConfig } from './config.js';

const CONFIG_KEYS = [
  'PORT',
  'LOG_LEVEL',
  'PERSISTENCE_DRIVER',
  'DATA_DIR',
  'BACKUP_DIR',
  'MAX_BACKUPS',
  'MONGO_URI',
  'MONGO_DATABASE',
  'MONGO_COLLECTION',
  'SNAPSHOT_INTERVAL_MS',
  'BROADCAST_CAPACITY',
  'AUTH_MODE',
  'AUTH_TOKEN_SECRET',
  'AUTH_TOKEN_TTL_HOURS',
  'GOOGLE_CLIENT_ID',
  'DEFAULT_USER_NAME'
];

const withCleanEnv = (overrides: Record<string, string>, run: () => void) => {
  const originalEnv = { ...process.env };

  try {
    for (const key of CONFIG_KEYS) {
      delete process.env[key];
    }
    Object.assign(process.env, overrides);
    run();
  } finally {
    process.env = originalEnv;
  }
};

test('loadConfig returns defaults for token auth and filesystem persistence', () => {
  withCleanEnv({ AUTH_TOKEN_SECRET: 'test-secret' }, () => {
    const config = loadConfig();
    const expectedDataDir = path.resolve(process.cwd(), 'data');

    assert.equal(config.port, 3000);
    assert.equal(config.logLevel, 'info');
    assert.equal(config.snapshotIntervalMs, 10_000);
    assert.equal(config.broadcastCapacity, 1024);
    assert.deepEqual(config.auth, {
      mode: 'token',
      tokenSecret: 'test-secret',
      tokenTtlMs: 8760 * 60 * 60 * 1000
    });
    assert.deepEqual(config.persistence, {
      driver: 'filesystem',
      dataFile: path.join(expectedDataDir, 'store.json'),
      backupDir: path.join(expectedDataDir, 'backups'),
      maxBackups: 10
    });
  });
});

test('token auth requires a signing secret', () => {
  withCleanEnv({}, () => {
    assert.throws(() => loadConfig(), /AUTH_TOKEN_SECRET must be defined/);
  });
});

test('loadConfig supports local auth and google sign-in settings', () => {
  withCleanEnv({ AUTH_MODE: 'local', DEFAULT_USER_NAME: ' ops ' }, () => {
    assert.deepEqual(loadConfig().auth, { mode: 'local', defaultUserName: 'ops' });
  });

  withCleanEnv(
    { AUTH_TOKEN_SECRET: 'test-secret', AUTH_TOKEN_TTL_HOURS: '2', GOOGLE_CLIENT_ID: 'client' },
    () => {
      assert.deepEqual(loadConfig().auth, {
        mode: 'token',
        tokenSecret: 'test-secret',
        tokenTtlMs: 2 * 60 * 60 * 1000,
        googleClientId: 'client'
      });
    }
  );
});

test('loadConfig reads mongo and memory persistence drivers', () => {
  withCleanEnv({ AUTH_MODE: 'local', PERSISTENCE_DRIVER: 'mongo', MONGO_URI: 'mongodb://localhost:27017' }, () => {
    assert.deepEqual(loadConfig().persistence, {
      driver: 'mongo',
      uri: 'mongodb://localhost:27017',
      database: 'switchyard',
      collection: 'snapshots'
    });
  });

  withCleanEnv({ AUTH_MODE: 'local', PERSISTENCE_DRIVER: 'mongo' }, () => {
    assert.throws(() => loadConfig(), /MONGO_URI must be defined/);
  });

  withCleanEnv({ AUTH_MODE: 'local', PERSISTENCE_DRIVER: 'Memory' }, () => {
    assert.deepEqual(loadConfig().persistence, { driver: 'memory' });
  });
});

test('loadConfig honours explicit directories and numeric settings', () => {
  withCleanEnv(
    {
      AUTH_MODE: 'local',
      PORT: '8080',
      LOG_LEVEL: 'DEBUG',
      DATA_DIR: '/srv/switchyard',
      BACKUP_DIR: '/srv/backups',
      MAX_BACKUPS: '3',
      SNAPSHOT_INTERVAL_MS: '10',
      BROADCAST_CAPACITY: 'lots'
    },
    () => {
      const config = loadConfig();

      assert.equal(config.port, 8080);
      assert.equal(config.logLevel, 'debug');
      assert.equal(config.snapshotIntervalMs, 100);
      assert.equal(config.broadcastCapacity, 1024);
      assert.deepEqual(config.persistence, {
        driver: 'filesystem',
        dataFile: path.join('/srv/switchyard', 'store.json'),
        backupDir: '/srv/backups',
        maxBackups: 3
      });
    }
  );
});

test('loadConfig rejects unknown modes and log levels', () => {
  withCleanEnv({ AUTH_MODE: 'saml' }, () => {
    assert.throws(() => loadConfig(), /Unsupported AUTH_MODE saml/);
  });
  withCleanEnv({ AUTH_MODE: 'local', PERSISTENCE_DRIVER: 'redis' }, () => {
    assert.throws(() => loadConfig(), /Unsupported PERSISTENCE_DRIVER redis/);
  });
  withCleanEnv({ AUTH_MODE: 'local', LOG_LEVEL: 'loud' }, () => {
    assert.throws(() => loadConfig(), /LOG_LEVEL must be one of/);
  });
});
