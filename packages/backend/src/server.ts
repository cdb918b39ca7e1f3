import type { Server } from 'node:http';
import fs from 'node:fs/promises';
import path from 'node:path';
import { createApp } from './app.js';
import { createAuthenticator } from './auth.js';
import { loadConfig } from './config.js';
import { createLogger, type Logger } from './logger.js';
import { createPersistence, createSnapshotScheduler } from './persistence/index.js';
import { ChangeCoordinator } from './services/coordinator.js';
import { attachWatchServer } from './watch.js';

export type RunningServer = {
  server: Server;
  coordinator: ChangeCoordinator;
  logger: Logger;
  /** Stops accepting connections and writes a final snapshot. */
  shutdown: () => Promise<void>;
};

export const startServer = async (): Promise<RunningServer> => {
  const config = loadConfig();
  const logger = createLogger(config.logLevel);
  const persistenceConfig = config.persistence;

  if (persistenceConfig.driver === 'filesystem') {
    const directory = path.dirname(persistenceConfig.dataFile);
    await fs.mkdir(directory, { recursive: true });

    if (persistenceConfig.backupDir) {
      await fs.mkdir(persistenceConfig.backupDir, { recursive: true });
    }
  }

  const persistence = await createPersistence(persistenceConfig);
  const coordinator = ChangeCoordinator.fromSnapshot(await persistence.load(), {
    logger,
    broadcastCapacity: config.broadcastCapacity
  });
  const scheduler = createSnapshotScheduler({
    persistence,
    snapshot: () => coordinator.toSnapshot(),
    intervalMs: config.snapshotIntervalMs,
    logger
  });

  const app = createApp({ coordinator, auth: config.auth, logger });

  const server = await new Promise<Server>((resolve) => {
    const listening = app.listen(config.port, () => {
      resolve(listening);
    });
  });

  const watchServer = attachWatchServer(server, {
    coordinator,
    authenticate: createAuthenticator(config.auth, coordinator),
    logger
  });

  scheduler.start();

  const address = server.address();
  logger.info(
    { port: address && typeof address === 'object' ? address.port : config.port, driver: persistenceConfig.driver },
    'switchyard listening'
  );

  const shutdown = async () => {
    await scheduler.stop();
    coordinator.close();
    for (const client of watchServer.clients) {
      client.terminate();
    }

    await new Promise<void>((resolve, reject) => {
      server.close((error) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
      server.closeAllConnections();
    });
    await persistence.save(coordinator.toSnapshot());
    logger.info('saved final snapshot');
  };

  return { server, coordinator, logger, shutdown };
};
