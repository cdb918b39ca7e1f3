import { STATUS_CODES, type IncomingMessage, type Server } from 'node:http';
import type { Duplex } from 'node:stream';
import { WebSocketServer, type WebSocket } from 'ws';
import { matchesSubscription, type Operation } from '@switchyard/domain';
import { API_PREFIX } from './app.js';
import type { Authenticator } from './auth.js';
import { HttpError } from './httpError.js';
import type { Logger } from './logger.js';
import type { ChangeCoordinator } from './services/coordinator.js';

export const WATCH_PATH = `${API_PREFIX}/subscriptions/watch`;

type WatchServerOptions = {
  coordinator: ChangeCoordinator;
  authenticate: Authenticator;
  logger: Logger;
};

const rejectUpgrade = (socket: Duplex, status: number) => {
  socket.write(`HTTP/1.1 ${status} ${STATUS_CODES[status] ?? 'Error'}\r\nConnection: close\r\n\r\n`);
  socket.destroy();
};

const readAuthorization = (request: IncomingMessage, url: URL): string | undefined => {
  const header = request.headers.authorization;
  if (header) {
    return header;
  }

  const token = url.searchParams.get('token');
  return token ? `Bearer ${token}` : undefined;
};

const sendOperation = (socket: WebSocket, operation: Operation) =>
  new Promise<void>((resolve, reject) => {
    socket.send(JSON.stringify(operation), (error) => {
      if (error) {
        reject(error);
      } else {
        resolve();
      }
    });
  });

/**
 * Serves operation changes over WebSocket on the HTTP server's upgrade event. Each
 * connection first receives every known operation, then the broadcast changes that match
 * the user's subscriptions at the moment they are delivered.
 */
export const attachWatchServer = (server: Server, { coordinator, authenticate, logger }: WatchServerOptions) => {
  const wss = new WebSocketServer({ noServer: true });

  const stream = async (socket: WebSocket, username: string) => {
    const { operations, receiver } = coordinator.watch();
    socket.on('close', () => receiver.close());

    try {
      for (const operation of operations) {
        await sendOperation(socket, operation);
      }

      for await (const operation of receiver) {
        const dropped = receiver.takeDropped();
        if (dropped > 0) {
          logger.warn(
            { user: username, dropped, queued: receiver.size },
            'watcher lagged behind, dropped operation changes'
          );
        }

        if (matchesSubscription(coordinator.listSubscriptions(username), operation)) {
          await sendOperation(socket, operation);
        }
      }
    } finally {
      receiver.close();
    }
  };

  server.on('upgrade', (request: IncomingMessage, socket: Duplex, head: Buffer) => {
    const url = new URL(request.url ?? '/', 'http://localhost');

    if (url.pathname !== WATCH_PATH) {
      rejectUpgrade(socket, 404);
      return;
    }

    let username: string;
    try {
      username = authenticate(readAuthorization(request, url)).name;
    } catch (error) {
      if (!(error instanceof HttpError)) {
        logger.error({ err: error }, 'unexpected error while authenticating watcher');
      }
      rejectUpgrade(socket, error instanceof HttpError ? error.status : 500);
      return;
    }

    wss.handleUpgrade(request, socket, head, (ws) => {
      ws.on('error', (error) => {
        logger.warn({ err: error, user: username }, 'watcher socket error');
      });

      const streaming = stream(ws, username);
      logger.debug({ user: username, watchers: coordinator.watcherCount }, 'watcher connected');

      streaming
        .then(() => {
          ws.close();
        })
        .catch((error: unknown) => {
          logger.warn({ err: error, user: username }, 'stopped streaming to watcher');
          ws.terminate();
        });
    });
  });

  server.on('close', () => {
    wss.close();
  });

  return wss;
};
