import type { StoreSnapshot } from '@switchyard/domain';
import type { Logger } from '../logger.js';
import type { PersistenceAdapter } from './index.js';

export type SnapshotScheduler = {
  start: () => void;
  /** Stops the timer and waits for a save that is already running. */
  stop: () => Promise<void>;
  /** Saves now; resolves to false when a save was already in flight. */
  flush: () => Promise<boolean>;
};

type SnapshotSchedulerOptions = {
  persistence: PersistenceAdapter;
  snapshot: () => StoreSnapshot;
  intervalMs: number;
  logger: Logger;
};

/**
 * Best-effort periodic saving. Failures are logged and the next tick tries again.
 */
export const createSnapshotScheduler = ({
  persistence,
  snapshot,
  intervalMs,
  logger
}: SnapshotSchedulerOptions): SnapshotScheduler => {
  let timer: NodeJS.Timeout | null = null;
  let inFlight: Promise<void> | null = null;

  const save = async () => {
    const current = snapshot();
    await persistence.save(current);
    logger.debug(
      {
        users: current.users.length,
        operations: current.operations.length,
        components: current.components.length,
        tags: current.tags.length
      },
      'saved snapshot'
    );
  };

  const flush = async (): Promise<boolean> => {
    if (inFlight) {
      return false;
    }

    const pending = save();
    inFlight = pending;
    try {
      await pending;
      return true;
    } finally {
      inFlight = null;
    }
  };

  const tick = () => {
    flush().catch((error: unknown) => {
      logger.error({ err: error }, 'failed to save snapshot');
    });
  };

  return {
    start() {
      if (timer) {
        return;
      }

      timer = setInterval(tick, intervalMs);
      timer.unref();
    },
    async stop() {
      if (timer) {
        clearInterval(timer);
        timer = null;
      }

      // A failed save is reported to whoever started it.
      await Promise.allSettled(inFlight ? [inFlight] : []);
    },
    flush
  };
};
