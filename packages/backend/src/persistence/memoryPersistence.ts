import { validateStoreSnapshot, type StoreSnapshot } from '@switchyard/domain';
import type { PersistenceAdapter } from './index.js';

export const createMemoryPersistence = (initialData: unknown = {}): PersistenceAdapter => {
  let stored: StoreSnapshot = validateStoreSnapshot(initialData);

  return {
    async load() {
      return validateStoreSnapshot(stored);
    },
    async save(snapshot) {
      stored = validateStoreSnapshot(snapshot);
    }
  };
};
