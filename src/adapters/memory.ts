// src/adapters/memory.ts

import type { Checkpoint, StorageAdapter } from '../types';

// Used for dry runs, where nothing is written to disk.
export const memoryStorage = (): StorageAdapter => {
  const store = new Map<string, Checkpoint>();

  return {
    fetchOne: async (fileId) => store.get(fileId) ?? null,
    fetchAll: async () => Array.from(store.values()),
    upsert: async (cp) => {
      store.set(cp.fileId, cp);
      return cp;
    },
    deleteOne: async (fileId) => {
      store.delete(fileId);
    },
  };
};
