import type { SnookerStore } from './types.js';
import { MemoryStore } from './memory.js';
import { PostgresStore } from './postgres.js';

export * from './types.js';

export const DEFAULT_DATA_DIR = 'data/sample';

let store: SnookerStore | null = null;

export const getStore = (): SnookerStore => {
  if (!store) {
    store = process.env.DATABASE_URL
      ? new PostgresStore()
      : MemoryStore.fromDirectory(process.env.SNOOKER_DATA_DIR ?? DEFAULT_DATA_DIR);
  }
  return store;
};
