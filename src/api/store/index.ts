import type { AppConfig } from '../../config.ts';
import { createPool } from '../../db.ts';
import { MemoryStore } from './memory.ts';
import { PostgresStore } from './postgres.ts';
import type { Store } from './types.ts';

export { PostgresStore } from './postgres.ts';

/** Builds the store selected by STORE_DRIVER. */
export function createStore(config: AppConfig['store']): Store {
  switch (config.driver) {
    case 'memory':
      return new MemoryStore();
    case 'postgres':
      return new PostgresStore(createPool(config.databaseUrl));
  }
}
