import type { StoreDriver } from '../../connections/config/app.config';
import { pool } from '../../connections/db/connection';
import { MemoryPantryStore } from './memory.store';
import { PostgresPantryStore } from './postgres.store';
import type { PantryStore } from './store.types';

/**
 * Store selected by STORE_DRIVER
 */
export const createPantryStore = (driver: StoreDriver): PantryStore => {
  switch (driver) {
    case 'memory':
      return new MemoryPantryStore();
    case 'postgres':
      return new PostgresPantryStore(pool);
  }
};
