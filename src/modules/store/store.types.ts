import type { PantrySnapshot } from '../../connections/db/models/pantry-snapshot.model';

export interface StoreConnectionError {
  code: 'CONNECTION_FAILURE';
  message: string;
}

/**
 * A failed load yields empty collections and a non-null `error`.
 */
export interface StoreLoadResult extends PantrySnapshot {
  error: StoreConnectionError | null;
}

/**
 * Backing store of the two pantry collections. `save` overwrites both
 * collections with the given snapshot.
 */
export interface PantryStore {
  load(): Promise<StoreLoadResult>;
  save(snapshot: PantrySnapshot): Promise<void>;
}

export const emptyLoad = (message: string): StoreLoadResult => ({
  products: [],
  history: [],
  error: { code: 'CONNECTION_FAILURE', message },
});
