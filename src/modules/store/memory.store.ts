import type { PantrySnapshot } from '../../connections/db/models/pantry-snapshot.model';
import { getLogger } from '../../utils/logging';
import { decodeSnapshot, encodeHistoryEvent, encodeProduct, type RawRecord } from './pantry.codec';
import type { PantryStore, StoreLoadResult } from './store.types';

const log = getLogger('memory-store');

/**
 * In-process store keeping encoded records, so every load and save goes
 * through the same codec as the Postgres store.
 */
export class MemoryPantryStore implements PantryStore {
  private productRows: RawRecord[];
  private historyRows: RawRecord[];

  constructor(initial: { products?: RawRecord[]; history?: RawRecord[] } = {}) {
    this.productRows = [...(initial.products ?? [])];
    this.historyRows = [...(initial.history ?? [])];
  }

  async load(): Promise<StoreLoadResult> {
    const { snapshot, issues } = decodeSnapshot(this.productRows, this.historyRows);
    issues.forEach(issue => log.warn(`Coerced record field: ${issue}`));
    return { ...snapshot, error: null };
  }

  async save(snapshot: PantrySnapshot): Promise<void> {
    this.productRows = snapshot.products.map(encodeProduct);
    this.historyRows = snapshot.history.map(encodeHistoryEvent);
  }

  rows(): { products: RawRecord[]; history: RawRecord[] } {
    return {
      products: this.productRows.map(row => ({ ...row })),
      history: this.historyRows.map(row => ({ ...row })),
    };
  }
}
