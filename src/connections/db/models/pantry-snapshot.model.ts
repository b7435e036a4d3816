import type { Product } from './product.model';
import type { HistoryEvent } from './history-event.model';

/**
 * Complete collections one interaction loads, works on and saves back.
 */
export interface PantrySnapshot {
  products: Product[];
  history: HistoryEvent[];
}
