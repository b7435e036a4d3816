import { vi } from 'vitest';
import type { HistoryEvent, HistoryEventKind } from '../../src/connections/db/models/history-event.model';
import type { Product } from '../../src/connections/db/models/product.model';
import { emptyLoad, type PantryStore } from '../../src/modules/store/store.types';

export const t0 = new Date(2026, 0, 1, 8, 0, 0);

export const product = (overrides: Partial<Product> & Pick<Product, 'id'>): Product => ({
  name: `Product ${overrides.id}`,
  brand: null,
  unit_price: 1,
  current_stock: 0,
  min_stock: 1,
  ...overrides,
});

export const event = (
  kind: HistoryEventKind,
  productId: number,
  timestamp: Date,
  quantity: number,
  price: number = 0
): HistoryEvent => ({
  timestamp,
  product_id: productId,
  kind,
  quantity,
  price_at_time: price,
});

export const audit = (productId: number, timestamp: Date, quantity: number) =>
  event('AUDIT', productId, timestamp, quantity);

export const purchase = (productId: number, timestamp: Date, quantity: number, price: number = 1) =>
  event('PURCHASE', productId, timestamp, quantity, price);

// Store whose every load fails the way an unreachable database does
export class UnreachableStore implements PantryStore {
  static readonly reason = 'connect ECONNREFUSED 127.0.0.1:5432';

  save = vi.fn(async () => undefined);

  async load() {
    return emptyLoad(UnreachableStore.reason);
  }
}
