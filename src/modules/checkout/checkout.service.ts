import type { Cart } from '../../connections/db/models/cart-item.model';
import type { HistoryEvent } from '../../connections/db/models/history-event.model';
import type { PantrySnapshot } from '../../connections/db/models/pantry-snapshot.model';
import type { Product } from '../../connections/db/models/product.model';
import { ValidationError } from '../../utils/errors';
import { truncateToSecond } from '../../utils/timestamp';
import { committableEntries, emptyCart } from '../cart/cart.service';

export type CommitOutcome =
  | {
      status: 'committed';
      products: Product[];
      history: HistoryEvent[];
      appended: HistoryEvent[];
      cart: Cart;
    }
  | { status: 'nothing_to_commit' };

/**
 * Folds the cart's positive entries into the snapshot: stock grows by the
 * entry quantity, the unit price becomes the entry price and one PURCHASE
 * event per entry is appended. Every event carries the same `now`.
 */
export const commitCart = (snapshot: PantrySnapshot, cart: Cart, now: Date): CommitOutcome => {
  const entries = committableEntries(cart);
  if (entries.length === 0) {
    return { status: 'nothing_to_commit' };
  }

  const knownIds = new Set(snapshot.products.map(product => product.id));
  const missing = entries.filter(entry => !knownIds.has(entry.product_id)).map(entry => entry.product_id);
  if (missing.length > 0) {
    throw new ValidationError('Cart references products that no longer exist', { product_ids: missing });
  }

  const timestamp = truncateToSecond(now);
  const byProduct = new Map(entries.map(entry => [entry.product_id, entry]));

  const products = snapshot.products.map(product => {
    const entry = byProduct.get(product.id);
    return entry
      ? { ...product, current_stock: product.current_stock + entry.quantity, unit_price: entry.unit_price }
      : product;
  });

  const appended: HistoryEvent[] = entries.map(entry => ({
    timestamp,
    product_id: entry.product_id,
    kind: 'PURCHASE' as const,
    quantity: entry.quantity,
    price_at_time: entry.unit_price,
  }));

  return {
    status: 'committed',
    products,
    history: [...snapshot.history, ...appended],
    appended,
    cart: emptyCart(),
  };
};
