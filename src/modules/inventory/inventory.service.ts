import type { HistoryEvent } from '../../connections/db/models/history-event.model';
import type { PantrySnapshot } from '../../connections/db/models/pantry-snapshot.model';
import type { Product } from '../../connections/db/models/product.model';
import { ValidationError } from '../../utils/errors';
import { truncateToSecond } from '../../utils/timestamp';

export interface AuditOutcome {
  changed: boolean;
  products: Product[];
  history: HistoryEvent[];
  appended: HistoryEvent[];
}

/**
 * Records counted stock. Each count that differs from current stock
 * overwrites it and appends an AUDIT event; equal counts are skipped, so
 * repeating the same counts changes nothing.
 */
export const applyAudit = (
  snapshot: PantrySnapshot,
  counts: ReadonlyMap<number, number>,
  now: Date
): AuditOutcome => {
  const knownIds = new Set(snapshot.products.map(product => product.id));
  const unknown = [...counts.keys()].filter(id => !knownIds.has(id));
  if (unknown.length > 0) {
    throw new ValidationError('Counts reference unknown products', { product_ids: unknown });
  }

  const invalid = [...counts.entries()].filter(([, counted]) => !Number.isInteger(counted) || counted < 0);
  if (invalid.length > 0) {
    throw new ValidationError('Counted stock must be a non-negative integer', {
      product_ids: invalid.map(([id]) => id),
    });
  }

  const timestamp = truncateToSecond(now);
  const appended: HistoryEvent[] = [];

  const products = snapshot.products.map(product => {
    const counted = counts.get(product.id);
    if (counted === undefined || counted === product.current_stock) {
      return product;
    }
    appended.push({
      timestamp,
      product_id: product.id,
      kind: 'AUDIT',
      quantity: counted,
      price_at_time: 0,
    });
    return { ...product, current_stock: counted };
  });

  return {
    changed: appended.length > 0,
    products,
    history: [...snapshot.history, ...appended],
    appended,
  };
};

/**
 * Events of one product (or all products) in timestamp order.
 */
export const listHistory = (
  history: readonly HistoryEvent[],
  filter: { productId?: number; kind?: HistoryEvent['kind'] } = {}
): HistoryEvent[] =>
  history
    .map((event, position) => ({ event, position }))
    .filter(({ event }) => filter.productId === undefined || event.product_id === filter.productId)
    .filter(({ event }) => filter.kind === undefined || event.kind === filter.kind)
    .sort((a, b) => a.event.timestamp.getTime() - b.event.timestamp.getTime() || a.position - b.position)
    .map(({ event }) => event);
