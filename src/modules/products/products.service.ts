import type { HistoryEvent } from '../../connections/db/models/history-event.model';
import type { PantrySnapshot } from '../../connections/db/models/pantry-snapshot.model';
import type { CreateProductInput, Product } from '../../connections/db/models/product.model';
import type { HistoryRetention } from '../../connections/config/app.config';
import { ConflictError, NotFoundError, ValidationError } from '../../utils/errors';
import { truncateToSecond } from '../../utils/timestamp';

export interface RegisterOutcome {
  product: Product;
  products: Product[];
  history: HistoryEvent[];
  appended: HistoryEvent;
}

export interface DeleteOutcome {
  product: Product;
  products: Product[];
  history: HistoryEvent[];
  discarded_events: number;
}

const normalizeName = (name: string) => name.trim().toLocaleLowerCase();

/**
 * Next product id: highest id seen in products or history + 1, or 1 for an
 * empty pantry. Ids whose events were retained after deletion are never
 * handed out again.
 */
export const nextProductId = ({ products, history }: PantrySnapshot): number => {
  const highestProduct = products.reduce((max, product) => Math.max(max, product.id), 0);
  return history.reduce((max, event) => Math.max(max, event.product_id), highestProduct) + 1;
};

export const findProductByName = (products: readonly Product[], name: string): Product | undefined => {
  const wanted = normalizeName(name);
  return products.find(product => normalizeName(product.name) === wanted);
};

/**
 * Registers a product and records its initial count as the first AUDIT.
 */
export const registerProduct = (
  snapshot: PantrySnapshot,
  input: CreateProductInput,
  now: Date
): RegisterOutcome => {
  const name = input.name.trim();
  if (!name) {
    throw new ValidationError('Product name is required');
  }
  if (findProductByName(snapshot.products, name)) {
    throw new ConflictError(`A product named "${name}" already exists`, { name });
  }

  const initialStock = input.initial_stock ?? 0;
  if (!Number.isInteger(initialStock) || initialStock < 0) {
    throw new ValidationError('Initial stock must be a non-negative integer');
  }
  if (!Number.isInteger(input.min_stock) || input.min_stock < 1) {
    throw new ValidationError('Minimum stock must be a positive integer');
  }
  if (!Number.isFinite(input.unit_price) || input.unit_price < 0) {
    throw new ValidationError('Unit price must be a non-negative amount');
  }

  const brand = input.brand?.trim();
  const product: Product = {
    id: nextProductId(snapshot),
    name,
    brand: brand ? brand : null,
    unit_price: input.unit_price,
    current_stock: initialStock,
    min_stock: input.min_stock,
  };

  const audit: HistoryEvent = {
    timestamp: truncateToSecond(now),
    product_id: product.id,
    kind: 'AUDIT',
    quantity: initialStock,
    price_at_time: 0,
  };

  return {
    product,
    products: [...snapshot.products, product],
    history: [...snapshot.history, audit],
    appended: audit,
  };
};

/**
 * Removes a product from the active set. With `discard` retention its
 * history goes too.
 */
export const deleteProduct = (
  snapshot: PantrySnapshot,
  productId: number,
  retention: HistoryRetention
): DeleteOutcome => {
  const product = snapshot.products.find(candidate => candidate.id === productId);
  if (!product) {
    throw new NotFoundError(`Product ${productId} not found`);
  }

  const history =
    retention === 'discard'
      ? snapshot.history.filter(event => event.product_id !== productId)
      : snapshot.history;

  return {
    product,
    products: snapshot.products.filter(candidate => candidate.id !== productId),
    history,
    discarded_events: snapshot.history.length - history.length,
  };
};
