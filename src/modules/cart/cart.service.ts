import type { Cart, CartEntry } from '../../connections/db/models/cart-item.model';
import { ValidationError } from '../../utils/errors';
import { roundMoney } from '../../utils/money';
import type { ShoppingList } from '../replenishment/replenishment.service';

export interface CartView {
  entries: Array<CartEntry & { line_total: number }>;
  total: number;
}

export const emptyCart = (): Cart => ({ entries: [] });

const assertEntry = (entry: CartEntry): void => {
  if (!Number.isInteger(entry.quantity) || entry.quantity < 0) {
    throw new ValidationError('Cart quantity must be a non-negative integer', {
      product_id: entry.product_id,
      quantity: entry.quantity,
    });
  }
  if (!Number.isFinite(entry.unit_price) || entry.unit_price < 0) {
    throw new ValidationError('Cart unit price must be a non-negative amount', {
      product_id: entry.product_id,
      unit_price: entry.unit_price,
    });
  }
};

/**
 * Adds an entry, or replaces quantity and price of the product's existing
 * entry in place. Quantities are never summed across edits.
 */
export const upsertEntry = (cart: Cart, entry: CartEntry): Cart => {
  assertEntry(entry);
  const next: CartEntry = { ...entry };
  const exists = cart.entries.some(current => current.product_id === entry.product_id);

  return {
    entries: exists
      ? cart.entries.map(current => (current.product_id === entry.product_id ? next : current))
      : [...cart.entries, next],
  };
};

export const removeEntry = (cart: Cart, productId: number): Cart => ({
  entries: cart.entries.filter(entry => entry.product_id !== productId),
});

export const clearCart = (): Cart => emptyCart();

export const findEntry = (cart: Cart, productId: number): CartEntry | undefined =>
  cart.entries.find(entry => entry.product_id === productId);

export const cartTotal = (cart: Cart): number =>
  roundMoney(cart.entries.reduce((sum, entry) => sum + entry.quantity * entry.unit_price, 0));

export const listEntries = (cart: Cart): CartView => ({
  entries: cart.entries.map(entry => ({
    ...entry,
    line_total: roundMoney(entry.quantity * entry.unit_price),
  })),
  total: cartTotal(cart),
});

// Zero-quantity entries stay in the cart but are never committed
export const committableEntries = (cart: Cart): CartEntry[] =>
  cart.entries.filter(entry => entry.quantity > 0);

/**
 * One entry per shopping-list line, at the suggested quantity and the
 * product's last unit price.
 */
export const prefillFromShoppingList = (cart: Cart, list: ShoppingList): Cart =>
  list.items.reduce(
    (current, item) =>
      upsertEntry(current, {
        product_id: item.product_id,
        quantity: item.suggested_qty,
        unit_price: item.unit_price,
      }),
    cart
  );
