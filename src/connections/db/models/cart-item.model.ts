// CartEntry Model - pending purchase line, at most one per product

export interface CartEntry {
  product_id: number;
  quantity: number; // 0 stays visible but is never committed
  unit_price: number;
}

/**
 * Transient cart value. Operations return a new Cart instead of mutating.
 */
export interface Cart {
  entries: readonly CartEntry[];
}
