import type { Cart } from '../../connections/db/models/cart-item.model';
import { emptyCart } from './cart.service';

export const DEFAULT_CART_ID = 'household';

/**
 * In-process registry of open carts. Carts are transient: they live until
 * checkout, an explicit clear, or a restart.
 */
export class CartSessions {
  private readonly carts = new Map<string, Cart>();

  get(cartId: string): Cart {
    return this.carts.get(cartId) ?? emptyCart();
  }

  set(cartId: string, cart: Cart): Cart {
    if (cart.entries.length === 0) {
      this.carts.delete(cartId);
    } else {
      this.carts.set(cartId, cart);
    }
    return cart;
  }

  clear(cartId: string): void {
    this.carts.delete(cartId);
  }
}
