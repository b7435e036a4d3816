import type { CartSessions } from '../modules/cart/cart.sessions';
import type { PantryService } from '../modules/pantry/pantry.service';

/**
 * Dependencies every router is built from
 */
export interface AppDeps {
  pantry: PantryService;
  carts: CartSessions;
}
