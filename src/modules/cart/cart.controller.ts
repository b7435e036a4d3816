import { Request, Response, NextFunction } from 'express';
import type { AppDeps } from '../../types/request.types';
import { ResponseHandler } from '../../utils/response';
import { NotFoundError, StoreUnavailableError } from '../../utils/errors';
import { getLogger } from '../../utils/logging';
import { presentEvent } from '../pantry/pantry.presenter';
import { findEntry, listEntries, prefillFromShoppingList, removeEntry, upsertEntry } from './cart.service';
import { cartIdSchema, cartItemSchema, cartProductParamSchema } from './cart.validation';

const log = getLogger('cart');

const cartIdOf = (req: Request): string => cartIdSchema.parse(req.get('x-cart-id'));

export const createCartController = ({ pantry, carts }: AppDeps) => ({
  getCart: async (req: Request, res: Response, next: NextFunction) => {
    try {
      return ResponseHandler.success(res, listEntries(carts.get(cartIdOf(req))));
    } catch (error) {
      next(error);
    }
  },

  // Sets the product's pending quantity and price; never adds to a previous quantity
  putCartItem: async (req: Request, res: Response, next: NextFunction) => {
    try {
      const cartId = cartIdOf(req);
      const { productId } = cartProductParamSchema.parse(req.params);
      const body = cartItemSchema.parse(req.body);
      const product = await pantry.getProduct(productId);

      const cart = carts.set(
        cartId,
        upsertEntry(carts.get(cartId), {
          product_id: product.id,
          quantity: body.quantity,
          unit_price: body.unit_price ?? product.unit_price,
        })
      );

      return ResponseHandler.success(res, listEntries(cart), `${product.name} updated in cart`);
    } catch (error) {
      next(error);
    }
  },

  removeCartItem: async (req: Request, res: Response, next: NextFunction) => {
    try {
      const cartId = cartIdOf(req);
      const { productId } = cartProductParamSchema.parse(req.params);
      const current = carts.get(cartId);
      if (!findEntry(current, productId)) {
        throw new NotFoundError(`Product ${productId} is not in the cart`);
      }

      const cart = carts.set(cartId, removeEntry(current, productId));
      return ResponseHandler.success(res, listEntries(cart), 'Removed from cart');
    } catch (error) {
      next(error);
    }
  },

  clearCart: async (req: Request, res: Response, next: NextFunction) => {
    try {
      carts.clear(cartIdOf(req));
      return ResponseHandler.success(res, listEntries(carts.get(cartIdOf(req))), 'Cart cleared');
    } catch (error) {
      next(error);
    }
  },

  prefillCart: async (req: Request, res: Response, next: NextFunction) => {
    try {
      const cartId = cartIdOf(req);
      const { data, connectionError } = await pantry.shoppingList();
      if (connectionError) {
        throw new StoreUnavailableError('Pantry store is unavailable, cart was not prefilled', {
          reason: connectionError,
        });
      }

      const cart = carts.set(cartId, prefillFromShoppingList(carts.get(cartId), data));
      return ResponseHandler.success(res, listEntries(cart), `${data.items.length} suggestions added to cart`);
    } catch (error) {
      next(error);
    }
  },

  checkout: async (req: Request, res: Response, next: NextFunction) => {
    try {
      const cartId = cartIdOf(req);
      const cart = carts.get(cartId);
      const total = listEntries(cart).total;
      const outcome = await pantry.checkout(cart);

      if (outcome.status === 'nothing_to_commit') {
        return ResponseHandler.success(res, { status: outcome.status }, 'Nothing to commit');
      }

      carts.set(cartId, outcome.cart);
      const purchasedIds = new Set(outcome.appended.map(event => event.product_id));
      log.info('Checkout completed', { cartId, total, lines: outcome.appended.length });

      return ResponseHandler.success(
        res,
        {
          status: outcome.status,
          total,
          events: outcome.appended.map(presentEvent),
          products: outcome.products.filter(product => purchasedIds.has(product.id)),
        },
        'Purchase recorded'
      );
    } catch (error) {
      next(error);
    }
  },
});
