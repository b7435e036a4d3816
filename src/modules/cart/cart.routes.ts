import express from 'express';
import type { AppDeps } from '../../types/request.types';
import { createCartController } from './cart.controller';

export const createCartRouter = (deps: AppDeps) => {
  const router = express.Router();
  const cartController = createCartController(deps);

  router.get('/', cartController.getCart);
  router.delete('/', cartController.clearCart);
  router.put('/items/:productId', cartController.putCartItem);
  router.delete('/items/:productId', cartController.removeCartItem);
  router.post('/prefill', cartController.prefillCart);
  router.post('/checkout', cartController.checkout);

  return router;
};
