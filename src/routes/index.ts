import express from 'express';
import type { AppDeps } from '../types/request.types';
import { createProductsRouter } from '../modules/products/products.routes';
import { createSuggestionsRouter } from '../modules/suggestions/suggestions.routes';
import { createCartRouter } from '../modules/cart/cart.routes';
import { createInventoryRouter } from '../modules/inventory/inventory.routes';

export const createRoutes = (deps: AppDeps) => {
  const router = express.Router();

  router.use('/products', createProductsRouter(deps));
  router.use('/suggestions', createSuggestionsRouter(deps));
  router.use('/cart', createCartRouter(deps));
  router.use('/inventory', createInventoryRouter(deps));

  return router;
};
