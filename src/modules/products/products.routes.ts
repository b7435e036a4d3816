import express from 'express';
import type { AppDeps } from '../../types/request.types';
import { createProductsController } from './products.controller';

export const createProductsRouter = (deps: AppDeps) => {
  const router = express.Router();
  const productsController = createProductsController(deps);

  router.get('/', productsController.getProducts);
  router.post('/', productsController.createProduct);
  router.delete('/:id', productsController.deleteProduct);
  router.get('/:id/history', productsController.getProductHistory);

  return router;
};
