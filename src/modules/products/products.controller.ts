import { Request, Response, NextFunction } from 'express';
import type { AppDeps } from '../../types/request.types';
import { ResponseHandler } from '../../utils/response';
import { connectionMeta, presentEvent } from '../pantry/pantry.presenter';
import { createProductSchema, productIdParamSchema } from './products.validation';

export const createProductsController = ({ pantry }: AppDeps) => ({
  getProducts: async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { data, connectionError } = await pantry.listProducts();
      return ResponseHandler.success(res, data, 'Products loaded', 200, connectionMeta(connectionError));
    } catch (error) {
      next(error);
    }
  },

  createProduct: async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = createProductSchema.parse(req.body);
      const outcome = await pantry.registerProduct(body);
      return ResponseHandler.created(
        res,
        { product: outcome.product, audit: presentEvent(outcome.appended) },
        `${outcome.product.name} registered`
      );
    } catch (error) {
      next(error);
    }
  },

  deleteProduct: async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id } = productIdParamSchema.parse(req.params);
      const outcome = await pantry.deleteProduct(id);
      return ResponseHandler.success(
        res,
        { product: outcome.product, discarded_events: outcome.discarded_events },
        `${outcome.product.name} removed`
      );
    } catch (error) {
      next(error);
    }
  },

  getProductHistory: async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id } = productIdParamSchema.parse(req.params);
      const product = await pantry.getProduct(id);
      const { data } = await pantry.history({ productId: product.id });
      return ResponseHandler.success(res, data.map(presentEvent), 'History loaded');
    } catch (error) {
      next(error);
    }
  },
});
