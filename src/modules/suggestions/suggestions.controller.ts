import { Request, Response, NextFunction } from 'express';
import type { AppDeps } from '../../types/request.types';
import { ResponseHandler } from '../../utils/response';
import { connectionMeta, presentEvent } from '../pantry/pantry.presenter';
import { productIdParamSchema } from '../products/products.validation';

export const createSuggestionsController = ({ pantry }: AppDeps) => ({
  // What to buy now, with the forecast spend
  getShoppingList: async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { data, connectionError } = await pantry.shoppingList();
      const message = data.items.length > 0 ? 'Shopping list ready' : 'Pantry is stocked, nothing to buy';
      return ResponseHandler.success(res, data, message, 200, connectionMeta(connectionError));
    } catch (error) {
      next(error);
    }
  },

  getProductSuggestion: async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id } = productIdParamSchema.parse({ id: req.params.productId });
      const { product, estimate, suggestion } = await pantry.productSuggestion(id);
      return ResponseHandler.success(res, {
        product,
        suggestion,
        estimate: estimate && {
          ...estimate,
          latest_audit: presentEvent(estimate.latest_audit),
          previous_audit: presentEvent(estimate.previous_audit),
        },
      });
    } catch (error) {
      next(error);
    }
  },
});
