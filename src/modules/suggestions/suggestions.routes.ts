import express from 'express';
import type { AppDeps } from '../../types/request.types';
import { createSuggestionsController } from './suggestions.controller';

export const createSuggestionsRouter = (deps: AppDeps) => {
  const router = express.Router();
  const suggestionsController = createSuggestionsController(deps);

  router.get('/', suggestionsController.getShoppingList);
  router.get('/:productId', suggestionsController.getProductSuggestion);

  return router;
};
