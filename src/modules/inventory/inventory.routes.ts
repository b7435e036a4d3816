import express from 'express';
import type { AppDeps } from '../../types/request.types';
import { createInventoryController } from './inventory.controller';

export const createInventoryRouter = (deps: AppDeps) => {
  const router = express.Router();
  const inventoryController = createInventoryController(deps);

  router.post('/audit', inventoryController.recordAudit);
  router.get('/history', inventoryController.getHistory);

  return router;
};
