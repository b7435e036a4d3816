import { Request, Response, NextFunction } from 'express';
import type { AppDeps } from '../../types/request.types';
import { ResponseHandler } from '../../utils/response';
import { connectionMeta, presentEvent } from '../pantry/pantry.presenter';
import { auditSchema, historyQuerySchema } from './inventory.validation';

export const createInventoryController = ({ pantry }: AppDeps) => ({
  // Stock count: only counts that differ from the recorded stock produce events
  recordAudit: async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { counts } = auditSchema.parse(req.body);
      const outcome = await pantry.applyAudit(new Map(counts.map(count => [count.product_id, count.counted])));

      const changedIds = new Set(outcome.appended.map(event => event.product_id));
      return ResponseHandler.success(
        res,
        {
          changed: outcome.changed,
          events: outcome.appended.map(presentEvent),
          products: outcome.products.filter(product => changedIds.has(product.id)),
        },
        outcome.changed ? 'Stock corrected' : 'Stock already matches the counts'
      );
    } catch (error) {
      next(error);
    }
  },

  getHistory: async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = historyQuerySchema.parse(req.query);
      const { data, connectionError } = await pantry.history({ productId: query.product_id, kind: query.type });
      return ResponseHandler.success(
        res,
        data.map(presentEvent),
        'History loaded',
        200,
        connectionMeta(connectionError)
      );
    } catch (error) {
      next(error);
    }
  },
});
