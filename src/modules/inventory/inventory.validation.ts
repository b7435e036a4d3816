import { z } from 'zod';
import { HISTORY_EVENT_KINDS } from '../../connections/db/models/history-event.model';

export const auditSchema = z.object({
  counts: z
    .array(
      z.object({
        product_id: z.number().int().positive(),
        counted: z.number().int().nonnegative('Counted stock cannot be negative'),
      })
    )
    .min(1, 'At least one count is required')
    .refine(
      counts => new Set(counts.map(count => count.product_id)).size === counts.length,
      'Each product can be counted once per audit'
    ),
});

export const historyQuerySchema = z.object({
  product_id: z.coerce.number().int().positive().optional(),
  type: z.enum(HISTORY_EVENT_KINDS).optional(),
});
