import { addDays } from 'date-fns';
import { describe, expect, it } from 'vitest';
import { applyAudit, listHistory } from '../../src/modules/inventory/inventory.service';
import type { PantrySnapshot } from '../../src/connections/db/models/pantry-snapshot.model';
import { ValidationError } from '../../src/utils/errors';
import { audit, product, purchase, t0 } from './fixtures';

const now = new Date(2026, 1, 10, 18, 30, 0);

const snapshot = (): PantrySnapshot => ({
  products: [product({ id: 1, current_stock: 3 }), product({ id: 2, current_stock: 5 })],
  history: [audit(1, t0, 3), audit(2, t0, 5)],
});

describe('applyAudit', () => {
  it('overwrites differing stock and appends an AUDIT event', () => {
    const outcome = applyAudit(snapshot(), new Map([[1, 3], [2, 4]]), now);

    expect(outcome.changed).toBe(true);
    expect(outcome.appended).toEqual([
      { timestamp: now, product_id: 2, kind: 'AUDIT', quantity: 4, price_at_time: 0 },
    ]);
    expect(outcome.products.map(p => p.current_stock)).toEqual([3, 4]);
    expect(outcome.history).toHaveLength(3);
  });

  it('records nothing when the same counts are applied twice', () => {
    const counts = new Map([[1, 0], [2, 4]]);
    const first = applyAudit(snapshot(), counts, now);
    const second = applyAudit({ products: first.products, history: first.history }, counts, addDays(now, 1));

    expect(first.appended).toHaveLength(2);
    expect(second.changed).toBe(false);
    expect(second.appended).toEqual([]);
    expect(second.history).toHaveLength(4);
  });

  it('rejects counts for unknown products', () => {
    expect(() => applyAudit(snapshot(), new Map([[99, 1]]), now)).toThrow(ValidationError);
  });

  it('rejects negative counts', () => {
    expect(() => applyAudit(snapshot(), new Map([[1, -2]]), now)).toThrow(ValidationError);
  });
});

describe('listHistory', () => {
  it('filters by product and kind in timestamp order', () => {
    const history = [
      purchase(1, addDays(t0, 5), 2),
      audit(2, t0, 1),
      audit(1, addDays(t0, 9), 4),
      audit(1, t0, 3),
    ];

    expect(listHistory(history, { productId: 1 }).map(e => e.quantity)).toEqual([3, 2, 4]);
    expect(listHistory(history, { productId: 1, kind: 'AUDIT' }).map(e => e.quantity)).toEqual([3, 4]);
    expect(listHistory(history)).toHaveLength(4);
  });
});
