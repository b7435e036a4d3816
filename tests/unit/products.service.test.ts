import { describe, expect, it } from 'vitest';
import { deleteProduct, nextProductId, registerProduct } from '../../src/modules/products/products.service';
import { estimateConsumption } from '../../src/modules/consumption/consumption.service';
import { ConflictError, NotFoundError, ValidationError } from '../../src/utils/errors';
import { audit, product, purchase, t0 } from './fixtures';

const now = new Date(2026, 3, 2, 9, 0, 0);

describe('product registry', () => {
  it('assigns max id + 1, or 1 for an empty pantry', () => {
    expect(nextProductId({ products: [], history: [] })).toBe(1);
    expect(
      nextProductId({ products: [product({ id: 1 }), product({ id: 5 }), product({ id: 3 })], history: [] })
    ).toBe(6);
  });

  it('skips ids still referenced by retained history', () => {
    expect(nextProductId({ products: [product({ id: 1 })], history: [audit(4, t0, 2)] })).toBe(5);
  });

  it('does not hand a deleted product\'s history to the next registration', () => {
    const snapshot = {
      products: [product({ id: 1 }), product({ id: 2, name: 'Beans', current_stock: 10 })],
      history: [audit(2, t0, 40), audit(2, new Date(2026, 0, 11, 8, 0, 0), 10)],
    };

    const afterDelete = deleteProduct(snapshot, 2, 'retain');
    const registered = registerProduct(afterDelete, { name: 'Coffee', unit_price: 18, min_stock: 1 }, now);

    expect(registered.product.id).toBe(3);
    expect(estimateConsumption(registered.product.id, registered.history)).toBeNull();
  });

  it('registers a product with an initial AUDIT event', () => {
    const outcome = registerProduct(
      { products: [product({ id: 4 })], history: [] },
      { name: '  Rice 5kg ', brand: '  ', unit_price: 22.9, min_stock: 2, initial_stock: 3 },
      now
    );

    expect(outcome.product).toEqual({
      id: 5,
      name: 'Rice 5kg',
      brand: null,
      unit_price: 22.9,
      current_stock: 3,
      min_stock: 2,
    });
    expect(outcome.appended).toEqual({ timestamp: now, product_id: 5, kind: 'AUDIT', quantity: 3, price_at_time: 0 });
    expect(outcome.products).toHaveLength(2);
    expect(outcome.history).toEqual([outcome.appended]);
  });

  it('starts stock at 0 when no initial count is given', () => {
    const outcome = registerProduct({ products: [], history: [] }, { name: 'Milk', unit_price: 4, min_stock: 1 }, now);

    expect(outcome.product.current_stock).toBe(0);
    expect(outcome.appended.quantity).toBe(0);
  });

  it('rejects a duplicate name regardless of case', () => {
    const snapshot = { products: [product({ id: 1, name: 'Rice' })], history: [] };

    expect(() => registerProduct(snapshot, { name: ' rICE ', unit_price: 1, min_stock: 1 }, now)).toThrow(
      ConflictError
    );
  });

  it('rejects an empty name', () => {
    expect(() =>
      registerProduct({ products: [], history: [] }, { name: '   ', unit_price: 1, min_stock: 1 }, now)
    ).toThrow(ValidationError);
  });

  it('rejects a minimum stock below 1', () => {
    expect(() =>
      registerProduct({ products: [], history: [] }, { name: 'Salt', unit_price: 1, min_stock: 0 }, now)
    ).toThrow(ValidationError);
  });

  describe('deleteProduct', () => {
    const snapshot = {
      products: [product({ id: 1 }), product({ id: 2 })],
      history: [audit(1, t0, 1), audit(2, t0, 2), purchase(1, t0, 3)],
    };

    it('keeps history under the retain policy', () => {
      const outcome = deleteProduct(snapshot, 1, 'retain');

      expect(outcome.products.map(p => p.id)).toEqual([2]);
      expect(outcome.history).toHaveLength(3);
      expect(outcome.discarded_events).toBe(0);
    });

    it('drops the product history under the discard policy', () => {
      const outcome = deleteProduct(snapshot, 1, 'discard');

      expect(outcome.history).toEqual([audit(2, t0, 2)]);
      expect(outcome.discarded_events).toBe(2);
    });

    it('fails for an unknown product', () => {
      expect(() => deleteProduct(snapshot, 42, 'retain')).toThrow(NotFoundError);
    });
  });
});
