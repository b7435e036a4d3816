import { describe, expect, it } from 'vitest';
import {
  decodeHistoryEvent,
  decodeProduct,
  decodeSnapshot,
  encodeHistoryEvent,
  encodeProduct,
} from '../../src/modules/store/pantry.codec';

describe('pantry codec', () => {
  describe('decodeProduct', () => {
    it('coerces a non-numeric field to 0 and reports it', () => {
      const result = decodeProduct({
        ID: '3',
        Produto: ' Arroz 5kg ',
        Marca: '',
        Preco: '5,50',
        Estoque_Atual: 'abc',
        Estoque_Minimo: 2,
      });

      expect(result.value).toEqual({
        id: 3,
        name: 'Arroz 5kg',
        brand: null,
        unit_price: 5.5,
        current_stock: 0,
        min_stock: 2,
      });
      expect(result.issues).toEqual(['Estoque_Atual: "abc" is not numeric, using 0']);
    });

    it('treats a missing numeric field as 0', () => {
      const result = decodeProduct({ ID: 1, Produto: 'Milk', Marca: 'Farm', Estoque_Atual: 2, Estoque_Minimo: 1 });

      expect(result.value?.unit_price).toBe(0);
      expect(result.value?.brand).toBe('Farm');
      expect(result.issues).toEqual(['Preco: null is not numeric, using 0']);
    });

    it('logs blank and null numeric cells', () => {
      const result = decodeProduct({ ID: 1, Produto: 'Milk', Marca: '', Preco: '  ', Estoque_Atual: null, Estoque_Minimo: 1 });

      expect(result.value?.unit_price).toBe(0);
      expect(result.value?.current_stock).toBe(0);
      expect(result.issues).toEqual([
        'Preco: "  " is not numeric, using 0',
        'Estoque_Atual: null is not numeric, using 0',
      ]);
    });
  });

  describe('decodeHistoryEvent', () => {
    it('reads legacy kind labels', () => {
      const result = decodeHistoryEvent({
        Data: '2026-01-10 08:00:00',
        Produto_ID: '7',
        Tipo: 'LEVANTAMENTO',
        Qtd: '4',
        Preco_Na_Epoca: 0,
      });

      expect(result.issues).toEqual([]);
      expect(result.value).toEqual({
        timestamp: new Date(2026, 0, 10, 8, 0, 0),
        product_id: 7,
        kind: 'AUDIT',
        quantity: 4,
        price_at_time: 0,
      });
      expect(decodeHistoryEvent({ Data: '2026-01-10 08:00:00', Produto_ID: 7, Tipo: 'COMPRA', Qtd: 1 }).value?.kind).toBe(
        'PURCHASE'
      );
    });

    it('drops an event with an unknown kind', () => {
      const result = decodeHistoryEvent({ Data: '2026-01-10 08:00:00', Produto_ID: 7, Tipo: 'SALE', Qtd: 1 });

      expect(result.value).toBeNull();
      expect(result.issues).toEqual(['Tipo: "SALE" is not a known event kind, dropping event']);
    });

    it('drops an event with an unreadable date', () => {
      const result = decodeHistoryEvent({ Data: 'soon', Produto_ID: 7, Tipo: 'AUDIT', Qtd: 1 });

      expect(result.value).toBeNull();
      expect(result.issues).toEqual(['Data: "soon" is not a timestamp, dropping event']);
    });
  });

  it('encodes to the persisted column shape', () => {
    expect(
      encodeProduct({ id: 7, name: 'Coffee', brand: null, unit_price: 5.5, current_stock: 5, min_stock: 1 })
    ).toEqual({ ID: 7, Produto: 'Coffee', Marca: '', Preco: 5.5, Estoque_Atual: 5, Estoque_Minimo: 1 });

    expect(
      encodeHistoryEvent({
        timestamp: new Date(2026, 0, 10, 8, 0, 0),
        product_id: 7,
        kind: 'PURCHASE',
        quantity: 2,
        price_at_time: 5.5,
      })
    ).toEqual({ Data: '2026-01-10 08:00:00', Produto_ID: 7, Tipo: 'PURCHASE', Qtd: 2, Preco_Na_Epoca: 5.5 });
  });

  it('tags snapshot issues with their collection and row', () => {
    const { snapshot, issues } = decodeSnapshot(
      [{ ID: 1, Produto: 'Milk', Marca: '', Preco: 'n/a', Estoque_Atual: 1, Estoque_Minimo: 1 }],
      [
        { Data: '2026-01-10 08:00:00', Produto_ID: 1, Tipo: 'AUDIT', Qtd: 1, Preco_Na_Epoca: 0 },
        { Data: '', Produto_ID: 1, Tipo: 'AUDIT', Qtd: 1, Preco_Na_Epoca: 0 },
      ]
    );

    expect(snapshot.products).toHaveLength(1);
    expect(snapshot.history).toHaveLength(1);
    expect(issues).toEqual([
      'produtos row 1: Preco: "n/a" is not numeric, using 0',
      'historico row 2: Data: "" is not a timestamp, dropping event',
    ]);
  });
});
