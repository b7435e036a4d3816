// Product Model - one row of the `produtos` collection

export interface Product {
  id: number; // max(id) + 1 on registration
  name: string; // case-insensitively unique
  brand: string | null;
  unit_price: number; // last observed purchase price
  current_stock: number; // non-negative integer
  min_stock: number; // positive integer, fallback floor
}

export interface CreateProductInput {
  name: string; // REQUIRED
  brand?: string | null;
  unit_price: number; // REQUIRED
  min_stock: number; // REQUIRED
  initial_stock?: number; // default: 0
}

/**
 * Persisted record shape. Column names are part of the store contract.
 */
export type ProductRecord = {
  ID: number;
  Produto: string;
  Marca: string; // '' when absent
  Preco: number;
  Estoque_Atual: number;
  Estoque_Minimo: number;
};
