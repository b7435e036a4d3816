import { z } from 'zod';
import type { Product, ProductRecord } from '../../connections/db/models/product.model';
import {
  HISTORY_EVENT_KINDS,
  type HistoryEvent,
  type HistoryEventKind,
  type HistoryEventRecord,
} from '../../connections/db/models/history-event.model';
import type { PantrySnapshot } from '../../connections/db/models/pantry-snapshot.model';
import { formatTimestamp, parseTimestamp } from '../../utils/timestamp';

export const PRODUCT_COLUMNS = ['ID', 'Produto', 'Marca', 'Preco', 'Estoque_Atual', 'Estoque_Minimo'] as const;
export const HISTORY_COLUMNS = ['Data', 'Produto_ID', 'Tipo', 'Qtd', 'Preco_Na_Epoca'] as const;

// Labels written by the first spreadsheet version of the pantry
const LEGACY_KINDS: Record<string, HistoryEventKind> = {
  LEVANTAMENTO: 'AUDIT',
  COMPRA: 'PURCHASE',
};

const numberSchema = z.coerce.number().finite();
const kindSchema = z.enum(HISTORY_EVENT_KINDS);

export type RawRecord = Record<string, unknown>;

export interface DecodeResult<T> {
  value: T | null;
  issues: string[];
}

export interface DecodedSnapshot {
  snapshot: PantrySnapshot;
  issues: string[];
}

/**
 * Numeric cell to number. Accepts "5,50" as well as "5.50"; blank and
 * null cells are not numbers.
 */
const toNumber = (value: unknown): number | null => {
  const input = typeof value === 'string' ? value.trim().replace(/^(-?\d+),(\d+)$/, '$1.$2') : value;
  // Coercion would read a blank cell as 0
  if (input === null || input === undefined || input === '') {
    return null;
  }
  const result = numberSchema.safeParse(input);
  return result.success ? result.data : null;
};

const readNumber = (
  record: RawRecord,
  column: string,
  issues: string[],
  options: { integer?: boolean; nonNegative?: boolean } = {}
): number => {
  let value = toNumber(record[column]);
  if (value === null) {
    issues.push(`${column}: ${JSON.stringify(record[column] ?? null)} is not numeric, using 0`);
    return 0;
  }
  if (options.integer && !Number.isInteger(value)) {
    issues.push(`${column}: ${value} is not an integer, truncating`);
    value = Math.trunc(value);
  }
  if (options.nonNegative && value < 0) {
    issues.push(`${column}: ${value} is negative, using 0`);
    value = 0;
  }
  return value;
};

const readText = (record: RawRecord, column: string): string => {
  const value = record[column];
  if (value === null || value === undefined) {
    return '';
  }
  return String(value).trim();
};

export const decodeProduct = (record: RawRecord): DecodeResult<Product> => {
  const issues: string[] = [];
  const brand = readText(record, 'Marca');
  const product: Product = {
    id: readNumber(record, 'ID', issues, { integer: true }),
    name: readText(record, 'Produto'),
    brand: brand === '' ? null : brand,
    unit_price: readNumber(record, 'Preco', issues, { nonNegative: true }),
    current_stock: readNumber(record, 'Estoque_Atual', issues, { integer: true, nonNegative: true }),
    min_stock: readNumber(record, 'Estoque_Minimo', issues, { integer: true, nonNegative: true }),
  };
  return { value: product, issues };
};

/**
 * Events with an unreadable date or an unknown kind are dropped: without
 * them the event cannot be placed on the timeline.
 */
export const decodeHistoryEvent = (record: RawRecord): DecodeResult<HistoryEvent> => {
  const issues: string[] = [];

  const rawDate = record['Data'];
  const timestamp =
    rawDate instanceof Date ? rawDate : parseTimestamp(readText(record, 'Data'));
  if (!timestamp || Number.isNaN(timestamp.getTime())) {
    issues.push(`Data: ${JSON.stringify(rawDate ?? null)} is not a timestamp, dropping event`);
    return { value: null, issues };
  }

  const label = readText(record, 'Tipo').toUpperCase();
  const kind = kindSchema.safeParse(LEGACY_KINDS[label] ?? label);
  if (!kind.success) {
    issues.push(`Tipo: ${JSON.stringify(record['Tipo'] ?? null)} is not a known event kind, dropping event`);
    return { value: null, issues };
  }

  const event: HistoryEvent = {
    timestamp,
    product_id: readNumber(record, 'Produto_ID', issues, { integer: true }),
    kind: kind.data,
    quantity: readNumber(record, 'Qtd', issues, { integer: true, nonNegative: true }),
    price_at_time: readNumber(record, 'Preco_Na_Epoca', issues, { nonNegative: true }),
  };
  return { value: event, issues };
};

export const encodeProduct = (product: Product): ProductRecord => ({
  ID: product.id,
  Produto: product.name,
  Marca: product.brand ?? '',
  Preco: product.unit_price,
  Estoque_Atual: product.current_stock,
  Estoque_Minimo: product.min_stock,
});

export const encodeHistoryEvent = (event: HistoryEvent): HistoryEventRecord => ({
  Data: formatTimestamp(event.timestamp),
  Produto_ID: event.product_id,
  Tipo: event.kind,
  Qtd: event.quantity,
  Preco_Na_Epoca: event.price_at_time,
});

/**
 * Decode both collections, collecting every coercion as a row-tagged issue.
 */
export const decodeSnapshot = (productRows: RawRecord[], historyRows: RawRecord[]): DecodedSnapshot => {
  const issues: string[] = [];
  const products: Product[] = [];
  const history: HistoryEvent[] = [];

  productRows.forEach((row, index) => {
    const result = decodeProduct(row);
    issues.push(...result.issues.map(issue => `produtos row ${index + 1}: ${issue}`));
    if (result.value) {
      products.push(result.value);
    }
  });

  historyRows.forEach((row, index) => {
    const result = decodeHistoryEvent(row);
    issues.push(...result.issues.map(issue => `historico row ${index + 1}: ${issue}`));
    if (result.value) {
      history.push(result.value);
    }
  });

  return { snapshot: { products, history }, issues };
};
