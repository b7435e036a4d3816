import type { PantrySnapshot } from '../../connections/db/models/pantry-snapshot.model';
import { getLogger } from '../../utils/logging';
import { errorMessage } from '../../utils/errors';
import {
  decodeSnapshot,
  encodeHistoryEvent,
  encodeProduct,
  HISTORY_COLUMNS,
  PRODUCT_COLUMNS,
  type RawRecord,
} from './pantry.codec';
import { emptyLoad, type PantryStore, type StoreLoadResult } from './store.types';

const log = getLogger('postgres-store');

// Stays well under the 65535 bind-parameter limit
const INSERT_CHUNK_SIZE = 1000;

/**
 * The part of a pg `Pool` the store uses; a `Pool` satisfies it.
 */
export interface PantryPool {
  query(text: string): Promise<{ rows: RawRecord[] }>;
  connect(): Promise<PantryPoolClient>;
}

export interface PantryPoolClient {
  query(text: string, values?: unknown[]): Promise<unknown>;
  release(): void;
}

export interface InsertStatement {
  text: string;
  values: unknown[];
}

const quoteColumn = (column: string) => `"${column}"`;

/**
 * Multi-row INSERT statements for the given rows, in row order.
 */
export const buildInsertStatements = (
  table: string,
  columns: readonly string[],
  rows: RawRecord[],
  chunkSize: number = INSERT_CHUNK_SIZE
): InsertStatement[] => {
  const statements: InsertStatement[] = [];
  const columnList = columns.map(quoteColumn).join(', ');

  for (let start = 0; start < rows.length; start += chunkSize) {
    const chunk = rows.slice(start, start + chunkSize);
    const values: unknown[] = [];
    const tuples = chunk.map((row, rowIndex) => {
      const placeholders = columns.map((column, columnIndex) => {
        values.push(row[column]);
        return `$${rowIndex * columns.length + columnIndex + 1}`;
      });
      return `(${placeholders.join(', ')})`;
    });
    statements.push({
      text: `INSERT INTO ${table} (${columnList}) VALUES ${tuples.join(', ')}`,
      values,
    });
  }

  return statements;
};

export class PostgresPantryStore implements PantryStore {
  constructor(private readonly pool: PantryPool) {}

  async load(): Promise<StoreLoadResult> {
    try {
      const [productResult, historyResult] = await Promise.all([
        this.pool.query(
          `SELECT ${PRODUCT_COLUMNS.map(quoteColumn).join(', ')} FROM produtos ORDER BY row_id`
        ),
        this.pool.query(
          `SELECT ${HISTORY_COLUMNS.map(quoteColumn).join(', ')} FROM historico ORDER BY row_id`
        ),
      ]);

      const { snapshot, issues } = decodeSnapshot(productResult.rows, historyResult.rows);
      issues.forEach(issue => log.warn(`Coerced record field: ${issue}`));

      return { ...snapshot, error: null };
    } catch (error) {
      log.error('Failed to load pantry collections', { error: errorMessage(error) });
      return emptyLoad(errorMessage(error));
    }
  }

  /**
   * Clear-and-rewrite of both tables inside one transaction.
   */
  async save(snapshot: PantrySnapshot): Promise<void> {
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      await client.query('DELETE FROM historico');
      await client.query('DELETE FROM produtos');

      const statements = [
        ...buildInsertStatements('produtos', PRODUCT_COLUMNS, snapshot.products.map(encodeProduct)),
        ...buildInsertStatements('historico', HISTORY_COLUMNS, snapshot.history.map(encodeHistoryEvent)),
      ];
      for (const statement of statements) {
        await client.query(statement.text, statement.values);
      }

      await client.query('COMMIT');
      log.info('Saved pantry collections', {
        products: snapshot.products.length,
        history: snapshot.history.length,
      });
    } catch (error) {
      log.error('Failed to save pantry collections', { error: errorMessage(error) });
      try {
        await client.query('ROLLBACK');
      } catch (rollbackError) {
        log.error('Rollback after failed save also failed', { error: errorMessage(rollbackError) });
      }
      throw error;
    } finally {
      client.release();
    }
  }
}
