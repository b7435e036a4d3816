import type { PoolClient } from 'pg';
import type { Migration } from './types';

// Column names follow the pantry record contract, hence the quoting
export const migration: Migration = {
  async up(client: PoolClient) {
    await client.query(`
      CREATE TABLE IF NOT EXISTS produtos (
        row_id SERIAL PRIMARY KEY,
        "ID" INTEGER NOT NULL UNIQUE,
        "Produto" VARCHAR(255) NOT NULL,
        "Marca" VARCHAR(255) NOT NULL DEFAULT '',
        "Preco" NUMERIC(12, 2) NOT NULL DEFAULT 0,
        "Estoque_Atual" INTEGER NOT NULL DEFAULT 0,
        "Estoque_Minimo" INTEGER NOT NULL DEFAULT 1
      )
    `);
  },

  async down(client: PoolClient) {
    await client.query('DROP TABLE IF EXISTS produtos CASCADE');
  },
};
