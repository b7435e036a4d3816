import type { PoolClient } from 'pg';
import type { Migration } from './types';

export const migration: Migration = {
  async up(client: PoolClient) {
    // "Data" stays text: timestamps are naive local "YYYY-MM-DD HH:MM:SS"
    await client.query(`
      CREATE TABLE IF NOT EXISTS historico (
        row_id SERIAL PRIMARY KEY,
        "Data" VARCHAR(19) NOT NULL,
        "Produto_ID" INTEGER NOT NULL,
        "Tipo" VARCHAR(20) NOT NULL,
        "Qtd" INTEGER NOT NULL DEFAULT 0,
        "Preco_Na_Epoca" NUMERIC(12, 2) NOT NULL DEFAULT 0
      )
    `);

    await client.query(`
      CREATE INDEX IF NOT EXISTS idx_historico_produto ON historico("Produto_ID")
    `);
  },

  async down(client: PoolClient) {
    await client.query('DROP INDEX IF EXISTS idx_historico_produto');
    await client.query('DROP TABLE IF EXISTS historico CASCADE');
  },
};
