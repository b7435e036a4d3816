import { pool } from './connection';
import { migrations } from './migrations';
import type { Migration } from './migrations/types';
import { errorMessage } from '../../utils/errors';
import { getLogger } from '../../utils/logging';

const log = getLogger('migrate');

const createMigrationsTable = async () => {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS migrations (
      id SERIAL PRIMARY KEY,
      name VARCHAR(255) UNIQUE NOT NULL,
      executed_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
    )
  `);
};

const isMigrationExecuted = async (name: string): Promise<boolean> => {
  const result = await pool.query('SELECT id FROM migrations WHERE name = $1', [name]);
  return result.rows.length > 0;
};

const runMigration = async (name: string, migration: Migration) => {
  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    await migration.up(client);
    await client.query('INSERT INTO migrations (name) VALUES ($1)', [name]);
    await client.query('COMMIT');
    log.info(`Migration ${name} executed successfully`);
  } catch (error) {
    await client.query('ROLLBACK');
    log.error(`Migration ${name} failed`, { error: errorMessage(error) });
    throw error;
  } finally {
    client.release();
  }
};

const rollbackMigration = async (name: string, migration: Migration) => {
  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    await migration.down(client);
    await client.query('DELETE FROM migrations WHERE name = $1', [name]);
    await client.query('COMMIT');
    log.info(`Migration ${name} rolled back successfully`);
  } catch (error) {
    await client.query('ROLLBACK');
    log.error(`Migration ${name} rollback failed`, { error: errorMessage(error) });
    throw error;
  } finally {
    client.release();
  }
};

/**
 * Run all pending migrations
 */
export const migrate = async (): Promise<void> => {
  log.info('Starting database migrations...');
  await createMigrationsTable();
  log.info(`Found ${migrations.length} migration files`);

  for (const { name, migration } of migrations) {
    if (await isMigrationExecuted(name)) {
      log.info(`Migration ${name} already executed, skipping...`);
      continue;
    }
    await runMigration(name, migration);
  }

  log.info('All migrations completed successfully!');
};

/**
 * Roll back the most recently executed migration
 */
export const rollback = async (): Promise<void> => {
  await createMigrationsTable();

  const result = await pool.query<{ name: string }>(
    'SELECT name FROM migrations ORDER BY executed_at DESC, id DESC LIMIT 1'
  );

  if (result.rows.length === 0) {
    log.info('No migrations to rollback');
    return;
  }

  const lastMigrationName = result.rows[0].name;
  const migrationInfo = migrations.find(m => m.name === lastMigrationName);

  if (!migrationInfo) {
    log.error(`Migration ${lastMigrationName} not found in migrations list`);
    return;
  }

  await rollbackMigration(lastMigrationName, migrationInfo.migration);
};

if (require.main === module) {
  const command = process.argv[2];
  const task = command === 'rollback' ? rollback : migrate;

  task()
    .catch((error: unknown) => {
      log.error('Migration run failed', { error: errorMessage(error) });
      process.exitCode = 1;
    })
    .finally(() => pool.end());
}
