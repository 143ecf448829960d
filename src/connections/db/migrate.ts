import { Pool } from 'pg';
import { createPool } from './connection';
import { migrations } from './migrations';
import { Migration } from './migrations/types';
import { loadConfig } from '../config/app.config';
import { logger, errorMeta } from '../../utils/logging';

const createMigrationsTable = async (pool: Pool): Promise<void> => {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS migrations (
      id SERIAL PRIMARY KEY,
      name VARCHAR(255) UNIQUE NOT NULL,
      executed_at TIMESTAMPTZ DEFAULT CURRENT_TIMESTAMP
    )
  `);
};

const isMigrationExecuted = async (pool: Pool, name: string): Promise<boolean> => {
  const result = await pool.query('SELECT id FROM migrations WHERE name = $1', [name]);
  return result.rows.length > 0;
};

const runMigration = async (pool: Pool, name: string, migration: Migration): Promise<void> => {
  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    await migration.up(client);
    await client.query('INSERT INTO migrations (name) VALUES ($1)', [name]);
    await client.query('COMMIT');
    logger.info(`Migration ${name} executed successfully`);
  } catch (error) {
    await client.query('ROLLBACK');
    logger.error(`Migration ${name} failed`, errorMeta(error));
    throw error;
  } finally {
    client.release();
  }
};

const rollbackMigration = async (pool: Pool, name: string, migration: Migration): Promise<void> => {
  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    await migration.down(client);
    await client.query('DELETE FROM migrations WHERE name = $1', [name]);
    await client.query('COMMIT');
    logger.info(`Migration ${name} rolled back successfully`);
  } catch (error) {
    await client.query('ROLLBACK');
    logger.error(`Migration ${name} rollback failed`, errorMeta(error));
    throw error;
  } finally {
    client.release();
  }
};

/**
 * Run all pending migrations in declaration order
 */
export const migrate = async (pool: Pool): Promise<void> => {
  logger.info('Starting database migrations...');
  await createMigrationsTable(pool);

  for (const { name, migration } of migrations) {
    if (await isMigrationExecuted(pool, name)) {
      logger.info(`Migration ${name} already executed, skipping...`);
      continue;
    }
    await runMigration(pool, name, migration);
  }

  logger.info('All migrations completed successfully!');
};

/**
 * Roll back the most recently executed migration
 */
export const rollback = async (pool: Pool): Promise<void> => {
  await createMigrationsTable(pool);

  const result = await pool.query<{ name: string }>(
    'SELECT name FROM migrations ORDER BY executed_at DESC, id DESC LIMIT 1'
  );

  if (result.rows.length === 0) {
    logger.info('No migrations to rollback');
    return;
  }

  const lastMigrationName = result.rows[0].name;
  const migrationInfo = migrations.find(m => m.name === lastMigrationName);

  if (!migrationInfo) {
    throw new Error(`Migration ${lastMigrationName} not found in migrations list`);
  }

  await rollbackMigration(pool, lastMigrationName, migrationInfo.migration);
};

if (require.main === module) {
  const pool = createPool(loadConfig().db);
  const command = process.argv[2] === 'rollback' ? rollback : migrate;

  command(pool)
    .catch(error => {
      logger.error('Migration error', errorMeta(error));
      process.exitCode = 1;
    })
    .finally(() => pool.end());
}
