import { PoolClient } from 'pg';
import { Migration } from './types';

export const migration: Migration = {
  async up(client: PoolClient) {
    await client.query(`
      CREATE TABLE IF NOT EXISTS it_issues (
        id SERIAL PRIMARY KEY,
        owner_id UUID NOT NULL REFERENCES staff(id) ON DELETE CASCADE,
        title VARCHAR(255) NOT NULL,
        description TEXT NOT NULL,
        category VARCHAR(30) NOT NULL DEFAULT 'others' CHECK (category IN (
          'internet_banking', 'mobile_banking', 'br_net', 'network',
          'hardware', 'software', 'others'
        )),
        priority VARCHAR(10) NOT NULL CHECK (priority IN ('low', 'medium', 'high')),
        method_of_logging VARCHAR(10) NOT NULL CHECK (method_of_logging IN ('email', 'call', 'walk_in')),
        attachment VARCHAR(255),
        status VARCHAR(20) NOT NULL DEFAULT 'open' CHECK (status IN ('open', 'in_progress', 'resolved')),
        work_done TEXT,
        recommendation TEXT,
        resolved_at TIMESTAMPTZ,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `);

    await client.query(`
      CREATE INDEX IF NOT EXISTS idx_it_issues_owner ON it_issues(owner_id, created_at DESC)
    `);

    await client.query(`
      CREATE INDEX IF NOT EXISTS idx_it_issues_status ON it_issues(status)
    `);
  },

  async down(client: PoolClient) {
    await client.query('DROP INDEX IF EXISTS idx_it_issues_status');
    await client.query('DROP INDEX IF EXISTS idx_it_issues_owner');
    await client.query('DROP TABLE IF EXISTS it_issues CASCADE');
  },
};
