import { PoolClient } from 'pg';
import { Migration } from './types';

export const migration: Migration = {
  async up(client: PoolClient) {
    await client.query(`
      DO $$ BEGIN
        CREATE TYPE otp_purpose AS ENUM ('registration', 'login');
      EXCEPTION
        WHEN duplicate_object THEN null;
      END $$;
    `);

    // No foreign key to staff: a registration code may outlive a renamed email
    await client.query(`
      CREATE TABLE IF NOT EXISTS one_time_passcodes (
        id SERIAL PRIMARY KEY,
        email VARCHAR(254) NOT NULL,
        code VARCHAR(6) NOT NULL,
        purpose otp_purpose NOT NULL,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        expires_at TIMESTAMPTZ NOT NULL,
        consumed_at TIMESTAMPTZ,
        invalidated_at TIMESTAMPTZ
      )
    `);

    await client.query(`
      CREATE INDEX IF NOT EXISTS idx_otp_email_purpose ON one_time_passcodes(email, purpose, created_at DESC)
    `);

    await client.query(`
      CREATE INDEX IF NOT EXISTS idx_otp_expires ON one_time_passcodes(expires_at)
    `);
  },

  async down(client: PoolClient) {
    await client.query('DROP INDEX IF EXISTS idx_otp_expires');
    await client.query('DROP INDEX IF EXISTS idx_otp_email_purpose');
    await client.query('DROP TABLE IF EXISTS one_time_passcodes CASCADE');
    await client.query('DROP TYPE IF EXISTS otp_purpose CASCADE');
  },
};
