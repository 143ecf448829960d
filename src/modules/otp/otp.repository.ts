import { Pool } from 'pg';
import { CreateOneTimePasscodeInput, OneTimePasscode } from '../../connections/db/models';
import { OtpPurpose } from '../../constants';

const OTP_COLUMNS = 'id, email, code, purpose, created_at, expires_at, consumed_at, invalidated_at';

export interface OtpRepository {
  /**
   * Invalidate every outstanding code for (email, purpose) and store the new one, atomically
   */
  replaceOutstanding(input: CreateOneTimePasscodeInput): Promise<OneTimePasscode>;
  findLatest(email: string, purpose: OtpPurpose): Promise<OneTimePasscode | null>;
  findById(id: number): Promise<OneTimePasscode | null>;
  /**
   * Consume the code only while it is still outstanding and unexpired at `at`
   * @returns false when it was consumed, superseded or expired in the meantime
   */
  markConsumed(id: number, at: Date): Promise<boolean>;
  deleteExpiredBefore(cutoff: Date): Promise<number>;
}

export class PgOtpRepository implements OtpRepository {
  constructor(private readonly pool: Pool) {}

  async replaceOutstanding(input: CreateOneTimePasscodeInput): Promise<OneTimePasscode> {
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');

      // Serialize issuance per (email, purpose) so only one code stays outstanding
      await client.query('SELECT pg_advisory_xact_lock(hashtext($1))', [
        `${input.email}:${input.purpose}`,
      ]);

      await client.query(
        `UPDATE one_time_passcodes
         SET invalidated_at = NOW()
         WHERE email = $1 AND purpose = $2 AND consumed_at IS NULL AND invalidated_at IS NULL`,
        [input.email, input.purpose]
      );

      const result = await client.query<OneTimePasscode>(
        `INSERT INTO one_time_passcodes (email, code, purpose, expires_at)
         VALUES ($1, $2, $3, $4)
         RETURNING ${OTP_COLUMNS}`,
        [input.email, input.code, input.purpose, input.expires_at]
      );

      await client.query('COMMIT');
      return result.rows[0];
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }

  async findLatest(email: string, purpose: OtpPurpose): Promise<OneTimePasscode | null> {
    const result = await this.pool.query<OneTimePasscode>(
      `SELECT ${OTP_COLUMNS}
       FROM one_time_passcodes
       WHERE email = $1 AND purpose = $2
       ORDER BY created_at DESC, id DESC
       LIMIT 1`,
      [email, purpose]
    );
    return result.rows[0] ?? null;
  }

  async findById(id: number): Promise<OneTimePasscode | null> {
    const result = await this.pool.query<OneTimePasscode>(
      `SELECT ${OTP_COLUMNS} FROM one_time_passcodes WHERE id = $1`,
      [id]
    );
    return result.rows[0] ?? null;
  }

  async markConsumed(id: number, at: Date): Promise<boolean> {
    const result = await this.pool.query(
      `UPDATE one_time_passcodes
       SET consumed_at = $2
       WHERE id = $1
         AND consumed_at IS NULL
         AND invalidated_at IS NULL
         AND expires_at >= $2`,
      [id, at]
    );
    return (result.rowCount ?? 0) === 1;
  }

  async deleteExpiredBefore(cutoff: Date): Promise<number> {
    const result = await this.pool.query(
      'DELETE FROM one_time_passcodes WHERE expires_at < $1',
      [cutoff]
    );
    return result.rowCount ?? 0;
  }
}
