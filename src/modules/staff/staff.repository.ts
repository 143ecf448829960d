import { Pool } from 'pg';
import { CreateStaffInput, Staff, UpdateStaffInput } from '../../connections/db/models';

const STAFF_COLUMNS = 'id, email, first_name, last_name, role, branch, is_verified, created_at, updated_at';

export interface StaffPage {
  rows: Staff[];
  total: number;
}

export interface StaffRepository {
  findById(id: string): Promise<Staff | null>;
  findByEmail(email: string): Promise<Staff | null>;
  /**
   * Create an unverified account, or refresh the details of one that never verified.
   * Returns null when the email already belongs to a verified account.
   */
  upsertUnverified(input: CreateStaffInput): Promise<Staff | null>;
  markVerified(id: string): Promise<Staff | null>;
  update(id: string, changes: UpdateStaffInput): Promise<Staff | null>;
  list(limit: number, offset: number): Promise<StaffPage>;
}

export class PgStaffRepository implements StaffRepository {
  constructor(private readonly pool: Pool) {}

  async findById(id: string): Promise<Staff | null> {
    const result = await this.pool.query<Staff>(
      `SELECT ${STAFF_COLUMNS} FROM staff WHERE id = $1`,
      [id]
    );
    return result.rows[0] ?? null;
  }

  async findByEmail(email: string): Promise<Staff | null> {
    const result = await this.pool.query<Staff>(
      `SELECT ${STAFF_COLUMNS} FROM staff WHERE email = $1`,
      [email]
    );
    return result.rows[0] ?? null;
  }

  async upsertUnverified(input: CreateStaffInput): Promise<Staff | null> {
    const result = await this.pool.query<Staff>(
      `INSERT INTO staff (email, first_name, last_name, branch)
       VALUES ($1, $2, $3, COALESCE($4, 'headquarters'))
       ON CONFLICT (email) DO UPDATE
         SET first_name = EXCLUDED.first_name,
             last_name = EXCLUDED.last_name,
             branch = EXCLUDED.branch,
             updated_at = NOW()
         WHERE staff.is_verified = FALSE
       RETURNING ${STAFF_COLUMNS}`,
      [input.email, input.first_name, input.last_name, input.branch ?? null]
    );
    return result.rows[0] ?? null;
  }

  async markVerified(id: string): Promise<Staff | null> {
    const result = await this.pool.query<Staff>(
      `UPDATE staff SET is_verified = TRUE, updated_at = NOW()
       WHERE id = $1
       RETURNING ${STAFF_COLUMNS}`,
      [id]
    );
    return result.rows[0] ?? null;
  }

  async update(id: string, changes: UpdateStaffInput): Promise<Staff | null> {
    const updates: string[] = [];
    const values: unknown[] = [];
    let paramCount = 0;

    const columns: (keyof UpdateStaffInput)[] = ['first_name', 'last_name', 'branch', 'role'];
    for (const column of columns) {
      const value = changes[column];
      if (value !== undefined) {
        paramCount++;
        updates.push(`${column} = $${paramCount}`);
        values.push(value);
      }
    }

    if (updates.length === 0) {
      return this.findById(id);
    }

    updates.push('updated_at = NOW()');
    paramCount++;
    values.push(id);

    const result = await this.pool.query<Staff>(
      `UPDATE staff SET ${updates.join(', ')} WHERE id = $${paramCount} RETURNING ${STAFF_COLUMNS}`,
      values
    );
    return result.rows[0] ?? null;
  }

  async list(limit: number, offset: number): Promise<StaffPage> {
    const [rows, count] = await Promise.all([
      this.pool.query<Staff>(
        `SELECT ${STAFF_COLUMNS} FROM staff ORDER BY first_name, last_name LIMIT $1 OFFSET $2`,
        [limit, offset]
      ),
      this.pool.query<{ count: string }>('SELECT COUNT(*) AS count FROM staff'),
    ]);
    return { rows: rows.rows, total: parseInt(count.rows[0].count, 10) };
  }
}
