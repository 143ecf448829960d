import { Pool } from 'pg';
import {
  CreateItIssueInput,
  ItIssue,
  ItIssueFilter,
  UpdateItIssueInput,
} from '../../connections/db/models';
import { IssueStatus } from '../../constants';

const ISSUE_COLUMNS = `id, owner_id, title, description, category, priority, method_of_logging,
  attachment, status, work_done, recommendation, resolved_at, created_at, updated_at`;

const UPDATABLE_COLUMNS: (keyof UpdateItIssueInput)[] = [
  'title',
  'description',
  'category',
  'priority',
  'method_of_logging',
  'attachment',
  'status',
  'work_done',
  'recommendation',
  'resolved_at',
];

export interface IssuePage {
  rows: ItIssue[];
  total: number;
}

export interface IssueRepository {
  create(input: CreateItIssueInput): Promise<ItIssue>;
  findById(id: number): Promise<ItIssue | null>;
  list(filter: ItIssueFilter): Promise<IssuePage>;
  /**
   * Applies the changes only while the issue still has the expected status.
   * Returns null when the issue is gone or its status moved on.
   */
  update(id: number, changes: UpdateItIssueInput, expectedStatus: IssueStatus): Promise<ItIssue | null>;
  delete(id: number): Promise<boolean>;
}

export class PgIssueRepository implements IssueRepository {
  constructor(private readonly pool: Pool) {}

  async create(input: CreateItIssueInput): Promise<ItIssue> {
    const result = await this.pool.query<ItIssue>(
      `INSERT INTO it_issues (owner_id, title, description, category, priority, method_of_logging, attachment)
       VALUES ($1, $2, $3, $4, $5, $6, $7)
       RETURNING ${ISSUE_COLUMNS}`,
      [
        input.owner_id,
        input.title,
        input.description,
        input.category,
        input.priority,
        input.method_of_logging,
        input.attachment ?? null,
      ]
    );
    return result.rows[0];
  }

  async findById(id: number): Promise<ItIssue | null> {
    const result = await this.pool.query<ItIssue>(
      `SELECT ${ISSUE_COLUMNS} FROM it_issues WHERE id = $1`,
      [id]
    );
    return result.rows[0] ?? null;
  }

  async list(filter: ItIssueFilter): Promise<IssuePage> {
    const conditions: string[] = [];
    const params: unknown[] = [];
    let paramCount = 0;

    if (filter.owner_id) {
      paramCount++;
      conditions.push(`owner_id = $${paramCount}`);
      params.push(filter.owner_id);
    }

    if (filter.status) {
      paramCount++;
      conditions.push(`status = $${paramCount}`);
      params.push(filter.status);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';

    const countResult = await this.pool.query<{ count: string }>(
      `SELECT COUNT(*) AS count FROM it_issues ${where}`,
      params
    );

    const result = await this.pool.query<ItIssue>(
      `SELECT ${ISSUE_COLUMNS} FROM it_issues ${where}
       ORDER BY created_at DESC, id DESC
       LIMIT $${paramCount + 1} OFFSET $${paramCount + 2}`,
      [...params, filter.limit, filter.offset]
    );

    return { rows: result.rows, total: parseInt(countResult.rows[0].count, 10) };
  }

  async update(id: number, changes: UpdateItIssueInput, expectedStatus: IssueStatus): Promise<ItIssue | null> {
    const updates: string[] = [];
    const values: unknown[] = [];
    let paramCount = 0;

    for (const column of UPDATABLE_COLUMNS) {
      const value = changes[column];
      if (value !== undefined) {
        paramCount++;
        updates.push(`${column} = $${paramCount}`);
        values.push(value);
      }
    }

    updates.push('updated_at = NOW()');
    values.push(id, expectedStatus);

    const result = await this.pool.query<ItIssue>(
      `UPDATE it_issues SET ${updates.join(', ')}
       WHERE id = $${paramCount + 1} AND status = $${paramCount + 2}
       RETURNING ${ISSUE_COLUMNS}`,
      values
    );
    return result.rows[0] ?? null;
  }

  async delete(id: number): Promise<boolean> {
    const result = await this.pool.query('DELETE FROM it_issues WHERE id = $1', [id]);
    return (result.rowCount ?? 0) > 0;
  }
}
