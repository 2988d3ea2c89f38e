import type { Pool, PoolClient } from 'pg';
import type { IWorkflowAuditAdapter } from '../interfaces/workflow-audit-adapter.interface';
import type { AuditRecord } from '../interfaces/workflow-records.interface';
import { assertTableName } from '../utils/assert-table-name';

interface PgAuditRow {
  id: string;
  subject_id: string;
  transition: string;
  from_state: string;
  to_state: string;
  params: unknown;
  transitioned_at: Date | string;
}

type PgQueryable = Pick<Pool, 'query'> | Pick<PoolClient, 'query'>;

function parseParams(value: unknown): unknown[] {
  const parsed: unknown =
    typeof value === 'string' ? JSON.parse(value) : value;
  return Array.isArray(parsed) ? parsed : [];
}

export class PgWorkflowAuditAdapter implements IWorkflowAuditAdapter {
  constructor(
    private readonly pool: Pool,
    private readonly client?: PoolClient,
  ) {}

  async insertAuditRecord(
    tableName: string,
    data: Omit<AuditRecord, 'id' | 'transitionedAt'>,
  ): Promise<void> {
    assertTableName(tableName);

    await this.getConn().query(
      `INSERT INTO ${tableName}
       (subject_id, transition, from_state, to_state, params)
       VALUES ($1, $2, $3, $4, $5::jsonb)`,
      [
        data.subjectId,
        data.transition,
        data.fromState,
        data.toState,
        JSON.stringify(data.params),
      ],
    );
  }

  async findBySubject(
    tableName: string,
    subjectId: string,
  ): Promise<AuditRecord[]> {
    assertTableName(tableName);

    const result = await this.getConn().query<PgAuditRow>(
      `SELECT id, subject_id, transition, from_state, to_state, params, transitioned_at
       FROM ${tableName}
       WHERE subject_id = $1
       ORDER BY transitioned_at, id`,
      [subjectId],
    );

    return result.rows.map((row) => this.toAuditRecord(row));
  }

  async transaction<T>(
    cb: (adapter: IWorkflowAuditAdapter) => Promise<T>,
  ): Promise<T> {
    if (this.client) {
      return cb(this);
    }

    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      const result = await cb(new PgWorkflowAuditAdapter(this.pool, client));
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }

  private getConn(): PgQueryable {
    return this.client ?? this.pool;
  }

  private toAuditRecord(row: PgAuditRow): AuditRecord {
    return {
      id: row.id,
      subjectId: row.subject_id,
      transition: row.transition,
      fromState: row.from_state,
      toState: row.to_state,
      params: parseParams(row.params),
      transitionedAt: new Date(row.transitioned_at),
    };
  }
}
