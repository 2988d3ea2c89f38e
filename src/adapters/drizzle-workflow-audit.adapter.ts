import { sql, type SQL } from 'drizzle-orm';
import type { IWorkflowAuditAdapter } from '../interfaces/workflow-audit-adapter.interface';
import type { AuditRecord } from '../interfaces/workflow-records.interface';
import { assertTableName } from '../utils/assert-table-name';

type DrizzleRow = Record<string, unknown>;

/** The slice of a Drizzle Postgres database (or transaction) the adapter uses. */
export interface DrizzleSqlExecutor {
  execute(query: SQL): PromiseLike<unknown>;
  transaction<T>(cb: (tx: DrizzleSqlExecutor) => Promise<T>): Promise<T>;
}

function isRow(value: unknown): value is DrizzleRow {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Extracts row array from a Drizzle execute() result.
 * Different PG drivers return different shapes:
 * - postgres-js: returns the array directly
 * - node-postgres: returns { rows: [...] }
 */
function extractRows(result: unknown): DrizzleRow[] {
  const rows: unknown =
    isRow(result) && 'rows' in result ? result.rows : result;
  return Array.isArray(rows) ? rows.filter(isRow) : [];
}

function parseParams(value: unknown): unknown[] {
  const parsed: unknown =
    typeof value === 'string' ? JSON.parse(value) : value;
  return Array.isArray(parsed) ? parsed : [];
}

function toDate(value: unknown): Date {
  return value instanceof Date ? value : new Date(String(value));
}

export class DrizzleWorkflowAuditAdapter implements IWorkflowAuditAdapter {
  constructor(private readonly db: DrizzleSqlExecutor) {}

  async insertAuditRecord(
    tableName: string,
    data: Omit<AuditRecord, 'id' | 'transitionedAt'>,
  ): Promise<void> {
    assertTableName(tableName);
    const paramsJson = JSON.stringify(data.params);

    await this.db.execute(
      sql`INSERT INTO ${sql.raw(tableName)} (subject_id, transition, from_state, to_state, params)
          VALUES (${data.subjectId}, ${data.transition}, ${data.fromState}, ${data.toState}, ${paramsJson}::jsonb)`,
    );
  }

  async findBySubject(
    tableName: string,
    subjectId: string,
  ): Promise<AuditRecord[]> {
    assertTableName(tableName);
    const result = await this.db.execute(
      sql`SELECT id, subject_id, transition, from_state, to_state, params, transitioned_at
          FROM ${sql.raw(tableName)}
          WHERE subject_id = ${subjectId}
          ORDER BY transitioned_at, id`,
    );

    return extractRows(result).map((row) => ({
      id: String(row.id),
      subjectId: String(row.subject_id),
      transition: String(row.transition),
      fromState: String(row.from_state),
      toState: String(row.to_state),
      params: parseParams(row.params),
      transitionedAt: toDate(row.transitioned_at),
    }));
  }

  async transaction<T>(
    cb: (adapter: IWorkflowAuditAdapter) => Promise<T>,
  ): Promise<T> {
    return this.db.transaction((tx) =>
      cb(new DrizzleWorkflowAuditAdapter(tx)),
    );
  }
}
