import { randomUUID } from 'crypto';
import type { IWorkflowAuditAdapter } from '../interfaces/workflow-audit-adapter.interface';
import type { AuditRecord } from '../interfaces/workflow-records.interface';
import { assertTableName } from '../utils/assert-table-name';

type AuditTables = Map<string, AuditRecord[]>;

function cloneParams(params: unknown[]): unknown[] {
  const copy: unknown = JSON.parse(JSON.stringify(params));
  return Array.isArray(copy) ? copy : [];
}

function cloneRecord(record: AuditRecord): AuditRecord {
  return {
    ...record,
    params: cloneParams(record.params),
    transitionedAt: new Date(record.transitionedAt),
  };
}

function cloneTables(tables: AuditTables): AuditTables {
  const copy: AuditTables = new Map();
  for (const [tableName, rows] of tables.entries()) {
    copy.set(tableName, rows.map(cloneRecord));
  }
  return copy;
}

/**
 * Audit store kept in process memory. A transaction works on a copy of the
 * tables that replaces the stored tables only when the callback resolves.
 */
export class InMemoryWorkflowAuditAdapter implements IWorkflowAuditAdapter {
  private tables: AuditTables;

  constructor(
    tables?: AuditTables,
    private readonly transactionBound = false,
  ) {
    this.tables = tables ?? new Map();
  }

  async insertAuditRecord(
    tableName: string,
    data: Omit<AuditRecord, 'id' | 'transitionedAt'>,
  ): Promise<void> {
    assertTableName(tableName);
    this.getTable(tableName).push({
      id: randomUUID(),
      subjectId: data.subjectId,
      transition: data.transition,
      fromState: data.fromState,
      toState: data.toState,
      params: cloneParams(data.params),
      transitionedAt: new Date(),
    });
  }

  async findBySubject(
    tableName: string,
    subjectId: string,
  ): Promise<AuditRecord[]> {
    assertTableName(tableName);
    return this.getTable(tableName)
      .filter((row) => row.subjectId === subjectId)
      .map(cloneRecord);
  }

  async transaction<T>(
    cb: (adapter: IWorkflowAuditAdapter) => Promise<T>,
  ): Promise<T> {
    if (this.transactionBound) {
      return cb(this);
    }

    const txTables = cloneTables(this.tables);
    const result = await cb(new InMemoryWorkflowAuditAdapter(txTables, true));
    this.tables = txTables;
    return result;
  }

  private getTable(tableName: string): AuditRecord[] {
    const table = this.tables.get(tableName);
    if (table) return table;

    const next: AuditRecord[] = [];
    this.tables.set(tableName, next);
    return next;
  }
}
