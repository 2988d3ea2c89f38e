import type { AuditRecord } from './workflow-records.interface';

export interface IWorkflowAuditAdapter {
  /**
   * Insert one transition record into the audit table.
   * @param tableName - Audit table, e.g. `order_transitions`
   */
  insertAuditRecord(
    tableName: string,
    data: Omit<AuditRecord, 'id' | 'transitionedAt'>,
  ): Promise<void>;

  /**
   * All recorded transitions of one subject, oldest first.
   */
  findBySubject(tableName: string, subjectId: string): Promise<AuditRecord[]>;

  /**
   * Execute a callback within a database transaction.
   * The callback receives an adapter instance bound to the transaction.
   */
  transaction<T>(
    cb: (adapter: IWorkflowAuditAdapter) => Promise<T>,
  ): Promise<T>;
}
