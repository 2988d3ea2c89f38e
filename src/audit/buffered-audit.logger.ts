import type { IAuditLogger } from '../interfaces/workflow-collaborators.interface';
import type {
  AuditLogEntry,
  AuditRecord,
} from '../interfaces/workflow-records.interface';

/**
 * Collects audit entries while the synchronous engine runs so that they can
 * be written afterwards, inside the same database transaction.
 */
export class BufferedAuditLogger implements IAuditLogger {
  private entries: AuditLogEntry[] = [];

  constructor(private readonly subjectId: string) {}

  log(entry: AuditLogEntry): void {
    this.entries.push(entry);
  }

  get size(): number {
    return this.entries.length;
  }

  drain(): Omit<AuditRecord, 'id' | 'transitionedAt'>[] {
    const drained = this.entries.map((entry) => ({
      subjectId: this.subjectId,
      transition: entry.transition,
      fromState: entry.fromState,
      toState: entry.toState,
      params: [...entry.params],
    }));
    this.entries = [];
    return drained;
  }
}
