import type { LoggerService } from '@nestjs/common';
import type {
  AuditLogEntry,
  TransitionRecord,
} from './workflow-records.interface';

export interface IAuditLogger {
  log(entry: AuditLogEntry): void;
}

export interface IEventManager {
  pushEvent(record: TransitionRecord): void;
}

/**
 * Runs a closure so that either all of its persistence effects commit or
 * none do. The engine only calls it; it never implements the scoping.
 */
export interface IUnitOfWork {
  atomic<T>(work: () => T): T;
}

export interface WorkflowEngineOptions {
  logger?: LoggerService;
  auditLogger?: IAuditLogger;
  eventManagers?: readonly IEventManager[];
  unitOfWork?: IUnitOfWork;
  clock?: () => Date;
}
