import type { InjectionToken, ModuleMetadata } from '@nestjs/common';
import type { IEventManager } from './workflow-collaborators.interface';
import type { IWorkflowAuditAdapter } from './workflow-audit-adapter.interface';

export interface WorkflowModuleOptions {
  /** Audit store; its transaction() is the unit of work of every run */
  adapter: IWorkflowAuditAdapter;

  /** Extra event managers notified after each transition */
  eventManagers?: IEventManager[];

  /** Emit transitions on the EventEmitter2 bus. Default: true */
  emitEvents?: boolean;

  /** Step limit for advanceToEnd(). Default: 100 */
  maxAdvanceSteps?: number;
}

export interface ResolvedWorkflowModuleOptions {
  emitEvents: boolean;
  maxAdvanceSteps: number;
}

export interface WorkflowModuleAsyncOptions {
  imports?: ModuleMetadata['imports'];
  useFactory: (
    ...args: any[]
  ) => Promise<WorkflowModuleOptions> | WorkflowModuleOptions;
  inject?: InjectionToken[];
}
