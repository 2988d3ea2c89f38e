import 'reflect-metadata';

// Module
export { WorkflowModule } from './workflow.module';

// Engine
export {
  Workflow,
  immediateUnitOfWork,
} from './engines/workflow.engine';
export type { TransitionExecutor } from './engines/workflow.engine';
export { TransitionTable, matchesSource } from './engines/transition-table';
export { HookRegistry } from './engines/hook-registry';
export { GuardEvaluator } from './engines/guard-evaluator';
export {
  onEnterStateCheck,
  onExitStateCheck,
  onEnterState,
  onExitState,
} from './engines/hook-bindings';

// Services
export { WorkflowManager } from './services/workflow-manager.service';
export type {
  WorkflowRunInput,
  ExecuteTransitionInput,
  ProcessEventInput,
} from './services/workflow-manager.service';
export { WorkflowRegistry } from './services/workflow-registry.service';
export type { RegisteredWorkflow } from './services/workflow-registry.service';

// Decorators
export { WorkflowType } from './decorators/workflow-type.decorator';
export type {
  WorkflowTypeOptions,
  WorkflowTypeMetadata,
} from './decorators/workflow-type.decorator';

// Interfaces
export { WILDCARD_STATE } from './interfaces/workflow-definition.interface';
export type {
  WorkflowDefinition,
  WorkflowSubject,
  WorkflowHooks,
  HookBinding,
  HookBindingKind,
  Transition,
  TransitionDescriptor,
  TransitionSource,
  TransitionBody,
  TransitionCondition,
  BeforeTransitionHook,
  AfterTransitionHook,
  StateCheck,
  StateHook,
} from './interfaces/workflow-definition.interface';
export type {
  IAuditLogger,
  IEventManager,
  IUnitOfWork,
  WorkflowEngineOptions,
} from './interfaces/workflow-collaborators.interface';
export type { IWorkflowAuditAdapter } from './interfaces/workflow-audit-adapter.interface';
export type {
  TransitionRecord,
  AuditLogEntry,
  AuditRecord,
  NextState,
  WorkflowRunResult,
} from './interfaces/workflow-records.interface';
export type {
  WorkflowModuleOptions,
  WorkflowModuleAsyncOptions,
} from './interfaces/workflow-module-options.interface';

// Adapters
export { InMemoryWorkflowAuditAdapter } from './adapters/in-memory-workflow-audit.adapter';
export { PgWorkflowAuditAdapter } from './adapters/pg-workflow-audit.adapter';
export { DrizzleWorkflowAuditAdapter } from './adapters/drizzle-workflow-audit.adapter';
export type { DrizzleSqlExecutor } from './adapters/drizzle-workflow-audit.adapter';
export { BufferedAuditLogger } from './audit/buffered-audit.logger';

// Errors
export { WorkflowError } from './errors/workflow.error';
export { InvalidTransition } from './errors/invalid-transition.error';
export { ForbiddenTransition } from './errors/forbidden-transition.error';
export { TransitionDoesNotExist } from './errors/transition-does-not-exist.error';
export { TransitionNotFound } from './errors/transition-not-found.error';
export { TransitionUnavailable } from './errors/transition-unavailable.error';
export { TransitionAmbiguous } from './errors/transition-ambiguous.error';
export { CircularWorkflowError } from './errors/circular-workflow.error';
export { WorkflowValidationError } from './errors/workflow-validation.error';
export { WorkflowNotRegisteredError } from './errors/workflow-not-registered.error';
export { DuplicateRegistrationError } from './errors/duplicate-registration.error';

// Events
export { WorkflowEventType } from './events/workflow-event-type.enum';
export { EventEmitterEventManager } from './events/event-emitter.event-manager';
export type {
  WorkflowTransitionEvent,
  WorkflowRolledBackEvent,
} from './events/workflow-events';

// Testing
export { transitionCases } from './testing/transition-cases';
export type { TransitionCase } from './testing/transition-cases';

// CLI
export { generateMigration } from './cli/generate-migration';

// Constants
export {
  WORKFLOW_MODULE_OPTIONS,
  WORKFLOW_AUDIT_ADAPTER,
  WORKFLOW_EVENT_MANAGERS,
  WORKFLOW_TYPE_METADATA,
  DEFAULT_STATE_FIELD,
  DEFAULT_MAX_ADVANCE_STEPS,
  AUDIT_TABLE_SUFFIX,
} from './workflow.constants';
