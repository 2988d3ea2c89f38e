import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { WorkflowRegistry } from './workflow-registry.service';
import { BufferedAuditLogger } from '../audit/buffered-audit.logger';
import { Workflow } from '../engines/workflow.engine';
import { EventEmitterEventManager } from '../events/event-emitter.event-manager';
import { WorkflowEventType } from '../events/workflow-event-type.enum';
import type { WorkflowRolledBackEvent } from '../events/workflow-events';
import type { IWorkflowAuditAdapter } from '../interfaces/workflow-audit-adapter.interface';
import type {
  IEventManager,
  WorkflowEngineOptions,
} from '../interfaces/workflow-collaborators.interface';
import type { WorkflowSubject } from '../interfaces/workflow-definition.interface';
import type { ResolvedWorkflowModuleOptions } from '../interfaces/workflow-module-options.interface';
import type {
  AuditRecord,
  TransitionRecord,
  WorkflowRunResult,
} from '../interfaces/workflow-records.interface';
import {
  WORKFLOW_AUDIT_ADAPTER,
  WORKFLOW_EVENT_MANAGERS,
  WORKFLOW_MODULE_OPTIONS,
} from '../workflow.constants';

export interface WorkflowRunInput<TSubject extends WorkflowSubject> {
  /** Registered workflow type name */
  type: string;
  /** Identifier written to the audit table */
  subjectId: string;
  subject: TSubject;
}

export interface ExecuteTransitionInput<TSubject extends WorkflowSubject>
  extends WorkflowRunInput<TSubject> {
  transition: string;
  args?: unknown[];
}

export interface ProcessEventInput<TSubject extends WorkflowSubject>
  extends WorkflowRunInput<TSubject> {
  event: string;
  data?: unknown;
}

/**
 * Runs workflow transitions as units of work: the engine runs inside the
 * audit adapter's transaction and audit records are written in that same
 * transaction. Events are published once it commits. A transition that fails
 * after changing the state has its state field reset before the error is
 * rethrown.
 */
@Injectable()
export class WorkflowManager {
  private readonly logger = new Logger(WorkflowManager.name);
  private readonly eventManagers: IEventManager[];

  constructor(
    private readonly registry: WorkflowRegistry,
    @Inject(WORKFLOW_AUDIT_ADAPTER)
    private readonly adapter: IWorkflowAuditAdapter,
    private readonly eventEmitter: EventEmitter2,
    @Inject(WORKFLOW_MODULE_OPTIONS)
    private readonly options: ResolvedWorkflowModuleOptions,
    @Optional() @Inject(WORKFLOW_EVENT_MANAGERS) eventManagers?: IEventManager[],
  ) {
    this.eventManagers = eventManagers ?? [];
  }

  /**
   * Binds a registered workflow type to a subject. No transaction is opened;
   * the caller owns persistence.
   */
  create<TSubject extends WorkflowSubject>(
    type: string,
    subject: TSubject,
    options: WorkflowEngineOptions = {},
  ): Workflow<TSubject> {
    const registration = this.registry.getOrThrow(type);

    return new Workflow<TSubject>(registration.definition, subject, {
      logger: new Logger(`Workflow:${type}`),
      ...options,
      eventManagers: [
        ...this.eventManagersFor(type),
        ...(options.eventManagers ?? []),
      ],
    });
  }

  execute<TSubject extends WorkflowSubject>(
    input: ExecuteTransitionInput<TSubject>,
  ): Promise<WorkflowRunResult> {
    return this.run(input, (workflow) =>
      workflow.runTransition(input.transition, ...(input.args ?? [])),
    );
  }

  advance<TSubject extends WorkflowSubject>(
    input: WorkflowRunInput<TSubject>,
  ): Promise<WorkflowRunResult> {
    return this.run(input, (workflow) => workflow.advance());
  }

  advanceToEnd<TSubject extends WorkflowSubject>(
    input: WorkflowRunInput<TSubject>,
  ): Promise<WorkflowRunResult> {
    return this.run(input, (workflow) =>
      workflow.advanceToEnd(this.options.maxAdvanceSteps),
    );
  }

  processEvent<TSubject extends WorkflowSubject>(
    input: ProcessEventInput<TSubject>,
  ): Promise<WorkflowRunResult> {
    return this.run(input, (workflow) =>
      workflow.processEvent(input.event, input.data),
    );
  }

  history(type: string, subjectId: string): Promise<AuditRecord[]> {
    const registration = this.registry.getOrThrow(type);
    return this.adapter.findBySubject(registration.auditTable, subjectId);
  }

  private eventManagersFor(type: string): IEventManager[] {
    return [
      ...(this.options.emitEvents
        ? [new EventEmitterEventManager(this.eventEmitter, type)]
        : []),
      ...this.eventManagers,
    ];
  }

  /**
   * Transition records are held back until the transaction has committed,
   * then handed to the event managers.
   */
  private async run<TSubject extends WorkflowSubject>(
    input: WorkflowRunInput<TSubject>,
    step: (workflow: Workflow<TSubject>) => unknown,
  ): Promise<WorkflowRunResult> {
    const registration = this.registry.getOrThrow(input.type);
    const records: TransitionRecord[] = [];

    const outcome = await this.adapter.transaction(async (txAdapter) => {
      const auditLogger = new BufferedAuditLogger(input.subjectId);
      const workflow = new Workflow<TSubject>(
        registration.definition,
        input.subject,
        {
          logger: new Logger(`Workflow:${input.type}`),
          auditLogger,
          eventManagers: [{ pushEvent: (record) => records.push(record) }],
        },
      );
      const fromState = workflow.state;

      try {
        const result = step(workflow);
        for (const record of auditLogger.drain()) {
          await txAdapter.insertAuditRecord(registration.auditTable, record);
        }
        return { fromState, state: workflow.state, result };
      } catch (error) {
        // Completed transitions are persisted; only the failing one is undone.
        const committedState =
          records.length > 0 ? records[records.length - 1].toState : fromState;
        this.recover(input, workflow, committedState, error);
        throw error;
      }
    });

    const managers = this.eventManagersFor(input.type);
    for (const record of records) {
      for (const manager of managers) {
        manager.pushEvent(record);
      }
    }

    this.logger.log(
      `Workflow ${input.type}/${input.subjectId}: ${records.length} transition(s), state=${outcome.state}`,
    );

    return {
      subjectId: input.subjectId,
      fromState: outcome.fromState,
      state: outcome.state,
      transitions: records.map((record) => record.transition),
      result: outcome.result,
    };
  }

  private recover<TSubject extends WorkflowSubject>(
    input: WorkflowRunInput<TSubject>,
    workflow: Workflow<TSubject>,
    committedState: string,
    error: unknown,
  ): void {
    const failedState = workflow.state;
    if (failedState === committedState) {
      return;
    }

    workflow.rollback(committedState, failedState, error);
    this.eventEmitter.emit(WorkflowEventType.ROLLED_BACK, {
      workflowType: input.type,
      subjectId: input.subjectId,
      state: committedState,
      failedState,
      error: error instanceof Error ? error.message : String(error),
      timestamp: new Date(),
    } satisfies WorkflowRolledBackEvent);
  }
}
