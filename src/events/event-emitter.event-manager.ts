import type { EventEmitter2 } from '@nestjs/event-emitter';
import type { IEventManager } from '../interfaces/workflow-collaborators.interface';
import type { TransitionRecord } from '../interfaces/workflow-records.interface';
import { WorkflowEventType } from './workflow-event-type.enum';
import type { WorkflowTransitionEvent } from './workflow-events';

/** Publishes every transition of one workflow type on the EventEmitter2 bus. */
export class EventEmitterEventManager implements IEventManager {
  constructor(
    private readonly eventEmitter: EventEmitter2,
    private readonly workflowType: string,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  pushEvent(record: TransitionRecord): void {
    this.eventEmitter.emit(WorkflowEventType.TRANSITION, {
      workflowType: this.workflowType,
      transition: record.transition,
      fromState: record.fromState,
      toState: record.toState,
      label: record.label,
      params: record.params,
      timestamp: this.clock(),
    } satisfies WorkflowTransitionEvent);
  }
}
