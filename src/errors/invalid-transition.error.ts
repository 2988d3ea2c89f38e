import { WorkflowError } from './workflow.error';

/** The current state is not one of the transition's sources. */
export class InvalidTransition extends WorkflowError {
  constructor(transition: string, currentState: string, toState: string) {
    super(`Invalid transition ${transition}: ${currentState} -> ${toState}`, {
      transition,
      currentState,
      toState,
    });
    this.name = 'InvalidTransition';
  }
}
