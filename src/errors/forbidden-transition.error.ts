import { WorkflowError } from './workflow.error';

/** A transition condition or a state check returned false. */
export class ForbiddenTransition extends WorkflowError {
  constructor(transition: string, currentState: string, toState: string) {
    super(
      `Transition forbidden ${transition}: ${currentState} -> ${toState}`,
      { transition, currentState, toState },
    );
    this.name = 'ForbiddenTransition';
  }
}
