import { WorkflowError } from './workflow.error';

export class TransitionNotFound extends WorkflowError {
  constructor(currentState: string, toState: string) {
    super(`Transition not found from ${currentState} to ${toState}`, {
      currentState,
      toState,
    });
    this.name = 'TransitionNotFound';
  }
}
