import { WorkflowError } from './workflow.error';

export class TransitionUnavailable extends WorkflowError {
  constructor(currentState: string) {
    super(`No transition available out of state ${currentState}`, {
      currentState,
    });
    this.name = 'TransitionUnavailable';
  }
}
