import { WorkflowError } from './workflow.error';

export class CircularWorkflowError extends WorkflowError {
  constructor(
    currentState: string,
    public readonly steps: number,
  ) {
    super('Cannot advance circular workflow (infinite loop)', {
      currentState,
    });
    this.name = 'CircularWorkflowError';
  }
}
