export interface WorkflowErrorDetails {
  transition?: string;
  currentState?: string;
  toState?: string;
}

export class WorkflowError extends Error {
  public readonly transition?: string;
  public readonly currentState?: string;
  public readonly toState?: string;

  constructor(message: string, details: WorkflowErrorDetails = {}) {
    super(message);
    this.name = 'WorkflowError';
    this.transition = details.transition;
    this.currentState = details.currentState;
    this.toState = details.toState;
  }
}
