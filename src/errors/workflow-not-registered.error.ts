export class WorkflowNotRegisteredError extends Error {
  constructor(public readonly workflowName: string) {
    super(`No workflow type registered as "${workflowName}".`);
    this.name = 'WorkflowNotRegisteredError';
  }
}
