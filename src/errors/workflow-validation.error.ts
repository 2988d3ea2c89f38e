import { WorkflowError, WorkflowErrorDetails } from './workflow.error';

/**
 * Raised by host applications when their own validation rejects a
 * transition. The engine never throws it.
 */
export class WorkflowValidationError extends WorkflowError {
  private readonly errors: readonly unknown[];

  constructor(errors?: readonly unknown[], details?: WorkflowErrorDetails) {
    super('Workflow validation failed', details);
    this.name = 'WorkflowValidationError';
    this.errors = errors ?? [];
  }

  getErrors(): readonly unknown[] {
    return this.errors;
  }
}
