import { WorkflowError } from './workflow.error';

export class TransitionDoesNotExist extends WorkflowError {
  constructor(transition: string) {
    super(`Transition ${transition} does not exist`, { transition });
    this.name = 'TransitionDoesNotExist';
  }
}
