import { WorkflowError } from './workflow.error';

export class TransitionAmbiguous extends WorkflowError {
  constructor(
    currentState: string,
    public readonly candidates: readonly string[],
  ) {
    super(
      `Multiple possible transitions (got ${candidates.length} choices, expected 1)`,
      { currentState },
    );
    this.name = 'TransitionAmbiguous';
  }

  get count(): number {
    return this.candidates.length;
  }
}
