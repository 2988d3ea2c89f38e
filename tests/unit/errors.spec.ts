import { CircularWorkflowError } from '../../src/errors/circular-workflow.error';
import { ForbiddenTransition } from '../../src/errors/forbidden-transition.error';
import { InvalidTransition } from '../../src/errors/invalid-transition.error';
import { TransitionAmbiguous } from '../../src/errors/transition-ambiguous.error';
import { TransitionDoesNotExist } from '../../src/errors/transition-does-not-exist.error';
import { TransitionNotFound } from '../../src/errors/transition-not-found.error';
import { TransitionUnavailable } from '../../src/errors/transition-unavailable.error';
import { WorkflowError } from '../../src/errors/workflow.error';
import { WorkflowValidationError } from '../../src/errors/workflow-validation.error';

describe('workflow errors', () => {
  it.each([
    [
      new InvalidTransition('complete', 'draft', 'completed'),
      'InvalidTransition',
      'Invalid transition complete: draft -> completed',
    ],
    [
      new ForbiddenTransition('submit', 'draft', 'submitted'),
      'ForbiddenTransition',
      'Transition forbidden submit: draft -> submitted',
    ],
    [
      new TransitionDoesNotExist('archive'),
      'TransitionDoesNotExist',
      'Transition archive does not exist',
    ],
    [
      new TransitionNotFound('draft', 'completed'),
      'TransitionNotFound',
      'Transition not found from draft to completed',
    ],
    [
      new TransitionUnavailable('rejected'),
      'TransitionUnavailable',
      'No transition available out of state rejected',
    ],
    [
      new TransitionAmbiguous('draft', ['submit', 'reject']),
      'TransitionAmbiguous',
      'Multiple possible transitions (got 2 choices, expected 1)',
    ],
    [
      new CircularWorkflowError('open', 100),
      'CircularWorkflowError',
      'Cannot advance circular workflow (infinite loop)',
    ],
    [
      new WorkflowValidationError(),
      'WorkflowValidationError',
      'Workflow validation failed',
    ],
  ])('%s should carry its name and message', (error, name, message) => {
    expect(error).toBeInstanceOf(WorkflowError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe(name);
    expect(error.message).toBe(message);
  });

  it('should expose transition details', () => {
    const error = new InvalidTransition('complete', 'draft', 'completed');

    expect(error.transition).toBe('complete');
    expect(error.currentState).toBe('draft');
    expect(error.toState).toBe('completed');
  });

  it('should report the candidate count of an ambiguous advance', () => {
    const error = new TransitionAmbiguous('draft', ['submit', 'reject']);

    expect(error.count).toBe(2);
    expect(error.currentState).toBe('draft');
  });

  it('should keep the validation errors it was given', () => {
    const error = new WorkflowValidationError(['amount is required'], {
      transition: 'submit',
    });

    expect(error.getErrors()).toEqual(['amount is required']);
    expect(error.transition).toBe('submit');
    expect(new WorkflowValidationError().getErrors()).toEqual([]);
  });
});
