import { ForbiddenTransition } from '../errors/forbidden-transition.error';
import type {
  StateCheck,
  Transition,
  WorkflowSubject,
} from '../interfaces/workflow-definition.interface';
import type { HookRegistry } from './hook-registry';

/**
 * Aggregates the transition condition and the enter/exit state checks into
 * one allow/deny decision. Guards are expected to be free of side effects.
 */
export class GuardEvaluator<TSubject extends WorkflowSubject> {
  constructor(
    private readonly workflowId: string,
    private readonly hooks: HookRegistry<TSubject>,
  ) {}

  checkTransition(
    subject: TSubject,
    transition: Transition,
    currentState: string,
    args: readonly unknown[],
    raiseOnDeny = true,
  ): boolean {
    let allowed = true;

    const condition = this.hooks.condition(transition.name);
    if (condition) {
      allowed = this.expectBoolean(
        transition,
        condition(subject, ...args),
      );
    }

    allowed =
      allowed &&
      this.allPass(
        subject,
        transition,
        this.hooks.enterStateChecks(transition.destination),
      ) &&
      this.allPass(
        subject,
        transition,
        this.hooks.exitStateChecks(currentState),
      );

    if (allowed) {
      return true;
    }

    if (raiseOnDeny) {
      throw new ForbiddenTransition(
        transition.name,
        currentState,
        transition.destination,
      );
    }
    return false;
  }

  private allPass(
    subject: TSubject,
    transition: Transition,
    checks: readonly StateCheck<TSubject>[],
  ): boolean {
    return checks.every((check) =>
      this.expectBoolean(transition, check(subject)),
    );
  }

  private expectBoolean(transition: Transition, result: unknown): boolean {
    if (typeof result !== 'boolean') {
      throw new Error(
        `Guard for transition ${transition.name} of workflow ${this.workflowId} must return a synchronous boolean value`,
      );
    }
    return result;
  }
}
