import { Logger, type LoggerService } from '@nestjs/common';
import { CircularWorkflowError } from '../errors/circular-workflow.error';
import { InvalidTransition } from '../errors/invalid-transition.error';
import { TransitionAmbiguous } from '../errors/transition-ambiguous.error';
import { TransitionDoesNotExist } from '../errors/transition-does-not-exist.error';
import { TransitionNotFound } from '../errors/transition-not-found.error';
import { TransitionUnavailable } from '../errors/transition-unavailable.error';
import type {
  IAuditLogger,
  IEventManager,
  IUnitOfWork,
  WorkflowEngineOptions,
} from '../interfaces/workflow-collaborators.interface';
import type {
  Transition,
  WorkflowDefinition,
  WorkflowSubject,
} from '../interfaces/workflow-definition.interface';
import type {
  NextState,
  TransitionRecord,
} from '../interfaces/workflow-records.interface';
import { validateWorkflowDefinition } from '../utils/validate-workflow-definition';
import {
  DEFAULT_MAX_ADVANCE_STEPS,
  DEFAULT_STATE_FIELD,
} from '../workflow.constants';
import { GuardEvaluator } from './guard-evaluator';
import { HookRegistry } from './hook-registry';
import { TransitionTable } from './transition-table';

export type TransitionExecutor = (...args: unknown[]) => unknown;

export const immediateUnitOfWork: IUnitOfWork = {
  atomic: <T>(work: () => T): T => work(),
};

/**
 * Binds a workflow definition to one subject and drives it through the
 * declared transitions.
 *
 * A transition runs these steps, in order:
 *
 * 1. source check ({@link InvalidTransition})
 * 2. guards: condition, enter-state checks, exit-state checks
 *    ({@link ForbiddenTransition})
 * 3. `before` hook
 * 4. exit-state hooks of the current state
 * 5. transition body
 * 6. state update
 * 7. enter-state hooks of the destination
 * 8. `after` hook, with the body's result
 * 9. date stamp and `persist()`
 * 10. audit log, when enabled for the definition
 * 11. event managers
 *
 * Nothing is written to the subject before step 6. A failure after step 6
 * leaves the subject in the destination state; {@link Workflow.rollback}
 * only resets the state field and never undoes hook side effects.
 *
 * @example
 * ```typescript
 * const workflow = new Workflow(orderWorkflow, order);
 * workflow.runTransition('submit');
 * workflow.getNextAvailableStates();
 * // [{ state: 'completed', transition: 'complete', label: null }, ...]
 * ```
 */
export class Workflow<TSubject extends WorkflowSubject = WorkflowSubject> {
  private readonly logger: LoggerService;
  private readonly table: TransitionTable;
  private readonly hooks: HookRegistry<TSubject>;
  private readonly guards: GuardEvaluator<TSubject>;
  private readonly dispatch: ReadonlyMap<string, TransitionExecutor>;
  private readonly events: ReadonlyMap<string, string>;
  private readonly stateField: string;
  private readonly auditLogger?: IAuditLogger;
  private readonly eventManagers: readonly IEventManager[];
  private readonly unitOfWork: IUnitOfWork;
  private readonly clock: () => Date;

  constructor(
    public readonly definition: WorkflowDefinition<TSubject>,
    public readonly subject: TSubject,
    options: WorkflowEngineOptions = {},
  ) {
    validateWorkflowDefinition(definition);

    this.logger = options.logger ?? new Logger(`Workflow:${definition.id}`);
    this.auditLogger = options.auditLogger;
    this.eventManagers = options.eventManagers ?? [];
    this.unitOfWork = options.unitOfWork ?? immediateUnitOfWork;
    this.clock = options.clock ?? (() => new Date());
    this.stateField = definition.stateField ?? DEFAULT_STATE_FIELD;

    this.table = new TransitionTable(
      definition.states,
      definition.transitions,
      definition.initialState,
    );
    this.hooks = new HookRegistry(definition);
    this.guards = new GuardEvaluator(definition.id, this.hooks);
    this.events = new Map(Object.entries(definition.events ?? {}));
    this.dispatch = new Map(
      this.table
        .all()
        .map((transition): [string, TransitionExecutor] => [
          transition.name,
          (...args: unknown[]) => this.execute(transition, args),
        ]),
    );
  }

  get state(): string {
    const value: unknown = Reflect.get(this.subject, this.stateField);
    if (typeof value !== 'string') {
      throw new Error(
        `Workflow ${this.definition.id}: subject field "${this.stateField}" does not hold a state`,
      );
    }
    return value;
  }

  get initialState(): string {
    return this.table.initialState();
  }

  isTransition(name: string): boolean {
    return this.table.isTransition(name);
  }

  getAllTransitions(): readonly Transition[] {
    return this.table.all();
  }

  /** The bound executor of a declared transition. */
  transition(name: string): TransitionExecutor {
    const executor = this.dispatch.get(name);
    if (!executor) {
      throw new TransitionDoesNotExist(name);
    }
    return executor;
  }

  runTransition(name: string, ...args: unknown[]): unknown {
    return this.transition(name)(...args);
  }

  /**
   * Runs the transition mapped to an external event name. Unmapped events
   * are ignored.
   */
  processEvent(eventName: string, data?: unknown): unknown {
    const transitionName = this.events.get(eventName);
    if (transitionName === undefined) {
      return undefined;
    }
    return this.runTransition(transitionName, data);
  }

  /**
   * Puts the state field back to `previousState`. Hook side effects and
   * anything already persisted are the caller's to undo.
   */
  rollback(previousState: string, targetState: string, error?: unknown): void {
    const reason =
      error === undefined
        ? ''
        : `: ${error instanceof Error ? error.message : String(error)}`;
    this.logger.warn(
      `Rolling back ${this.stateField} from ${targetState} to ${previousState}${reason}`,
    );
    this.updateState(previousState);
  }

  /**
   * Transitions leaving `state` (default: the current state). With
   * `includeUnchecked` false, guards run without arguments and exit checks
   * are those of `state`, not of the subject's current state.
   */
  getAvailableTransitions(
    state?: string,
    includeUnchecked = true,
  ): Transition[] {
    const from = state ?? this.state;
    return this.table
      .from(from)
      .filter(
        (transition) =>
          includeUnchecked ||
          this.guards.checkTransition(
            this.subject,
            transition,
            from,
            [],
            false,
          ),
      );
  }

  getAvailableTransition(name: string, state?: string): Transition | undefined {
    return this.getAvailableTransitions(state, false).find(
      (transition) => transition.name === name,
    );
  }

  getNextAvailableStates(state?: string, includeUnchecked = true): NextState[] {
    return this.getAvailableTransitions(state, includeUnchecked).map(
      (transition) => ({
        state: transition.destination,
        transition: transition.name,
        label: transition.label ?? null,
      }),
    );
  }

  /** First declared transition from the current state reaching `targetState`. */
  getTransitionTo(targetState: string): TransitionExecutor {
    const state = this.state;
    const match = this.getAvailableTransitions(state).find(
      (transition) => transition.destination === targetState,
    );
    if (!match) {
      throw new TransitionNotFound(state, targetState);
    }
    return this.transition(match.name);
  }

  /** Runs the only transition whose guards pass from the current state. */
  advance(): unknown {
    return this.runTransition(this.nextTransition().name);
  }

  /**
   * Advances until no transition is eligible. Returns the names of the
   * transitions executed.
   */
  advanceToEnd(maxSteps = DEFAULT_MAX_ADVANCE_STEPS): string[] {
    const executed: string[] = [];
    while (this.getAvailableTransitions(undefined, false).length > 0) {
      if (executed.length >= maxSteps) {
        throw new CircularWorkflowError(this.state, executed.length);
      }
      const next = this.nextTransition();
      this.runTransition(next.name);
      executed.push(next.name);
    }
    return executed;
  }

  private nextTransition(): Transition {
    const state = this.state;
    const candidates = this.getAvailableTransitions(state, false);
    if (candidates.length === 0) {
      throw new TransitionUnavailable(state);
    }
    if (candidates.length > 1) {
      throw new TransitionAmbiguous(
        state,
        candidates.map((transition) => transition.name),
      );
    }
    return candidates[0];
  }

  private execute(transition: Transition, args: readonly unknown[]): unknown {
    return this.unitOfWork.atomic(() => {
      const fromState = this.state;

      this.preTransitionCheck(transition, fromState);
      this.guards.checkTransition(this.subject, transition, fromState, args);
      this.beforeTransition(transition, args);
      this.exitState(transition, fromState);
      const result = this.runBody(transition, args);

      this.updateState(transition.destination);

      this.enterState(transition);
      this.afterTransition(transition, result);
      this.finalize(transition);

      const record: TransitionRecord = Object.freeze({
        transition: transition.name,
        fromState,
        toState: transition.destination,
        label: transition.label ?? null,
        params: Object.freeze([...args]),
      });
      this.logAudit(record);
      this.createEvents(record);

      return result;
    });
  }

  private preTransitionCheck(transition: Transition, state: string): void {
    if (!this.table.matchesSource(transition, state)) {
      throw new InvalidTransition(
        transition.name,
        state,
        transition.destination,
      );
    }
  }

  private beforeTransition(
    transition: Transition,
    args: readonly unknown[],
  ): void {
    const hook = this.hooks.before(transition.name);
    if (!hook) return;

    this.logger.debug?.(`Before transition ${transition.name}`);
    hook(this.subject, ...args);
  }

  private exitState(transition: Transition, state: string): void {
    this.logger.debug?.(`Leaving ${this.stateField} ${state}`);
    for (const hook of this.hooks.exitStateHooks(state)) {
      hook(this.subject, transition);
    }
  }

  private runBody(transition: Transition, args: readonly unknown[]): unknown {
    const body = this.hooks.body(transition.name);
    return body ? body(this.subject, ...args) : undefined;
  }

  private updateState(value: string): void {
    this.logger.debug?.(`Updating subject ${this.stateField} to ${value}`);
    Reflect.set(this.subject, this.stateField, value);
  }

  private enterState(transition: Transition): void {
    const state = transition.destination;
    this.logger.debug?.(`Entering ${this.stateField} ${state}`);
    for (const hook of this.hooks.enterStateHooks(state)) {
      hook(this.subject, transition);
    }
  }

  private afterTransition(transition: Transition, result: unknown): void {
    const hook = this.hooks.after(transition.name);
    if (!hook) return;

    this.logger.debug?.(`After transition ${transition.name}`);
    hook(this.subject, result);
  }

  private finalize(transition: Transition): void {
    if (transition.dateField !== undefined) {
      Reflect.set(this.subject, transition.dateField, this.clock());
    }
    this.logger.debug?.('Persisting subject');
    this.subject.persist();
  }

  private logAudit(record: TransitionRecord): void {
    if (!this.definition.auditLogging || !this.auditLogger) return;

    this.auditLogger.log({ ...record, subject: this.subject });
  }

  private createEvents(record: TransitionRecord): void {
    for (const manager of this.eventManagers) {
      manager.pushEvent(record);
    }
  }
}
