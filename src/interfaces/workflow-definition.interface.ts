export const WILDCARD_STATE = '*';

/** Anything the engine can drive: a state field plus a save operation. */
export interface WorkflowSubject {
  persist(): void;
}

export interface TransitionDescriptor {
  name: string;
  /** One state, several states, or `'*'` for any state. */
  source: string | readonly string[];
  destination: string;
  /** Subject field stamped with the transition time. */
  dateField?: string;
  label?: string;
}

export type TransitionSource =
  | { kind: 'any' }
  | { kind: 'specific'; states: ReadonlySet<string> };

export interface Transition {
  readonly name: string;
  readonly source: TransitionSource;
  readonly destination: string;
  readonly dateField?: string;
  readonly label?: string;
}

// Declared as methods so that a definition written for a concrete subject
// type stays assignable to `WorkflowDefinition<WorkflowSubject>`.
interface HookSignatures<TSubject> {
  body(subject: TSubject, ...args: unknown[]): unknown;
  condition(subject: TSubject, ...args: unknown[]): boolean;
  before(subject: TSubject, ...args: unknown[]): void;
  after(subject: TSubject, result: unknown): void;
  stateCheck(subject: TSubject): boolean;
  stateHook(subject: TSubject, transition: Transition): void;
}

export type TransitionBody<TSubject> = HookSignatures<TSubject>['body'];
export type TransitionCondition<TSubject> =
  HookSignatures<TSubject>['condition'];
export type BeforeTransitionHook<TSubject> = HookSignatures<TSubject>['before'];
export type AfterTransitionHook<TSubject> = HookSignatures<TSubject>['after'];
export type StateCheck<TSubject> = HookSignatures<TSubject>['stateCheck'];
export type StateHook<TSubject> = HookSignatures<TSubject>['stateHook'];

/**
 * Hooks resolved by name. `conditions`, `before` and `after` are keyed by
 * transition name, `onEnter` and `onExit` by state.
 */
export interface WorkflowHooks<TSubject> {
  conditions?: Record<string, TransitionCondition<TSubject>>;
  before?: Record<string, BeforeTransitionHook<TSubject>>;
  after?: Record<string, AfterTransitionHook<TSubject>>;
  onEnter?: Record<string, StateHook<TSubject>>;
  onExit?: Record<string, StateHook<TSubject>>;
}

export type HookBinding<TSubject> =
  | {
      kind: 'enter-state-check' | 'exit-state-check';
      states: readonly string[];
      fn: StateCheck<TSubject>;
    }
  | {
      kind: 'enter-state' | 'exit-state';
      states: readonly string[];
      fn: StateHook<TSubject>;
    };

export type HookBindingKind = HookBinding<unknown>['kind'];

export interface WorkflowDefinition<
  TSubject extends WorkflowSubject = WorkflowSubject,
> {
  id: string;
  states: readonly string[];
  /** Defaults to the first declared state. */
  initialState?: string;
  /** Name of the subject field holding the state. Default: `'state'` */
  stateField?: string;
  transitions: readonly TransitionDescriptor[];
  /** Transition bodies keyed by transition name. */
  implementations?: Record<string, TransitionBody<TSubject>>;
  hooks?: WorkflowHooks<TSubject>;
  bindings?: readonly HookBinding<TSubject>[];
  /** External event name -> transition name. */
  events?: Record<string, string>;
  auditLogging?: boolean;
}
