import type {
  AfterTransitionHook,
  BeforeTransitionHook,
  HookBinding,
  StateCheck,
  StateHook,
  TransitionBody,
  TransitionCondition,
  WorkflowDefinition,
  WorkflowSubject,
} from '../interfaces/workflow-definition.interface';

type StateIndex<T> = ReadonlyMap<string, readonly T[]>;
type ByName<T> = ReadonlyMap<string, T>;

function indexByState<TSubject, T>(
  bindings: readonly HookBinding<TSubject>[],
  select: (binding: HookBinding<TSubject>) => T | undefined,
  convention: Record<string, T> = {},
): StateIndex<T> {
  const index = new Map<string, T[]>();
  const add = (state: string, fn: T) => {
    const list = index.get(state);
    if (list) {
      list.push(fn);
    } else {
      index.set(state, [fn]);
    }
  };

  for (const binding of bindings) {
    const fn = select(binding);
    if (fn === undefined) continue;
    for (const state of binding.states) {
      add(state, fn);
    }
  }

  // Named hooks (onEnter.submitted, ...) run after the tagged ones.
  for (const [state, fn] of Object.entries(convention)) {
    add(state, fn);
  }

  return index;
}

function toMap<T>(record: Record<string, T> = {}): ByName<T> {
  return new Map(Object.entries(record));
}

/**
 * Per-instance index of every guard and hook a workflow declares. Built once
 * at construction; lookups return the functions in declaration order.
 */
export class HookRegistry<TSubject extends WorkflowSubject> {
  private readonly enterChecks: StateIndex<StateCheck<TSubject>>;
  private readonly exitChecks: StateIndex<StateCheck<TSubject>>;
  private readonly enterHooks: StateIndex<StateHook<TSubject>>;
  private readonly exitHooks: StateIndex<StateHook<TSubject>>;
  private readonly conditions: ByName<TransitionCondition<TSubject>>;
  private readonly beforeHooks: ByName<BeforeTransitionHook<TSubject>>;
  private readonly afterHooks: ByName<AfterTransitionHook<TSubject>>;
  private readonly bodies: ByName<TransitionBody<TSubject>>;

  constructor(definition: WorkflowDefinition<TSubject>) {
    const bindings = definition.bindings ?? [];
    const hooks = definition.hooks ?? {};

    this.enterChecks = indexByState(bindings, (b) =>
      b.kind === 'enter-state-check' ? b.fn : undefined,
    );
    this.exitChecks = indexByState(bindings, (b) =>
      b.kind === 'exit-state-check' ? b.fn : undefined,
    );
    this.enterHooks = indexByState(
      bindings,
      (b) => (b.kind === 'enter-state' ? b.fn : undefined),
      hooks.onEnter,
    );
    this.exitHooks = indexByState(
      bindings,
      (b) => (b.kind === 'exit-state' ? b.fn : undefined),
      hooks.onExit,
    );
    this.conditions = toMap(hooks.conditions);
    this.beforeHooks = toMap(hooks.before);
    this.afterHooks = toMap(hooks.after);
    this.bodies = toMap(definition.implementations);
  }

  enterStateChecks(state: string): readonly StateCheck<TSubject>[] {
    return this.enterChecks.get(state) ?? [];
  }

  exitStateChecks(state: string): readonly StateCheck<TSubject>[] {
    return this.exitChecks.get(state) ?? [];
  }

  enterStateHooks(state: string): readonly StateHook<TSubject>[] {
    return this.enterHooks.get(state) ?? [];
  }

  exitStateHooks(state: string): readonly StateHook<TSubject>[] {
    return this.exitHooks.get(state) ?? [];
  }

  condition(transition: string): TransitionCondition<TSubject> | undefined {
    return this.conditions.get(transition);
  }

  before(transition: string): BeforeTransitionHook<TSubject> | undefined {
    return this.beforeHooks.get(transition);
  }

  after(transition: string): AfterTransitionHook<TSubject> | undefined {
    return this.afterHooks.get(transition);
  }

  body(transition: string): TransitionBody<TSubject> | undefined {
    return this.bodies.get(transition);
  }
}
