import {
  WILDCARD_STATE,
  type WorkflowDefinition,
  type WorkflowSubject,
} from '../interfaces/workflow-definition.interface';

function toStates(source: string | readonly string[]): readonly string[] {
  return typeof source === 'string' ? [source] : source;
}

function assertKeys(
  workflowId: string,
  keys: Iterable<string>,
  known: ReadonlySet<string>,
  what: string,
): void {
  for (const key of keys) {
    if (!known.has(key)) {
      throw new Error(
        `Workflow definition ${workflowId}: ${what} references unknown name "${key}"`,
      );
    }
  }
}

export function validateWorkflowDefinition<TSubject extends WorkflowSubject>(
  definition: WorkflowDefinition<TSubject>,
): void {
  if (!definition.id || typeof definition.id !== 'string') {
    throw new Error('Workflow definition id must be a non-empty string');
  }

  if (definition.states.length === 0) {
    throw new Error(
      `Workflow definition ${definition.id}: at least one state must be declared`,
    );
  }

  const states = new Set<string>();
  for (const state of definition.states) {
    if (state === WILDCARD_STATE) {
      throw new Error(
        `Workflow definition ${definition.id}: "${WILDCARD_STATE}" cannot be declared as a state`,
      );
    }
    if (states.has(state)) {
      throw new Error(
        `Workflow definition ${definition.id}: state "${state}" is declared twice`,
      );
    }
    states.add(state);
  }

  if (
    definition.initialState !== undefined &&
    !states.has(definition.initialState)
  ) {
    throw new Error(
      `Workflow definition ${definition.id}: initial state "${definition.initialState}" does not exist`,
    );
  }

  const transitionNames = new Set<string>();
  for (const transition of definition.transitions) {
    if (transitionNames.has(transition.name)) {
      throw new Error(
        `Workflow definition ${definition.id}: transition "${transition.name}" is declared twice`,
      );
    }
    transitionNames.add(transition.name);

    if (!states.has(transition.destination)) {
      throw new Error(
        `Workflow definition ${definition.id}: transition "${transition.name}" targets unknown state "${transition.destination}"`,
      );
    }

    if (transition.source === WILDCARD_STATE) continue;

    const sources = toStates(transition.source);
    if (sources.length === 0) {
      throw new Error(
        `Workflow definition ${definition.id}: transition "${transition.name}" has no source state`,
      );
    }
    for (const source of sources) {
      if (!states.has(source)) {
        throw new Error(
          `Workflow definition ${definition.id}: transition "${transition.name}" starts from unknown state "${source}"`,
        );
      }
    }
  }

  const hooks = definition.hooks ?? {};
  const keyed: Array<[Record<string, unknown>, ReadonlySet<string>, string]> = [
    [hooks.conditions ?? {}, transitionNames, 'conditions'],
    [hooks.before ?? {}, transitionNames, 'before hooks'],
    [hooks.after ?? {}, transitionNames, 'after hooks'],
    [hooks.onEnter ?? {}, states, 'onEnter hooks'],
    [hooks.onExit ?? {}, states, 'onExit hooks'],
  ];
  for (const [table, known, what] of keyed) {
    assertKeys(definition.id, Object.keys(table), known, what);
  }

  assertKeys(
    definition.id,
    Object.keys(definition.implementations ?? {}),
    transitionNames,
    'implementations',
  );
  assertKeys(
    definition.id,
    Object.values(definition.events ?? {}),
    transitionNames,
    'events',
  );

  for (const binding of definition.bindings ?? []) {
    assertKeys(
      definition.id,
      binding.states,
      states,
      `${binding.kind} binding`,
    );
  }
}
