import {
  WILDCARD_STATE,
  type Transition,
  type TransitionDescriptor,
  type TransitionSource,
} from '../interfaces/workflow-definition.interface';

function toSource(source: string | readonly string[]): TransitionSource {
  if (source === WILDCARD_STATE) {
    return { kind: 'any' };
  }
  return {
    kind: 'specific',
    states: new Set(typeof source === 'string' ? [source] : source),
  };
}

function toTransition(descriptor: TransitionDescriptor): Transition {
  return Object.freeze({
    name: descriptor.name,
    source: toSource(descriptor.source),
    destination: descriptor.destination,
    ...(descriptor.dateField !== undefined && {
      dateField: descriptor.dateField,
    }),
    ...(descriptor.label !== undefined && { label: descriptor.label }),
  });
}

export function matchesSource(transition: Transition, state: string): boolean {
  const source = transition.source;
  switch (source.kind) {
    case 'any':
      return true;
    case 'specific':
      return source.states.has(state);
    default: {
      const unreachable: never = source;
      throw new Error(`Unknown transition source ${String(unreachable)}`);
    }
  }
}

/**
 * Declared transitions of one workflow, in declaration order. Built once
 * from a validated definition and read-only afterwards.
 */
export class TransitionTable {
  private readonly transitions: readonly Transition[];
  private readonly byName: ReadonlyMap<string, Transition>;

  constructor(
    private readonly states: readonly string[],
    descriptors: readonly TransitionDescriptor[],
    private readonly configuredInitialState?: string,
  ) {
    this.transitions = Object.freeze(descriptors.map(toTransition));
    this.byName = new Map(this.transitions.map((t) => [t.name, t]));
  }

  all(): readonly Transition[] {
    return this.transitions;
  }

  transitionByName(name: string): Transition | undefined {
    return this.byName.get(name);
  }

  isTransition(name: string): boolean {
    return this.byName.has(name);
  }

  initialState(): string {
    return this.configuredInitialState ?? this.states[0];
  }

  matchesSource(transition: Transition, state: string): boolean {
    return matchesSource(transition, state);
  }

  /** Transitions leaving `state`, declaration order preserved. */
  from(state: string): Transition[] {
    return this.transitions.filter((t) => matchesSource(t, state));
  }
}
