import type {
  HookBinding,
  StateCheck,
  StateHook,
} from '../interfaces/workflow-definition.interface';

function toStates(state: string | readonly string[]): readonly string[] {
  return typeof state === 'string' ? [state] : [...state];
}

/**
 * Must return true before any transition entering `state` may run.
 *
 * @example
 * ```typescript
 * bindings: [
 *   onEnterStateCheck('launchpad', (rocket) => rocket.fuel > 10),
 * ]
 * ```
 */
export function onEnterStateCheck<TSubject>(
  state: string | readonly string[],
  fn: StateCheck<TSubject>,
): HookBinding<TSubject> {
  return { kind: 'enter-state-check', states: toStates(state), fn };
}

/** Must return true before any transition leaving `state` may run. */
export function onExitStateCheck<TSubject>(
  state: string | readonly string[],
  fn: StateCheck<TSubject>,
): HookBinding<TSubject> {
  return { kind: 'exit-state-check', states: toStates(state), fn };
}

/** Runs right after the subject has entered `state`. */
export function onEnterState<TSubject>(
  state: string | readonly string[],
  fn: StateHook<TSubject>,
): HookBinding<TSubject> {
  return { kind: 'enter-state', states: toStates(state), fn };
}

/** Runs before the transition body, while the subject is still in `state`. */
export function onExitState<TSubject>(
  state: string | readonly string[],
  fn: StateHook<TSubject>,
): HookBinding<TSubject> {
  return { kind: 'exit-state', states: toStates(state), fn };
}
