export interface TransitionRecord {
  transition: string;
  /** The exact state the subject left, never a wildcard. */
  fromState: string;
  toState: string;
  label: string | null;
  params: readonly unknown[];
}

export interface AuditLogEntry<TSubject = unknown> extends TransitionRecord {
  subject: TSubject;
}

export interface AuditRecord {
  id: string;
  subjectId: string;
  transition: string;
  fromState: string;
  toState: string;
  params: unknown[];
  transitionedAt: Date;
}

export interface NextState {
  state: string;
  transition: string;
  label: string | null;
}

export interface WorkflowRunResult {
  subjectId: string;
  /** State before the first transition of the run */
  fromState: string;
  /** Settled state */
  state: string;
  /** Names of the transitions executed, in order */
  transitions: string[];
  /** Value returned by the transition body, if any */
  result: unknown;
}
