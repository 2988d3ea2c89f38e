export interface WorkflowTransitionEvent {
  workflowType: string;
  transition: string;
  fromState: string;
  toState: string;
  label: string | null;
  params: readonly unknown[];
  timestamp: Date;
}

export interface WorkflowRolledBackEvent {
  workflowType: string;
  subjectId: string;
  /** State the subject was reset to */
  state: string;
  /** State the failed run had reached */
  failedState: string;
  error: string;
  timestamp: Date;
}
