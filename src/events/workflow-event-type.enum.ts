export enum WorkflowEventType {
  TRANSITION = 'workflow.transition',
  ROLLED_BACK = 'workflow.rolled_back',
}
