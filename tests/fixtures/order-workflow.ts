import {
  onEnterStateCheck,
  onExitStateCheck,
} from '../../src/engines/hook-bindings';
import type {
  WorkflowDefinition,
  WorkflowSubject,
} from '../../src/interfaces/workflow-definition.interface';

export class Order implements WorkflowSubject {
  saves = 0;
  calls: string[] = [];
  allowSubmit = true;
  allowLeavingDraft = true;
  allowEnteringSubmitted = true;
  submittedAt?: Date;

  constructor(public state = 'draft') {}

  persist(): void {
    this.saves += 1;
    this.calls.push(`persist:${this.state}`);
  }
}

export const orderWorkflow: WorkflowDefinition<Order> = {
  id: 'order',
  states: ['draft', 'submitted', 'completed', 'rejected'],
  transitions: [
    {
      name: 'submit',
      source: 'draft',
      destination: 'submitted',
      dateField: 'submittedAt',
    },
    {
      name: 'complete',
      source: 'submitted',
      destination: 'completed',
      label: 'Complete order',
    },
    { name: 'reject', source: '*', destination: 'rejected' },
  ],
  implementations: {
    submit: (order, ...args) => {
      order.calls.push(`submit:${order.state}:${args.length}`);
      return 'submitted-result';
    },
  },
  hooks: {
    conditions: {
      submit: (order) => order.allowSubmit,
      reject: (order) => order.state !== 'rejected',
    },
    before: {
      submit: (order) => {
        order.calls.push(`before:submit:${order.state}`);
      },
    },
    after: {
      submit: (order, result) => {
        order.calls.push(`after:submit:${String(result)}`);
      },
    },
    onEnter: {
      submitted: (order, transition) => {
        order.calls.push(`enter:submitted:${transition.name}:${order.state}`);
      },
    },
    onExit: {
      draft: (order) => {
        order.calls.push(`exit:draft:${order.state}`);
      },
    },
  },
  bindings: [
    onExitStateCheck('draft', (order: Order) => order.allowLeavingDraft),
    onEnterStateCheck(
      'submitted',
      (order: Order) => order.allowEnteringSubmitted,
    ),
  ],
  events: { 'order.approved': 'complete' },
  auditLogging: true,
};
