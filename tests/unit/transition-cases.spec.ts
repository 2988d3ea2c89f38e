import { transitionCases } from '../../src/testing/transition-cases';
import { Workflow } from '../../src/engines/workflow.engine';
import { Order, orderWorkflow } from '../fixtures/order-workflow';
import { createSilentLogger } from '../helpers';

describe('transitionCases', () => {
  it('should expand every declared source state', () => {
    expect(transitionCases(orderWorkflow)).toEqual([
      { transition: 'submit', source: 'draft', destination: 'submitted' },
      { transition: 'complete', source: 'submitted', destination: 'completed' },
      { transition: 'reject', source: 'draft', destination: 'rejected' },
      { transition: 'reject', source: 'submitted', destination: 'rejected' },
      { transition: 'reject', source: 'completed', destination: 'rejected' },
      { transition: 'reject', source: 'rejected', destination: 'rejected' },
    ]);
  });

  it('should skip ignored transitions', () => {
    expect(
      transitionCases(orderWorkflow, ['reject']).map((c) => c.transition),
    ).toEqual(['submit', 'complete']);
  });

  describe.each(transitionCases(orderWorkflow))(
    '$transition from $source',
    ({ transition, source, destination }) => {
      it(`should reach ${destination} or be forbidden`, () => {
        const order = new Order(source);
        const workflow = new Workflow(orderWorkflow, order, {
          logger: createSilentLogger(),
        });

        if (workflow.getAvailableTransition(transition)) {
          workflow.runTransition(transition);
          expect(order.state).toBe(destination);
        } else {
          expect(() => workflow.runTransition(transition)).toThrow(
            'Transition forbidden',
          );
          expect(order.state).toBe(source);
        }
      });
    },
  );
});
