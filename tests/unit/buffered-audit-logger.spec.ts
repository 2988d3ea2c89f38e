import { BufferedAuditLogger } from '../../src/audit/buffered-audit.logger';
import { Order } from '../fixtures/order-workflow';

describe('BufferedAuditLogger', () => {
  it('should drain buffered entries as audit rows for the subject', () => {
    const logger = new BufferedAuditLogger('order-1');
    const order = new Order();

    logger.log({
      transition: 'submit',
      fromState: 'draft',
      toState: 'submitted',
      label: null,
      params: ['note'],
      subject: order,
    });
    logger.log({
      transition: 'complete',
      fromState: 'submitted',
      toState: 'completed',
      label: 'Complete order',
      params: [],
      subject: order,
    });

    expect(logger.size).toBe(2);
    expect(logger.drain()).toEqual([
      {
        subjectId: 'order-1',
        transition: 'submit',
        fromState: 'draft',
        toState: 'submitted',
        params: ['note'],
      },
      {
        subjectId: 'order-1',
        transition: 'complete',
        fromState: 'submitted',
        toState: 'completed',
        params: [],
      },
    ]);
    expect(logger.size).toBe(0);
    expect(logger.drain()).toEqual([]);
  });
});
