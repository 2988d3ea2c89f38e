import { Test, TestingModule } from '@nestjs/testing';
import { Injectable } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { WorkflowModule } from '../../src/workflow.module';
import { WorkflowRegistry } from '../../src/services/workflow-registry.service';
import { WorkflowManager } from '../../src/services/workflow-manager.service';
import { WorkflowType } from '../../src/decorators/workflow-type.decorator';
import { WorkflowEventType } from '../../src/events/workflow-event-type.enum';
import {
  WORKFLOW_AUDIT_ADAPTER,
  WORKFLOW_MODULE_OPTIONS,
} from '../../src/workflow.constants';
import { Order, orderWorkflow } from '../fixtures/order-workflow';
import { createMockAdapter } from '../helpers';

@WorkflowType({ definition: orderWorkflow })
@Injectable()
class OrderWorkflow {}

@WorkflowType({ name: 'custom_order', definition: orderWorkflow })
@Injectable()
class CustomOrderWorkflow {}

describe('WorkflowModule integration', () => {
  let module: TestingModule;

  afterEach(async () => {
    if (module) {
      await module.close();
    }
  });

  it('should bootstrap with forRoot and register decorated workflow types', async () => {
    module = await Test.createTestingModule({
      imports: [
        WorkflowModule.forRoot({
          adapter: createMockAdapter(),
        }),
      ],
      providers: [OrderWorkflow, CustomOrderWorkflow],
    }).compile();

    await module.init();

    const registry = module.get<WorkflowRegistry>(WorkflowRegistry);

    const orderReg = registry.get('order');
    expect(orderReg).toBeDefined();
    expect(orderReg!.auditTable).toBe('order_transitions');
    expect(orderReg!.definition).toBe(orderWorkflow);
    expect(orderReg!.targetClass).toBe(OrderWorkflow);

    const customReg = registry.get('custom_order');
    expect(customReg).toBeDefined();
    expect(customReg!.auditTable).toBe('custom_order_transitions');
  });

  it('should resolve default options', async () => {
    module = await Test.createTestingModule({
      imports: [WorkflowModule.forRoot({ adapter: createMockAdapter() })],
    }).compile();

    expect(module.get(WORKFLOW_MODULE_OPTIONS)).toEqual({
      emitEvents: true,
      maxAdvanceSteps: 100,
    });
  });

  it('should work with forRootAsync', async () => {
    const adapter = createMockAdapter();

    module = await Test.createTestingModule({
      imports: [
        WorkflowModule.forRootAsync({
          useFactory: () => ({
            adapter,
            emitEvents: false,
            maxAdvanceSteps: 10,
          }),
        }),
      ],
      providers: [OrderWorkflow],
    }).compile();

    await module.init();

    expect(module.get(WORKFLOW_AUDIT_ADAPTER)).toBe(adapter);
    expect(module.get(WORKFLOW_MODULE_OPTIONS)).toEqual({
      emitEvents: false,
      maxAdvanceSteps: 10,
    });
    expect(module.get<WorkflowRegistry>(WorkflowRegistry).get('order')).toBeDefined();
  });

  it('should execute transitions through the fully wired module', async () => {
    const adapter = createMockAdapter();

    module = await Test.createTestingModule({
      imports: [WorkflowModule.forRoot({ adapter })],
      providers: [OrderWorkflow],
    }).compile();

    await module.init();

    const listener = jest.fn();
    module.get(EventEmitter2).on(WorkflowEventType.TRANSITION, listener);

    const manager = module.get<WorkflowManager>(WorkflowManager);
    const order = new Order();
    const result = await manager.execute({
      type: 'order',
      subjectId: 'order-1',
      subject: order,
      transition: 'submit',
    });

    expect(result.state).toBe('submitted');
    expect(adapter.transaction).toHaveBeenCalledTimes(1);
    expect(adapter.insertAuditRecord).toHaveBeenCalledWith('order_transitions', {
      subjectId: 'order-1',
      transition: 'submit',
      fromState: 'draft',
      toState: 'submitted',
      params: [],
    });
    expect(listener).toHaveBeenCalledTimes(1);
  });
});
