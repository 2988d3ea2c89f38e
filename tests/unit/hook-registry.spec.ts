import { HookRegistry } from '../../src/engines/hook-registry';
import {
  onEnterState,
  onEnterStateCheck,
  onExitState,
  onExitStateCheck,
} from '../../src/engines/hook-bindings';
import type {
  WorkflowDefinition,
  WorkflowSubject,
} from '../../src/interfaces/workflow-definition.interface';

const subject: WorkflowSubject = { persist: () => undefined };

const first = () => true;
const second = () => false;
const tagged = jest.fn();
const named = jest.fn();

const definition: WorkflowDefinition = {
  id: 'doc',
  states: ['draft', 'review', 'published'],
  transitions: [
    { name: 'send', source: 'draft', destination: 'review' },
    { name: 'publish', source: 'review', destination: 'published' },
  ],
  implementations: { publish: () => 'ok' },
  hooks: {
    conditions: { send: () => true },
    before: { send: jest.fn() },
    onEnter: { review: named },
  },
  bindings: [
    onEnterStateCheck(['review', 'published'], first),
    onEnterStateCheck('review', second),
    onExitStateCheck('draft', first),
    onEnterState('review', tagged),
    onExitState(['draft', 'review'], tagged),
  ],
};

describe('HookRegistry', () => {
  const registry = new HookRegistry(definition);

  it('should index state checks per state in declaration order', () => {
    expect(registry.enterStateChecks('review')).toEqual([first, second]);
    expect(registry.enterStateChecks('published')).toEqual([first]);
    expect(registry.exitStateChecks('draft')).toEqual([first]);
    expect(registry.exitStateChecks('review')).toEqual([]);
  });

  it('should put named state hooks after the tagged ones', () => {
    expect(registry.enterStateHooks('review')).toEqual([tagged, named]);
  });

  it('should expand multi-state bindings', () => {
    expect(registry.exitStateHooks('draft')).toEqual([tagged]);
    expect(registry.exitStateHooks('review')).toEqual([tagged]);
    expect(registry.exitStateHooks('published')).toEqual([]);
  });

  it('should resolve per-transition hooks by name', () => {
    expect(registry.condition('send')?.(subject)).toBe(true);
    expect(registry.condition('publish')).toBeUndefined();
    expect(registry.before('send')).toBe(definition.hooks?.before?.send);
    expect(registry.after('send')).toBeUndefined();
    expect(registry.body('publish')?.(subject)).toBe('ok');
    expect(registry.body('send')).toBeUndefined();
  });
});
