import { DiscoveryService, Reflector } from '@nestjs/core';
import { WorkflowRegistry } from '../src/services/workflow-registry.service';
import { IWorkflowAuditAdapter } from '../src/interfaces/workflow-audit-adapter.interface';

export const FIXED_NOW = new Date('2025-03-01T10:00:00.000Z');

export function createSilentLogger() {
  return {
    log: jest.fn(),
    error: jest.fn(),
    warn: jest.fn(),
    debug: jest.fn(),
    verbose: jest.fn(),
  };
}

export function createRegistry(): WorkflowRegistry {
  const mockDiscovery = {
    getProviders: () => [],
  } as unknown as DiscoveryService;
  const mockReflector = { get: () => undefined } as unknown as Reflector;
  return new WorkflowRegistry(mockDiscovery, mockReflector);
}

export function createMockAdapter(): IWorkflowAuditAdapter {
  const adapter: IWorkflowAuditAdapter = {
    insertAuditRecord: jest.fn().mockResolvedValue(undefined),
    findBySubject: jest.fn().mockResolvedValue([]),
    transaction: jest.fn().mockImplementation(async (cb) => cb(adapter)),
  };
  return adapter;
}

export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw');
}
