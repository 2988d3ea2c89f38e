import { DynamicModule, Module, Provider } from '@nestjs/common';
import { DiscoveryModule } from '@nestjs/core';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { WorkflowManager } from './services/workflow-manager.service';
import { WorkflowRegistry } from './services/workflow-registry.service';
import {
  ResolvedWorkflowModuleOptions,
  WorkflowModuleAsyncOptions,
  WorkflowModuleOptions,
} from './interfaces/workflow-module-options.interface';
import {
  WORKFLOW_MODULE_OPTIONS,
  WORKFLOW_AUDIT_ADAPTER,
  WORKFLOW_EVENT_MANAGERS,
  DEFAULT_MAX_ADVANCE_STEPS,
} from './workflow.constants';

const RAW_OPTIONS = Symbol('WORKFLOW_RAW_OPTIONS');

function resolveOptions(
  options: WorkflowModuleOptions,
): ResolvedWorkflowModuleOptions {
  return {
    emitEvents: options.emitEvents ?? true,
    maxAdvanceSteps: options.maxAdvanceSteps ?? DEFAULT_MAX_ADVANCE_STEPS,
  };
}

const derivedProviders: Provider[] = [
  {
    provide: WORKFLOW_MODULE_OPTIONS,
    useFactory: (options: WorkflowModuleOptions) => resolveOptions(options),
    inject: [RAW_OPTIONS],
  },
  {
    provide: WORKFLOW_AUDIT_ADAPTER,
    useFactory: (options: WorkflowModuleOptions) => options.adapter,
    inject: [RAW_OPTIONS],
  },
  {
    provide: WORKFLOW_EVENT_MANAGERS,
    useFactory: (options: WorkflowModuleOptions) => options.eventManagers ?? [],
    inject: [RAW_OPTIONS],
  },
  WorkflowRegistry,
  WorkflowManager,
];

const exportedProviders = [
  WorkflowManager,
  WorkflowRegistry,
  WORKFLOW_AUDIT_ADAPTER,
];

@Module({})
export class WorkflowModule {
  static forRoot(options: WorkflowModuleOptions): DynamicModule {
    return {
      module: WorkflowModule,
      imports: [DiscoveryModule, EventEmitterModule.forRoot()],
      providers: [
        { provide: RAW_OPTIONS, useValue: options },
        ...derivedProviders,
      ],
      exports: exportedProviders,
      global: true,
    };
  }

  static forRootAsync(options: WorkflowModuleAsyncOptions): DynamicModule {
    return {
      module: WorkflowModule,
      imports: [
        DiscoveryModule,
        EventEmitterModule.forRoot(),
        ...(options.imports ?? []),
      ],
      providers: [
        {
          provide: RAW_OPTIONS,
          useFactory: options.useFactory,
          inject: options.inject ?? [],
        },
        ...derivedProviders,
      ],
      exports: exportedProviders,
      global: true,
    };
  }
}
