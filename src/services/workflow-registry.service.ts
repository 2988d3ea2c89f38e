import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { DiscoveryService, Reflector } from '@nestjs/core';
import { DuplicateRegistrationError } from '../errors/duplicate-registration.error';
import { WorkflowNotRegisteredError } from '../errors/workflow-not-registered.error';
import {
  AUDIT_TABLE_SUFFIX,
  WORKFLOW_TYPE_METADATA,
} from '../workflow.constants';
import type { WorkflowTypeMetadata } from '../decorators/workflow-type.decorator';
import type { WorkflowDefinition } from '../interfaces/workflow-definition.interface';
import { validateWorkflowDefinition } from '../utils/validate-workflow-definition';

export interface RegisteredWorkflow {
  name: string;
  auditTable: string;
  definition: WorkflowDefinition;
  targetClass: Function;
}

@Injectable()
export class WorkflowRegistry implements OnModuleInit {
  private readonly logger = new Logger(WorkflowRegistry.name);
  private readonly registrations = new Map<string, RegisteredWorkflow>();

  constructor(
    private readonly discoveryService: DiscoveryService,
    private readonly reflector: Reflector,
  ) {}

  onModuleInit(): void {
    const providers = this.discoveryService.getProviders();
    for (const wrapper of providers) {
      const metatype = wrapper.metatype;
      if (!metatype) continue;

      const metadata = this.reflector.get<WorkflowTypeMetadata | undefined>(
        WORKFLOW_TYPE_METADATA,
        metatype,
      );

      if (metadata) {
        this.register(metadata.name, metadata.definition, metatype);
        this.logger.log(
          `Registered workflow type: ${metatype.name} -> ${metadata.name}`,
        );
      }
    }
  }

  register(
    name: string,
    definition: WorkflowDefinition,
    targetClass: Function,
  ): void {
    const existing = this.registrations.get(name);
    if (existing) {
      throw new DuplicateRegistrationError(
        name,
        existing.targetClass.name,
        targetClass.name,
      );
    }
    validateWorkflowDefinition(definition);
    this.registrations.set(name, {
      name,
      auditTable: `${name}${AUDIT_TABLE_SUFFIX}`,
      definition,
      targetClass,
    });
  }

  get(name: string): RegisteredWorkflow | undefined {
    return this.registrations.get(name);
  }

  getAll(): RegisteredWorkflow[] {
    return Array.from(this.registrations.values());
  }

  getOrThrow(name: string): RegisteredWorkflow {
    const registration = this.registrations.get(name);
    if (!registration) {
      throw new WorkflowNotRegisteredError(name);
    }
    return registration;
  }
}
