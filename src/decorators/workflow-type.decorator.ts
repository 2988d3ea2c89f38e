import { SetMetadata } from '@nestjs/common';
import { WORKFLOW_TYPE_METADATA } from '../workflow.constants';
import { deriveWorkflowName } from '../utils/derive-workflow-name';
import type { WorkflowDefinition } from '../interfaces/workflow-definition.interface';

export interface WorkflowTypeOptions {
  /** Registry name, also the audit table prefix. Derived from the class name if omitted. */
  name?: string;
  definition: WorkflowDefinition;
}

export interface WorkflowTypeMetadata {
  name: string;
  definition: WorkflowDefinition;
}

export function WorkflowType(options: WorkflowTypeOptions): ClassDecorator {
  return (target: Function) => {
    const metadata: WorkflowTypeMetadata = {
      name: options.name ?? deriveWorkflowName(target.name),
      definition: options.definition,
    };
    SetMetadata(WORKFLOW_TYPE_METADATA, metadata)(target);
  };
}
