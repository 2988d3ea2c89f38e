export const WORKFLOW_MODULE_OPTIONS = Symbol('WORKFLOW_MODULE_OPTIONS');
export const WORKFLOW_AUDIT_ADAPTER = Symbol('WORKFLOW_AUDIT_ADAPTER');
export const WORKFLOW_EVENT_MANAGERS = Symbol('WORKFLOW_EVENT_MANAGERS');
export const WORKFLOW_TYPE_METADATA = 'workflow:type';

export const DEFAULT_STATE_FIELD = 'state';
export const DEFAULT_MAX_ADVANCE_STEPS = 100;
export const AUDIT_TABLE_SUFFIX = '_transitions';
