/**
 * Converts a PascalCase class name to the snake_case name a workflow type is
 * registered under, without a trailing `Workflow`.
 * E.g., "OrderWorkflow" -> "order", "PurchaseRequestWorkflow" -> "purchase_request"
 */
export function deriveWorkflowName(className: string): string {
  const base = className.replace(/Workflow$/, '') || className;

  return base
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1_$2')
    .toLowerCase();
}
