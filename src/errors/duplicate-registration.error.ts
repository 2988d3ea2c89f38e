export class DuplicateRegistrationError extends Error {
  constructor(
    public readonly workflowName: string,
    public readonly class1: string,
    public readonly class2: string,
  ) {
    super(
      `Duplicate workflow type "${workflowName}". ` +
        `Both ${class1} and ${class2} are registered under the same name.`,
    );
    this.name = 'DuplicateRegistrationError';
  }
}
