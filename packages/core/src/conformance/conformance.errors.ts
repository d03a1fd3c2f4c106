import type { LintIssue } from '@herald/shared';

export class ConventionViolationError extends Error {
  constructor(
    readonly operation: string,
    readonly issues: LintIssue[],
  ) {
    super(
      `Refusing to ${operation}: payload breaks the message convention (${issues
        .map((i) => i.rule)
        .join(', ')})`,
    );
    this.name = 'ConventionViolationError';
  }
}
