import type { ZodIssue } from 'zod';

/**
 * Unrecoverable startup misconfiguration (bad config file, unknown timezone).
 */
export class ConfigurationError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigurationError';
  }
}

/**
 * The task store could not be read for a bulk load.
 */
export class StoreUnavailableError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'StoreUnavailableError';
  }
}

/**
 * A recurrence expression was rejected by the trigger engine's grammar.
 */
export class InvalidExpressionError extends Error {
  constructor(public readonly expression: string, reason: string, options?: ErrorOptions) {
    super(`Invalid cron expression "${expression}": ${reason}`, options);
    this.name = 'InvalidExpressionError';
  }
}

export class TaskNotFoundError extends Error {
  constructor(public readonly taskId: string) {
    super(`Task not found: ${taskId}`);
    this.name = 'TaskNotFoundError';
  }
}

/**
 * Task input failed validation before anything was persisted.
 */
export class InvalidTaskError extends Error {
  constructor(public readonly issues: ZodIssue[]) {
    super(`Invalid task: ${issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ')}`);
    this.name = 'InvalidTaskError';
  }
}

/**
 * Registration of a freshly created task failed and deleting the record again
 * failed too. The store may now hold a task that has no trigger.
 */
export class CompensationFailureError extends Error {
  constructor(
    public readonly taskId: string,
    public readonly registrationError: unknown,
    compensationError: unknown
  ) {
    super(
      `Failed to register task ${taskId} (${errorMessage(registrationError)}) ` +
        `and failed to delete it afterwards (${errorMessage(compensationError)})`,
      { cause: compensationError }
    );
    this.name = 'CompensationFailureError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
