import type { StandardSchemaV1 } from '@standard-schema/spec';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when a decoded value does not fit its schema.
 */
export class ValidationError extends Error {
  /** ValidationError error-name */
  name = 'ValidationError';
  /** Schema issues reported by the validator */
  #issues: readonly StandardSchemaV1.Issue[];

  /** Creates a new instance of the ValidationError, with accompanying issues */
  constructor(message: string, issues: readonly StandardSchemaV1.Issue[], opts?: ErrorOptions) {
    const summary = issues.map(describeIssue).join('; ');
    super(summary ? `${message}: ${summary}` : message, opts);
    this.#issues = issues;
  }

  /** Schema issues reported by the validator */
  get issues(): readonly StandardSchemaV1.Issue[] {
    return this.#issues;
  }
}

function describeIssue(issue: StandardSchemaV1.Issue): string {
  const path = (issue.path ?? [])
    .map((segment) => String(typeof segment === 'object' ? segment.key : segment))
    .join('.');
  return path ? `${path}: ${issue.message}` : issue.message;
}

/**
 * Type guard for {@link ValidationError}.
 */
export function isValidationError(error: unknown): error is ValidationError {
  return isErrorType(ValidationError, error);
}

/**
 * Extract an {@link ValidationError} from an unknown error value, following nested causes.
 */
export function getValidationError(error: unknown): null | ValidationError {
  return unwrapErrorType(ValidationError, error);
}
