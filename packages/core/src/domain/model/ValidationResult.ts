import type { FailureCode } from './ValidationFailure.js';

/** A rendered error for one field of a bound tree. */
export interface FieldError {
  /** Full name of the field that failed validation (`''` for the root). */
  readonly field: string;
  /** Rendered error message. */
  readonly message: string;
  /** Machine-readable error code. */
  readonly code: FailureCode;
  /** The value that caused the validation failure. */
  readonly value?: unknown;
}

/** Result of validating a bound tree. */
export interface ValidationResult {
  readonly isValid: boolean;
  readonly errors: readonly FieldError[];
  /** The root's clean data; present only when the tree is valid. */
  readonly parsed?: unknown;
}

/** Create a passing validation result carrying the clean data. */
export function validResult(parsed?: unknown): ValidationResult {
  return parsed !== undefined ? { isValid: true, errors: [], parsed } : { isValid: true, errors: [] };
}

/** Create a failing validation result with the given errors. */
export function invalidResult(errors: readonly FieldError[]): ValidationResult {
  return { isValid: false, errors };
}

/** Group error messages by field full name, preserving order. */
export function errorsByField(errors: readonly FieldError[]): Map<string, string[]> {
  const grouped = new Map<string, string[]>();
  for (const error of errors) {
    const messages = grouped.get(error.field) ?? [];
    messages.push(error.message);
    grouped.set(error.field, messages);
  }
  return grouped;
}

/** Filter out the aggregate "has invalid fields" errors of containers, keeping the errors that point at data. */
export function withoutAggregateErrors(errors: readonly FieldError[]): readonly FieldError[] {
  return errors.filter((error) => error.code !== 'INVALID_CHILDREN');
}
