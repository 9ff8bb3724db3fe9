import type { BoundField } from '../model/BoundField.js';
import {
  invalidResult,
  validResult,
  type FieldError,
  type ValidationResult,
} from '../model/ValidationResult.js';

/**
 * List the errors of a field and all its descendants, parents before children.
 * Fields that have not been validated contribute nothing.
 */
export function collectErrors(field: BoundField): FieldError[] {
  const errors: FieldError[] = [];
  visit(field, errors);
  return errors;
}

/** Validate a bound tree (if not done yet) and summarize it. */
export function toResult(field: BoundField): ValidationResult {
  if (field.validate()) {
    return validResult(field.cleanData);
  }
  return invalidResult(collectErrors(field));
}

function visit(field: BoundField, errors: FieldError[]): void {
  const failure = field.failure;
  const message = field.error;
  if (failure !== null && message !== null) {
    errors.push({ field: field.fullName, message, code: failure.code, value: failure.value });
  }
  for (const child of field.children()) {
    visit(child, errors);
  }
}
