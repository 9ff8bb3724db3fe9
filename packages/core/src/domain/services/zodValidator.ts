import type { ZodTypeAny, output } from 'zod';
import type { Validator } from '../model/Validator.js';
import { ValidationFailure, deferMessage, type MessageInput } from '../model/ValidationFailure.js';

/**
 * Adapt a zod schema to the validator contract.
 *
 * The parsed output becomes the clean data; the first zod issue is exposed to
 * the message template as `{issue}`.
 */
export function fromZod<S extends ZodTypeAny>(schema: S, message?: MessageInput): Validator<output<S>> {
  return (value) => {
    const result = schema.safeParse(value);
    if (result.success) return result.data;
    const issue = result.error.issues[0]?.message ?? 'Invalid input';
    throw new ValidationFailure(deferMessage(message, '{field.name}: {issue}', { issue }), value, 'CUSTOM_VALIDATION');
  };
}
