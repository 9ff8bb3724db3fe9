import type { MessageParams } from '../model/ValidationFailure.js';
import { isRecord } from '../../utils/isRecord.js';

/** Turns a message template and its params into the final error string (e.g. through a translation catalogue). */
export type MessageRenderer = (template: string, params: MessageParams) => string;

const PLACEHOLDER = /\{([^{}]+)\}/g;

/**
 * Default renderer: replaces `{key}` and `{key.path}` placeholders with values from `params`.
 *
 * Arrays and sets render comma-separated. Placeholders with no matching value are left as-is.
 */
export const formatMessage: MessageRenderer = (template, params) =>
  template.replace(PLACEHOLDER, (placeholder: string, key: string) => {
    const value = lookup(params, key.trim());
    return value === undefined ? placeholder : stringify(value);
  });

function lookup(params: MessageParams, key: string): unknown {
  let current: unknown = params;
  for (const part of key.split('.')) {
    if (!isRecord(current) || !Object.hasOwn(current, part)) return undefined;
    current = current[part];
  }
  return current;
}

function stringify(value: unknown): string {
  if (Array.isArray(value)) return value.map((item) => String(item)).join(', ');
  if (value instanceof Set) return [...value].map((item) => String(item)).join(', ');
  return String(value);
}
