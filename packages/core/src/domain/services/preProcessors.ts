import type { PreProcessor } from '../model/Validator.js';

/** Default pre-processor of every schema. */
export const identity: PreProcessor = (raw) => raw;

/** Trim surrounding whitespace from string input; other values pass through. */
export const trimStrings: PreProcessor = (raw) => (typeof raw === 'string' ? raw.trim() : raw);

/** Treat an empty string as missing input. */
export const emptyToUndefined: PreProcessor = (raw) => (raw === '' ? undefined : raw);

/**
 * Split a delimited string into trimmed, non-empty items so a single form
 * input (e.g. `"red, green"`) can be bound by a sequence schema.
 */
export function splitString(separator = ',', itemTransform?: (item: string) => string): PreProcessor {
  return (raw) => {
    if (typeof raw !== 'string') return raw;
    const items = raw
      .split(separator)
      .map((s) => s.trim())
      .filter((s) => s !== '');
    return itemTransform ? items.map(itemTransform) : items;
  };
}

/** Apply pre-processors left to right. */
export function composePreProcessors(...preProcessors: readonly PreProcessor[]): PreProcessor {
  return (raw) => preProcessors.reduce<unknown>((value, preProcessor) => preProcessor(value), raw);
}
