import type { ValidationContext, Validator } from '../model/Validator.js';
import {
  ValidationFailure,
  deferMessage,
  type FailureCode,
  type MessageInput,
} from '../model/ValidationFailure.js';
import { isRecord, ownValue } from '../../utils/isRecord.js';

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;
const INTEGER_PATTERN = /^[+-]?\d+$/;
const DATE_TOKENS = /YYYY|MM|DD/g;

/** Passes data through unchanged. Default validator of leaf schemas. */
export const noop: Validator = (value) => value;

/** Pipe data through each validator in turn; the first failure stops the chain. */
export function chain(...validators: readonly Validator[]): Validator {
  return (value, context) => {
    let data = value;
    for (const validator of validators) {
      data = validator(data, context);
    }
    return data;
  };
}

/** Turn a boolean check into a validator that passes data through unchanged or fails with `message`. */
export function fromPredicate(
  predicate: (value: unknown, context: ValidationContext) => boolean,
  message: MessageInput,
  code: FailureCode = 'CUSTOM_VALIDATION',
): Validator {
  return (value, context) => {
    if (predicate(value, context)) return value;
    throw new ValidationFailure(message, value, code);
  };
}

/** Rejects `undefined` and `null`. */
export const required: Validator = fromPredicate(
  (value) => value !== undefined && value !== null,
  '{field.name} is required.',
  'REQUIRED',
);

export const ensureString: Validator<string> = (value) => {
  if (typeof value === 'string') return value;
  throw new ValidationFailure('{field.name} must be a string', value, 'TYPE_MISMATCH');
};

/** Accepts only mappings and sequences. */
export const ensureContainer: Validator = fromPredicate(
  (value) => isRecord(value) || Array.isArray(value),
  '{field.name} must be a container',
  'TYPE_MISMATCH',
);

export interface EnsureInstanceOptions {
  /** Type name used in the message. Default: the constructor's name. */
  readonly label?: string;
  readonly message?: MessageInput;
}

/** Ensure the data is an instance of the given class. */
export function ensureInstance(
  ctor: abstract new (...args: never[]) => unknown,
  options?: EnsureInstanceOptions,
): Validator {
  const message = deferMessage(options?.message, '{field.name} must be a {type}', {
    type: options?.label ?? ctor.name,
  });
  return fromPredicate((value) => value instanceof ctor, message, 'TYPE_MISMATCH');
}

export interface LimitLengthOptions {
  /** Default: `0`. */
  readonly min?: number;
  /** No upper bound when omitted. */
  readonly max?: number;
  readonly message?: MessageInput;
}

/** Ensure the length of a string or sequence is between `min` and `max`. */
export function limitLength(options: LimitLengthOptions): Validator {
  const min = options.min ?? 0;
  const max = options.max;
  const message =
    max === undefined
      ? deferMessage(options.message, 'The length of {field.name} must be at least {min}', { min })
      : deferMessage(options.message, 'The length of {field.name} must be between {min} and {max}', { min, max });

  return fromPredicate(
    (value) => {
      const length = lengthOf(value);
      if (length === undefined) return false;
      return length >= min && (max === undefined || length <= max);
    },
    message,
    'LENGTH',
  );
}

/** Ensure the data is a string containing a match for `pattern`. Anchor the pattern to match the whole string. */
export function fromRegex(pattern: string | RegExp, message?: MessageInput): Validator<string> {
  // Global and sticky flags would make `test()` stateful across calls.
  const regex =
    typeof pattern === 'string' ? new RegExp(pattern) : new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ''));
  const deferred = deferMessage(message, '{field.name} does not match {pattern}', { pattern: regex.source });

  return (value, context) => {
    const text = ensureString(value, context);
    if (regex.test(text)) return text;
    throw new ValidationFailure(deferred, value, 'PATTERN_MISMATCH');
  };
}

/** Ensure the data is one of the given values. */
export function oneOf(values: readonly unknown[], message?: MessageInput): Validator {
  const deferred = deferMessage(message, '{field.name} must be one of {values}.', { values });
  return fromPredicate((value) => values.includes(value), deferred, 'CHOICE');
}

/**
 * Ensure a string only contains characters of a regex character class (e.g. `'a-z0-9_'`).
 *
 * The rendered message lists each offending character once, as `{invalidChars}`.
 */
export function limitChars(charClass: string, message?: MessageInput): Validator<string> {
  const outside = new RegExp(`[^${charClass.replace(/]/g, '\\]')}]`, 'g');

  return (value, context) => {
    const text = ensureString(value, context);
    const found = text.match(outside);
    if (found === null) return text;
    const deferred = deferMessage(message, 'Invalid characters: {invalidChars}', {
      invalidChars: [...new Set(found)],
      charClass,
    });
    throw new ValidationFailure(deferred, value, 'INVALID_CHARS');
  };
}

/** Ensure two keys of a mapping hold the same value (e.g. password confirmation). Chain after `allChildren`. */
export function keyMatcher(key1: string, key2: string, message?: MessageInput): Validator {
  const deferred = deferMessage(message, '{field.name}[{key1}] does not equal {field.name}[{key2}]', { key1, key2 });
  return fromPredicate(
    (value) => isRecord(value) && ownValue(value, key1) === ownValue(value, key2),
    deferred,
    'MISMATCH',
  );
}

/**
 * Default validator of mapping and sequence schemas.
 *
 * Succeeds when every child is valid and returns the children's clean data
 * reassembled as an object or an array. The raw value is ignored.
 */
export const allChildren: Validator = (value, context) => {
  const children = context.children;
  if (children === undefined) {
    throw new ValidationFailure('{field.name} must be a container', value, 'TYPE_MISMATCH');
  }

  if (children.shape === 'map') {
    const clean: Record<string, unknown> = {};
    let valid = true;
    for (const [name, outcome] of children.outcomes) {
      valid &&= outcome.valid;
      clean[name] = outcome.cleanData;
    }
    if (!valid) throw new ValidationFailure('{field.name} has invalid fields', value, 'INVALID_CHILDREN');
    return clean;
  }

  if (!children.outcomes.every((outcome) => outcome.valid)) {
    throw new ValidationFailure('{field.name} has invalid fields', value, 'INVALID_CHILDREN');
  }
  return children.outcomes.map((outcome) => outcome.cleanData);
};

function toInteger(value: unknown): number | undefined {
  if (typeof value === 'number' && Number.isFinite(value)) return Math.trunc(value);
  if (typeof value === 'string' && INTEGER_PATTERN.test(value.trim())) return Number.parseInt(value.trim(), 10);
  return undefined;
}

/**
 * Coerce an integer string (surrounding whitespace allowed) or a finite number to an integer.
 * Results outside the safe integer range are rejected rather than rounded.
 */
export const asInt: Validator<number> = (value) => {
  const result = toInteger(value);
  if (result === undefined || !Number.isSafeInteger(result)) {
    throw new ValidationFailure('{field.name} must be a whole number', value, 'TYPE_MISMATCH');
  }
  return result;
};

/** Coerce a numeric string or a finite number to a number. */
export const asNumber: Validator<number> = (value) => {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    if (Number.isFinite(parsed)) return parsed;
  }
  throw new ValidationFailure('{field.name} must be a number', value, 'TYPE_MISMATCH');
};

type DatePart = 'YYYY' | 'MM' | 'DD';

/**
 * Parse a date string laid out as `format`, built from the tokens `YYYY`, `MM` and `DD`
 * (e.g. `'YYYY-MM-DD'`, `'DD/MM/YYYY'`). Returns a `Date` at UTC midnight.
 */
export function asDate(format: string, message?: MessageInput): Validator<Date> {
  const { regex, parts } = compileDateFormat(format);
  const deferred = deferMessage(message, 'Date must be in {format} format', { format });

  return (value) => {
    const match = typeof value === 'string' ? regex.exec(value) : null;
    if (match !== null) {
      const fields = new Map<DatePart, number>();
      parts.forEach((part, i) => fields.set(part, Number(match[i + 1])));
      const year = fields.get('YYYY') ?? 0;
      const month = fields.get('MM') ?? 0;
      const day = fields.get('DD') ?? 0;
      const date = new Date(Date.UTC(year, month - 1, day));
      if (date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day) {
        return date;
      }
    }
    throw new ValidationFailure(deferred, value, 'TYPE_MISMATCH');
  };
}

/** Ensure the data is a string that looks like an email address. */
export function email(message?: MessageInput): Validator<string> {
  const deferred = deferMessage(message, 'Enter a valid email address.');
  return (value) => {
    if (typeof value === 'string' && EMAIL_PATTERN.test(value)) return value;
    throw new ValidationFailure(deferred, value, 'TYPE_MISMATCH');
  };
}

function lengthOf(value: unknown): number | undefined {
  if (typeof value === 'string' || Array.isArray(value)) return value.length;
  return undefined;
}

function compileDateFormat(format: string): { regex: RegExp; parts: DatePart[] } {
  const parts: DatePart[] = [];
  let source = '';
  let last = 0;

  for (const match of format.matchAll(DATE_TOKENS)) {
    const index = match.index ?? 0;
    const token = match[0];
    if (token !== 'YYYY' && token !== 'MM' && token !== 'DD') continue;
    source += escapeRegExp(format.slice(last, index));
    source += token === 'YYYY' ? '(\\d{4})' : '(\\d{1,2})';
    parts.push(token);
    last = index + token.length;
  }
  source += escapeRegExp(format.slice(last));

  if (!parts.includes('YYYY') || !parts.includes('MM') || !parts.includes('DD')) {
    throw new Error(`asDate: format '${format}' must contain YYYY, MM and DD`);
  }
  return { regex: new RegExp(`^${source}$`), parts };
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
