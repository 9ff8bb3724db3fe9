/** Error codes carried by validation failures. */
export type FailureCode =
  | 'REQUIRED'
  | 'TYPE_MISMATCH'
  | 'PATTERN_MISMATCH'
  | 'LENGTH'
  | 'CHOICE'
  | 'INVALID_CHARS'
  | 'MISMATCH'
  | 'INVALID_CHILDREN'
  | 'CUSTOM_VALIDATION';

/** Parameters interpolated into a message template. */
export type MessageParams = Readonly<Record<string, unknown>>;

/**
 * A message template kept unformatted until the field's error is read.
 *
 * Templates reference `{field.name}`, `{field.fullName}` and any key of `params`.
 */
export class DeferredMessage {
  constructor(
    readonly template: string,
    readonly params: MessageParams = {},
  ) {}
}

/** A plain template string or an already deferred message. */
export type MessageInput = string | DeferredMessage;

/**
 * Build a deferred message from an optional user override.
 *
 * When the override is itself a `DeferredMessage`, its template is used and its
 * params take precedence over the defaults.
 */
export function deferMessage(
  userMessage: MessageInput | undefined,
  defaultTemplate: string,
  params: MessageParams = {},
): DeferredMessage {
  const message = userMessage ?? defaultTemplate;
  if (message instanceof DeferredMessage) {
    return new DeferredMessage(message.template, { ...params, ...message.params });
  }
  return new DeferredMessage(message, params);
}

/** Thrown by validators to reject a value. Caught by the owning field and turned into its `error`. */
export class ValidationFailure extends Error {
  readonly deferred: DeferredMessage;

  constructor(
    message: MessageInput,
    readonly value: unknown,
    readonly code: FailureCode = 'CUSTOM_VALIDATION',
  ) {
    const deferred = typeof message === 'string' ? new DeferredMessage(message) : message;
    super(deferred.template);
    this.name = 'ValidationFailure';
    this.deferred = deferred;
  }
}

export function isValidationFailure(error: unknown): error is ValidationFailure {
  return error instanceof ValidationFailure;
}
