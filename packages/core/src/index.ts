// Schema tree
export { LeafSchema, MapSchema, SequenceSchema, makeSchema, isSchema, isLeafSchema, isMapSchema, isSequenceSchema } from './domain/model/Schema.js';
export type { Schema, SchemaOptions, SchemaLiteral, SchemaLiteralMap } from './domain/model/Schema.js';

// Validator protocol
export type {
  Validator,
  PreProcessor,
  ValidationContext,
  ChildOutcome,
  ChildOutcomes,
  FieldName,
} from './domain/model/Validator.js';
export { ValidationFailure, DeferredMessage, deferMessage, isValidationFailure } from './domain/model/ValidationFailure.js';
export type { FailureCode, MessageInput, MessageParams } from './domain/model/ValidationFailure.js';

// Bound fields
export { BoundField, BoundLeaf, BoundMap, BoundSequence } from './domain/model/BoundField.js';
export type { AnyBoundField, FieldInit, FieldSettings } from './domain/model/BoundField.js';

// Path addressing
export { parsePath, formatPath, childPath, keySegment, indexSegment, isValidKey } from './domain/model/FieldPath.js';
export type { PathSegment } from './domain/model/FieldPath.js';

// Results
export type { FieldError, ValidationResult } from './domain/model/ValidationResult.js';
export { validResult, invalidResult, errorsByField, withoutAggregateErrors } from './domain/model/ValidationResult.js';
export { collectErrors, toResult } from './domain/services/results.js';

// Binding
export { bind, bindFlat, expandFlat, createCachedExpander, DEFAULT_MAX_SEQUENCE_INDEX } from './domain/services/Binder.js';
export type { BindOptions, FlatInput } from './domain/services/Binder.js';

// Built-in validators and pre-processors
export {
  noop,
  chain,
  fromPredicate,
  required,
  ensureString,
  ensureContainer,
  ensureInstance,
  limitLength,
  fromRegex,
  oneOf,
  limitChars,
  keyMatcher,
  allChildren,
  asInt,
  asNumber,
  asDate,
  email,
} from './domain/services/validators.js';
export type { EnsureInstanceOptions, LimitLengthOptions } from './domain/services/validators.js';
export { fromZod } from './domain/services/zodValidator.js';
export { identity, trimStrings, emptyToUndefined, splitString, composePreProcessors } from './domain/services/preProcessors.js';

// Message rendering
export { formatMessage } from './domain/services/MessageRenderer.js';
export type { MessageRenderer } from './domain/services/MessageRenderer.js';

// Events
export { EventBus } from './application/EventBus.js';
export type { BusEvent, EventOfType } from './application/EventBus.js';
export type {
  TreeEvent,
  TreeEventType,
  TreeBoundEvent,
  FieldValidatedEvent,
  FieldFailedEvent,
  TreeValidatedEvent,
} from './domain/events/DomainEvents.js';

// Utilities
export { isRecord } from './utils/isRecord.js';
