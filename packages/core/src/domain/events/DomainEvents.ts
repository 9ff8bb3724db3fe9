import type { FailureCode } from '../model/ValidationFailure.js';

/** Emitted once a schema has been bound to input. */
export interface TreeBoundEvent {
  readonly type: 'tree:bound';
  /** Number of bound fields, root included. */
  readonly fieldCount: number;
  readonly timestamp: number;
}

/** Emitted when a field's own validator succeeds. Children are always reported before their parent. */
export interface FieldValidatedEvent {
  readonly type: 'field:validated';
  readonly fullName: string;
  readonly timestamp: number;
}

/** Emitted when a field's own validator rejects its data. */
export interface FieldFailedEvent {
  readonly type: 'field:failed';
  readonly fullName: string;
  readonly code: FailureCode;
  /** The value the validator rejected. */
  readonly value: unknown;
  readonly timestamp: number;
}

/** Emitted after the root field has been validated. */
export interface TreeValidatedEvent {
  readonly type: 'tree:validated';
  readonly valid: boolean;
  readonly timestamp: number;
}

export type TreeEvent = TreeBoundEvent | FieldValidatedEvent | FieldFailedEvent | TreeValidatedEvent;

export type TreeEventType = TreeEvent['type'];
