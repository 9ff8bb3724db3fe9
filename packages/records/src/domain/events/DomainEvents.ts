import type { FieldError } from '@treeform/core';
import type { BatchSummary } from '../model/BatchResult.js';

export interface RecordValidatedEvent {
  readonly type: 'record:validated';
  readonly index: number;
  readonly timestamp: number;
}

export interface RecordInvalidEvent {
  readonly type: 'record:invalid';
  readonly index: number;
  readonly errors: readonly FieldError[];
  readonly timestamp: number;
}

/** Emitted once `validate()` has gone through every record. Not emitted by `preview()`. */
export interface BatchCompletedEvent {
  readonly type: 'batch:completed';
  readonly summary: BatchSummary;
  readonly timestamp: number;
}

export type RecordEvent = RecordValidatedEvent | RecordInvalidEvent | BatchCompletedEvent;

export type RecordEventType = RecordEvent['type'];
