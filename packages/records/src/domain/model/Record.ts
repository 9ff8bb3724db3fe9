import type { FieldError } from '@treeform/core';

/** Validation status of a record. */
export type RecordStatus = 'pending' | 'valid' | 'invalid';

/** A key-value record as parsed from the source data. */
export interface RawRecord {
  readonly [key: string]: unknown;
}

/** A record with its validation outcome. */
export interface ValidatedRecord {
  /** Zero-based index of this record in the source data. */
  readonly index: number;
  /** Original data as parsed from the source. */
  readonly raw: RawRecord;
  /** Clean data of the bound tree. Only set when `status` is `'valid'`. */
  readonly parsed?: unknown;
  readonly status: RecordStatus;
  /** Field errors (populated when `status` is `'invalid'`). */
  readonly errors: readonly FieldError[];
}

/** Create a new record in `pending` status. */
export function createPendingRecord(index: number, raw: RawRecord): ValidatedRecord {
  return { index, raw, status: 'pending', errors: [] };
}

/** Transition a record to `valid` status with its clean data. */
export function markRecordValid(record: ValidatedRecord, parsed: unknown): ValidatedRecord {
  return { ...record, parsed, status: 'valid', errors: [] };
}

/** Transition a record to `invalid` status with field errors. */
export function markRecordInvalid(record: ValidatedRecord, errors: readonly FieldError[]): ValidatedRecord {
  return { ...record, parsed: undefined, status: 'invalid', errors };
}

/** Check whether every value in a raw record is empty (`undefined`, `null`, or `''`). */
export function isEmptyRow(record: RawRecord): boolean {
  return Object.values(record).every((v) => v === undefined || v === null || v === '');
}
