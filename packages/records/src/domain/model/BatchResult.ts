import type { ValidatedRecord } from './Record.js';

/** Record counts of a validated batch. */
export interface BatchSummary {
  readonly total: number;
  readonly valid: number;
  readonly invalid: number;
}

/** Every record of a batch with its outcome, in source order. */
export interface BatchResult {
  readonly records: readonly ValidatedRecord[];
  readonly summary: BatchSummary;
}
