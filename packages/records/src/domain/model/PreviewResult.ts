import type { ValidatedRecord } from './Record.js';

/** Result of previewing a sample of records against the schema. */
export interface PreviewResult {
  /** Records that passed validation. */
  readonly validRecords: readonly ValidatedRecord[];
  /** Records that failed validation. */
  readonly invalidRecords: readonly ValidatedRecord[];
  /** Total number of records sampled from the source. */
  readonly totalSampled: number;
  /** Top-level keys seen across the sample, in first-seen order. */
  readonly columns: readonly string[];
}
