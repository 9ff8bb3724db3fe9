import {
  bind,
  bindFlat,
  toResult,
  withoutAggregateErrors,
  type BindOptions,
  type EventBus,
  type Schema,
} from '@treeform/core';
import type { SourceParser, RecordLayout } from './domain/ports/SourceParser.js';
import type { RecordEvent } from './domain/events/DomainEvents.js';
import type { BatchResult } from './domain/model/BatchResult.js';
import type { PreviewResult } from './domain/model/PreviewResult.js';
import {
  createPendingRecord,
  markRecordInvalid,
  markRecordValid,
  type RawRecord,
  type ValidatedRecord,
} from './domain/model/Record.js';

/** Configuration for validating a batch of records. */
export interface RecordValidatorConfig {
  /** Schema every record is bound to. */
  readonly schema: Schema;
  /** How records address nested fields. Default: the parser's layout. */
  readonly layout?: RecordLayout;
  /** Options passed to the binder for every record. */
  readonly bindOptions?: BindOptions;
  /** Receives `record:validated`, `record:invalid` and `batch:completed` events. */
  readonly events?: EventBus<RecordEvent>;
  /** Stop `validate()` after this many records. Default: no limit. */
  readonly maxRecords?: number;
}

/**
 * Facade that binds and validates every record parsed from a source.
 *
 * Errors are reported per field with the aggregate "has invalid fields"
 * errors of containers left out.
 *
 * @example
 * ```typescript
 * const validator = new RecordValidator({ schema: makeSchema({ email: email() }) });
 * validator.from(new CsvParser());
 * const { summary } = validator.validate(csv);
 * ```
 */
export class RecordValidator {
  private parser: SourceParser | null = null;

  constructor(private readonly config: RecordValidatorConfig) {}

  /** Set the parser used by `validate()` and `preview()`. */
  from(parser: SourceParser): this {
    this.parser = parser;
    return this;
  }

  /** Validate every record of `data`. */
  validate(data: string | Buffer): BatchResult {
    const parser = this.requireParser();
    const events = this.config.events;
    const records: ValidatedRecord[] = [];
    let valid = 0;

    for (const raw of this.take(parser.parse(data), this.config.maxRecords)) {
      const record = this.validateRecord(records.length, raw, parser);
      records.push(record);

      if (record.status === 'valid') {
        valid++;
        events?.emit({ type: 'record:validated', index: record.index, timestamp: Date.now() });
      } else {
        events?.emit({ type: 'record:invalid', index: record.index, errors: record.errors, timestamp: Date.now() });
      }
    }

    const summary = { total: records.length, valid, invalid: records.length - valid };
    events?.emit({ type: 'batch:completed', summary, timestamp: Date.now() });
    return { records, summary };
  }

  /** Validate a sample of records without emitting events. */
  preview(data: string | Buffer, maxRecords = 10): PreviewResult {
    const parser = this.requireParser();
    const validRecords: ValidatedRecord[] = [];
    const invalidRecords: ValidatedRecord[] = [];
    const columns = new Set<string>();
    let totalSampled = 0;

    for (const raw of this.take(parser.parse(data), maxRecords)) {
      for (const key of Object.keys(raw)) {
        columns.add(key);
      }
      const record = this.validateRecord(totalSampled, raw, parser);
      totalSampled++;

      if (record.status === 'valid') {
        validRecords.push(record);
      } else {
        invalidRecords.push(record);
      }
    }

    return {
      validRecords,
      invalidRecords,
      totalSampled,
      columns: [...columns],
    };
  }

  private validateRecord(index: number, raw: RawRecord, parser: SourceParser): ValidatedRecord {
    const layout = this.config.layout ?? parser.layout;
    const { schema, bindOptions } = this.config;
    const field = layout === 'flat' ? bindFlat(schema, raw, undefined, bindOptions) : bind(schema, raw, bindOptions);
    const result = toResult(field);

    const record = createPendingRecord(index, raw);
    return result.isValid
      ? markRecordValid(record, result.parsed)
      : markRecordInvalid(record, withoutAggregateErrors(result.errors));
  }

  private requireParser(): SourceParser {
    if (!this.parser) {
      throw new Error('RecordValidator: no parser configured. Call .from() first.');
    }
    return this.parser;
  }

  private *take(records: Iterable<RawRecord>, limit: number | undefined): Iterable<RawRecord> {
    if (limit !== undefined && limit <= 0) return;
    let count = 0;
    for (const record of records) {
      yield record;
      count++;
      if (limit !== undefined && count >= limit) return;
    }
  }
}
