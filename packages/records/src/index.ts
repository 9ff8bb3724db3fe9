// Main entry point
export { RecordValidator } from './RecordValidator.js';
export type { RecordValidatorConfig } from './RecordValidator.js';

// Domain model
export type { RawRecord, ValidatedRecord, RecordStatus } from './domain/model/Record.js';
export { createPendingRecord, markRecordValid, markRecordInvalid, isEmptyRow } from './domain/model/Record.js';
export type { BatchResult, BatchSummary } from './domain/model/BatchResult.js';
export type { PreviewResult } from './domain/model/PreviewResult.js';

// Domain events
export type {
  RecordEvent,
  RecordEventType,
  RecordValidatedEvent,
  RecordInvalidEvent,
  BatchCompletedEvent,
} from './domain/events/DomainEvents.js';

// Domain ports
export type { SourceParser, ParserOptions, RecordLayout } from './domain/ports/SourceParser.js';

// Infrastructure adapters (built-in parsers)
export { CsvParser } from './infrastructure/parsers/CsvParser.js';
export type { CsvParserOptions } from './infrastructure/parsers/CsvParser.js';
export { JsonParser } from './infrastructure/parsers/JsonParser.js';
export type { JsonParserOptions } from './infrastructure/parsers/JsonParser.js';
