import type { RawRecord } from '../model/Record.js';

/**
 * How parsed records address nested fields.
 *
 * `'flat'`: keys are full names (`address.street`, `tags:0`), as in CSV headers.
 * `'nested'`: values are objects and arrays mirroring the schema, as in JSON.
 */
export type RecordLayout = 'flat' | 'nested';

/** Auto-detected or configured parser options. */
export interface ParserOptions {
  /** Column delimiter character (e.g. `','`, `';'`, `'\t'`). */
  readonly delimiter?: string;
}

/**
 * Port for parsing raw data into records.
 *
 * Implement this interface to support new data formats. `parse()` yields
 * records lazily.
 */
export interface SourceParser {
  readonly layout: RecordLayout;
  parse(data: string | Buffer): Iterable<RawRecord>;
  /** Auto-detect parser options from a small sample of data. */
  detect?(sample: string | Buffer): ParserOptions;
}
