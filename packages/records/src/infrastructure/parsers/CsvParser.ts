import Papa from 'papaparse';
import type { ParserOptions, SourceParser } from '../../domain/ports/SourceParser.js';
import { isEmptyRow, type RawRecord } from '../../domain/model/Record.js';

export interface CsvParserOptions {
  /** Column delimiter. Auto-detected by PapaParse when omitted. */
  readonly delimiter?: string;
}

/**
 * CSV parser adapter using PapaParse.
 *
 * The header row holds full field names (`address.street`, `tags:0.name`), so
 * records are bound with the flat layout. Empty rows are skipped.
 */
export class CsvParser implements SourceParser {
  readonly layout = 'flat' as const;
  private readonly delimiter: string | undefined;

  constructor(options?: CsvParserOptions) {
    this.delimiter = options?.delimiter;
  }

  *parse(data: string | Buffer): Iterable<RawRecord> {
    const content = typeof data === 'string' ? data : data.toString('utf-8');

    const result = Papa.parse<Record<string, unknown>>(content, {
      header: true,
      delimiter: this.delimiter ?? '',
      skipEmptyLines: true,
      dynamicTyping: false,
      transformHeader: (header) => header.trim(),
    });

    for (const row of result.data) {
      if (isEmptyRow(row)) continue;
      yield row;
    }
  }

  detect(sample: string | Buffer): ParserOptions {
    const content = typeof sample === 'string' ? sample : sample.toString('utf-8');
    const firstLines = content.split('\n').slice(0, 5).join('\n');

    const delimiters = [',', ';', '\t', '|'];
    let bestDelimiter = ',';
    let maxColumns = 0;

    for (const delimiter of delimiters) {
      const result = Papa.parse<string[]>(firstLines, { delimiter, header: false });
      const firstRow = result.data[0];
      if (firstRow && firstRow.length > maxColumns) {
        maxColumns = firstRow.length;
        bestDelimiter = delimiter;
      }
    }

    return { delimiter: bestDelimiter };
  }
}
