import { isRecord } from '@treeform/core';
import type { ParserOptions, SourceParser } from '../../domain/ports/SourceParser.js';
import type { RawRecord } from '../../domain/model/Record.js';

export interface JsonParserOptions {
  /** Parse format: 'array' for JSON array of objects, 'ndjson' for newline-delimited JSON. Default: 'auto'. */
  readonly format?: 'array' | 'ndjson' | 'auto';
}

/** JSON parser adapter supporting JSON array and NDJSON formats with auto-detection. Objects are kept nested. */
export class JsonParser implements SourceParser {
  readonly layout = 'nested' as const;
  private readonly format: 'array' | 'ndjson' | 'auto';

  constructor(options?: JsonParserOptions) {
    this.format = options?.format ?? 'auto';
  }

  *parse(data: string | Buffer): Iterable<RawRecord> {
    const content = typeof data === 'string' ? data : data.toString('utf-8');
    const trimmed = content.trim();

    if (trimmed === '') return;

    const format = this.format === 'auto' ? this.detectFormat(trimmed) : this.format;

    if (format === 'array') {
      yield* this.parseArray(trimmed);
    } else {
      yield* this.parseNdjson(trimmed);
    }
  }

  detect(sample: string | Buffer): ParserOptions {
    const content = typeof sample === 'string' ? sample : sample.toString('utf-8');
    const format = this.detectFormat(content.trim());

    return { delimiter: format === 'ndjson' ? '\n' : undefined };
  }

  private detectFormat(content: string): 'array' | 'ndjson' {
    return content.startsWith('[') ? 'array' : 'ndjson';
  }

  private *parseArray(content: string): Iterable<RawRecord> {
    const parsed: unknown = JSON.parse(content);

    if (!Array.isArray(parsed)) {
      throw new Error('JsonParser: expected a JSON array of objects');
    }

    for (const item of parsed) {
      if (!isRecord(item)) {
        throw new Error('JsonParser: each item in the array must be a plain object');
      }
      yield item;
    }
  }

  private *parseNdjson(content: string): Iterable<RawRecord> {
    const lines = content.split('\n');

    for (const [lineIndex, line] of lines.entries()) {
      const trimmedLine = line.trim();
      if (trimmedLine === '') continue;

      const parsed: unknown = JSON.parse(trimmedLine);

      if (!isRecord(parsed)) {
        throw new Error(`JsonParser: NDJSON line ${String(lineIndex + 1)} must be a plain object`);
      }
      yield parsed;
    }
  }
}
