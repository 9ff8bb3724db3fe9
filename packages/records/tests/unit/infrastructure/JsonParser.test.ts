import { describe, it, expect } from 'vitest';
import { JsonParser } from '../../../src/infrastructure/parsers/JsonParser.js';

describe('JsonParser', () => {
  describe('JSON array format', () => {
    it('should parse a JSON array of objects and keep nested values', () => {
      const data = JSON.stringify([
        { email: 'alice@example.com', address: { city: 'Lyon' }, tags: ['a', 'b'] },
        { email: 'bob@example.com', age: 25 },
      ]);

      const parser = new JsonParser();
      const records = [...parser.parse(data)];

      expect(records).toHaveLength(2);
      expect(records[0]).toEqual({ email: 'alice@example.com', address: { city: 'Lyon' }, tags: ['a', 'b'] });
      expect(records[1]).toEqual({ email: 'bob@example.com', age: 25 });
    });

    it('should parse a JSON array with explicit format option', () => {
      const records = [...new JsonParser({ format: 'array' }).parse('[{"name":"Alice"}]')];
      expect(records).toEqual([{ name: 'Alice' }]);
    });

    it('should return empty for empty array and empty input', () => {
      const parser = new JsonParser();
      expect([...parser.parse('[]')]).toHaveLength(0);
      expect([...parser.parse('')]).toHaveLength(0);
      expect([...parser.parse('   \n  ')]).toHaveLength(0);
    });

    it('should throw for non-array JSON', () => {
      const parser = new JsonParser({ format: 'array' });
      expect(() => [...parser.parse('{"key": "value"}')]).toThrow('JsonParser: expected a JSON array of objects');
    });

    it('should throw for array with non-object items', () => {
      expect(() => [...new JsonParser().parse('[1, 2, 3]')]).toThrow(
        'JsonParser: each item in the array must be a plain object',
      );
      expect(() => [...new JsonParser().parse('[[1]]')]).toThrow('each item in the array must be a plain object');
    });

    it('should propagate syntax errors', () => {
      expect(() => [...new JsonParser().parse('[{"a":')]).toThrow(SyntaxError);
    });
  });

  describe('NDJSON format', () => {
    it('should parse one object per line and skip blank lines', () => {
      const data = '{"name":"Alice","address":{"city":"Lyon"}}\n\n{"name":"Bob"}\n';
      expect([...new JsonParser().parse(data)]).toEqual([
        { name: 'Alice', address: { city: 'Lyon' } },
        { name: 'Bob' },
      ]);
    });

    it('should name the line holding a non-object value', () => {
      expect(() => [...new JsonParser({ format: 'ndjson' }).parse('{"a":1}\n"text"')]).toThrow(
        'JsonParser: NDJSON line 2 must be a plain object',
      );
    });
  });

  describe('detect', () => {
    it('should report the newline delimiter for NDJSON only', () => {
      const parser = new JsonParser();
      expect(parser.detect('{"a":1}\n{"a":2}')).toEqual({ delimiter: '\n' });
      expect(parser.detect('  [{"a":1}]').delimiter).toBeUndefined();
    });
  });

  it('should bind with the nested layout', () => {
    expect(new JsonParser().layout).toBe('nested');
  });
});
