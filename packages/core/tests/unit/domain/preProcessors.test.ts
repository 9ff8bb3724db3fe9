import { describe, it, expect } from 'vitest';
import {
  composePreProcessors,
  emptyToUndefined,
  identity,
  splitString,
  trimStrings,
} from '../../../src/domain/services/preProcessors.js';

describe('preProcessors', () => {
  it('identity should return its input', () => {
    const value = ['a'];
    expect(identity(value)).toBe(value);
  });

  it('trimStrings should trim strings and leave other values alone', () => {
    expect(trimStrings('  bob ')).toBe('bob');
    expect(trimStrings(12)).toBe(12);
  });

  it('emptyToUndefined should only clear empty strings', () => {
    expect(emptyToUndefined('')).toBeUndefined();
    expect(emptyToUndefined(' ')).toBe(' ');
    expect(emptyToUndefined(0)).toBe(0);
  });

  describe('splitString', () => {
    it('should split on commas and drop blank items', () => {
      expect(splitString()('red, green,, blue ')).toEqual(['red', 'green', 'blue']);
    });

    it('should use a custom separator and item transform', () => {
      expect(splitString(';', (item) => item.toUpperCase())('a;b')).toEqual(['A', 'B']);
    });

    it('should leave arrays and missing input untouched', () => {
      const list = ['x'];
      expect(splitString()(list)).toBe(list);
      expect(splitString()(undefined)).toBeUndefined();
    });
  });

  it('composePreProcessors should apply left to right', () => {
    const preProcessor = composePreProcessors(trimStrings, emptyToUndefined);
    expect(preProcessor('   ')).toBeUndefined();
    expect(preProcessor(' a ')).toBe('a');
  });
});
