import { describe, it, expect } from 'vitest';
import { parseLocaleNumber } from '../../../src/domain/services/parseLocaleNumber.js';

describe('parseLocaleNumber', () => {
  describe('decimal and grouping separators', () => {
    const table: [string, number | null][] = [
      ['45.123', 45.123],
      ['1,5', 1.5],
      ['1.234', 1.234],
      ['1,234', 1.234],
      ['1,234,567', 1234567],
      ['1.234.567', 1234567],
      ['1.234,56', 1234.56],
      ['1,234.56', 1234.56],
      ['.5', 0.5],
      ['5.', null],
      ['1,23,456', null],
      ['1.2.3,4', null],
      ['1.234,567.8', null],
      ['12 345', 12345],
      ['1 234.5', 1234.5],
      ['1 2 3', null],
      ['12 34', null],
      ["4'5", null],
      ['1  234', null],
    ];

    it.each(table)('should read %s as %s', (text, expected) => {
      expect(parseLocaleNumber(text)).toBe(expected);
    });
  });

  it('should drop spaces, no-break spaces and apostrophes used as grouping', () => {
    expect(parseLocaleNumber('1 234,5')).toBe(1234.5);
    expect(parseLocaleNumber(' 1 000')).toBe(1000);
    expect(parseLocaleNumber("1'234'567")).toBe(1234567);
  });

  it('should accept a leading sign', () => {
    expect(parseLocaleNumber('-12,5')).toBe(-12.5);
    expect(parseLocaleNumber('+7')).toBe(7);
  });

  it('should accept scientific notation', () => {
    expect(parseLocaleNumber('1e3')).toBe(1000);
    expect(parseLocaleNumber('2.5E-2')).toBe(0.025);
  });

  it('should reject text with residual characters', () => {
    expect(parseLocaleNumber('12a')).toBeNull();
    expect(parseLocaleNumber('not-a-number')).toBeNull();
    expect(parseLocaleNumber('')).toBeNull();
    expect(parseLocaleNumber('-')).toBeNull();
    expect(parseLocaleNumber('$5')).toBeNull();
  });
});
