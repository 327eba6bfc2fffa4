import { describe, it, expect } from 'vitest';
import { assertUniqueHeaders, headerKey, normalizeHeader } from '../../../src/domain/services/normalizeHeader.js';
import { DuplicateHeaderError } from '../../../src/domain/model/errors.js';

describe('normalizeHeader', () => {
  it('should collapse whitespace and control characters', () => {
    expect(normalizeHeader('  Collection\r\nDate ')).toBe('Collection Date');
    expect(normalizeHeader('Site\tName')).toBe('Site Name');
  });

  it('should join a trailing asterisk to the header', () => {
    expect(normalizeHeader('Sample ID *')).toBe('Sample ID*');
    expect(normalizeHeader('Sample ID  **')).toBe('Sample ID**');
    expect(normalizeHeader('* Notes')).toBe('* Notes');
  });

  it('should lower-case lookup keys', () => {
    expect(headerKey(' Sample  ID ')).toBe('sample id');
  });
});

describe('assertUniqueHeaders', () => {
  it('should accept distinct headers and repeated blanks', () => {
    expect(() => assertUniqueHeaders(['a', '', 'b', ''])).not.toThrow();
  });

  it('should report every repeated header with its columns', () => {
    let caught: unknown;
    try {
      assertUniqueHeaders(['site', 'depth', 'site', 'depth', 'site']);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(DuplicateHeaderError);
    if (caught instanceof DuplicateHeaderError) {
      expect(caught.duplicates).toEqual([
        { header: 'site', columns: [1, 3, 5] },
        { header: 'depth', columns: [2, 4] },
      ]);
      expect(caught.message).toBe(
        "Spreadsheet contains duplicate column headers:\n" +
          "  • Header 'site' appears in: column 1, column 3, column 5\n" +
          "  • Header 'depth' appears in: column 2, column 4\n" +
          'Please ensure all column headers are unique.',
      );
    }
  });
});
