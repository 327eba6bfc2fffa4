import { DuplicateHeaderError } from '../model/errors.js';

// eslint-disable-next-line no-control-regex
const CONTROL_CHARACTERS = /[\u0000-\u001f\u007f-\u009f]/g;
const WHITESPACE_RUN = /\s+/g;
const SPACE_BEFORE_TRAILING_ASTERISKS = /\s+(\*+)$/;

/**
 * Normalize a header or title for matching.
 *
 * Control characters (line breaks inside a spreadsheet cell, tabs) become
 * spaces, whitespace runs collapse to one space, the result is trimmed, and
 * spaces before a trailing `*` run are removed (`"Sample ID *"` → `"Sample ID*"`).
 */
export function normalizeHeader(value: string): string {
  return value
    .replace(CONTROL_CHARACTERS, ' ')
    .replace(WHITESPACE_RUN, ' ')
    .trim()
    .replace(SPACE_BEFORE_TRAILING_ASTERISKS, '$1');
}

/** Lookup key for a header: normalized and lower-cased. */
export function headerKey(value: string): string {
  return normalizeHeader(value).toLowerCase();
}

/**
 * Check a header row for repeated headers (after normalization).
 * Blank headers are not compared.
 *
 * @throws DuplicateHeaderError listing every repeated header with its 1-based columns.
 */
export function assertUniqueHeaders(headers: readonly string[]): void {
  const columns = new Map<string, number[]>();

  headers.forEach((header, index) => {
    if (header === '') return;
    const positions = columns.get(header) ?? [];
    positions.push(index + 1);
    columns.set(header, positions);
  });

  const duplicates = [...columns.entries()]
    .filter(([, positions]) => positions.length > 1)
    .map(([header, positions]) => ({ header, columns: positions }));

  if (duplicates.length > 0) {
    throw new DuplicateHeaderError(duplicates);
  }
}
