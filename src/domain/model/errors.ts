/** One duplicated name or title in a dictionary, with its 1-based positions. */
export interface DuplicateEntry {
  readonly attribute: 'name' | 'title';
  readonly value: string;
  readonly positions: readonly number[];
}

/** Thrown when a dictionary cannot be converted into a Schema (duplicate field names or titles). */
export class SchemaConversionError extends Error {
  constructor(public readonly duplicates: readonly DuplicateEntry[]) {
    const lines = duplicates.map(
      (d) =>
        `  • ${d.attribute === 'name' ? 'Name' : 'Title'} '${d.value}' appears at positions: ${d.positions.join(', ')}`,
    );
    super(`Data dictionary contains duplicate fields:\n${lines.join('\n')}`);
    this.name = 'SchemaConversionError';
  }
}

/** Thrown when a dictionary payload does not have the expected shape. */
export class DictionaryFormatError extends Error {
  constructor(
    message: string,
    public readonly issues: readonly string[] = [],
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'DictionaryFormatError';
  }
}

/** Thrown when a dictionary source has no dictionary with the requested identifier. */
export class DictionaryNotFoundError extends Error {
  constructor(public readonly identifier: string) {
    super(`Data dictionary with identifier '${identifier}' not found`);
    this.name = 'DictionaryNotFoundError';
  }
}

/** One header that appears more than once, with its 1-based column positions. */
export interface DuplicateHeader {
  readonly header: string;
  readonly columns: readonly number[];
}

/** Thrown by spreadsheet parsers when two columns normalize to the same header. */
export class DuplicateHeaderError extends Error {
  constructor(public readonly duplicates: readonly DuplicateHeader[]) {
    const lines = duplicates.map(
      (d) => `  • Header '${d.header}' appears in: ${d.columns.map((c) => `column ${String(c)}`).join(', ')}`,
    );
    super(
      `Spreadsheet contains duplicate column headers:\n${lines.join('\n')}\nPlease ensure all column headers are unique.`,
    );
    this.name = 'DuplicateHeaderError';
  }
}
