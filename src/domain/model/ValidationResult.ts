import type { CoercedValue } from './CoercedValue.js';
import type { OrderedRecord } from './OrderedRecord.js';
import type { RawCell, RawRow } from './Record.js';

/** Kinds of per-field validation errors. */
export const ErrorKind = {
  MISSING_REQUIRED: 'MissingRequired',
  TYPE_MISMATCH: 'TypeMismatch',
  FORMAT_INVALID: 'FormatInvalid',
  OUT_OF_RANGE: 'OutOfRange',
  PATTERN_MISMATCH: 'PatternMismatch',
  UNKNOWN_FIELD: 'UnknownField',
} as const;

export type ErrorKind = (typeof ErrorKind)[keyof typeof ErrorKind];

/** A single validation error for one field of one row. */
export interface FieldError {
  /** 1-based position of the row among data rows. */
  readonly rowIndex: number;
  /** Schema field name (or the unknown column header for `UnknownField`). */
  readonly fieldName: string;
  readonly kind: ErrorKind;
  /** Human-readable error message. */
  readonly message: string;
  /** The raw cell value that caused the error. */
  readonly value?: RawCell;
}

/** A row that passed validation, with values in Schema field order. */
export interface ValidatedRow {
  readonly rowIndex: number;
  readonly fields: OrderedRecord<CoercedValue>;
}

/** Every error found for a failing row, in Schema field order, with the raw row kept for reporting. */
export interface RowErrors {
  readonly rowIndex: number;
  readonly errors: readonly FieldError[];
  readonly raw: RawRow;
}

/** Result of validating a single row. */
export type RowResult =
  | { readonly status: 'valid'; readonly row: ValidatedRow }
  | { readonly status: 'errored'; readonly rowErrors: RowErrors };

/** Complete partition of a batch into valid rows and per-row error lists, both in input order. */
export interface ValidationOutcome {
  readonly validRows: readonly ValidatedRow[];
  readonly rowErrors: readonly RowErrors[];
}

/** Aggregate counters over an outcome. */
export interface OutcomeSummary {
  readonly totalRows: number;
  readonly validRows: number;
  readonly erroredRows: number;
  readonly totalErrors: number;
}

export function validRow(row: ValidatedRow): RowResult {
  return { status: 'valid', row };
}

export function erroredRow(rowErrors: RowErrors): RowResult {
  return { status: 'errored', rowErrors };
}

/** Compute row and error counters for reporting. */
export function summarizeOutcome(outcome: ValidationOutcome): OutcomeSummary {
  const erroredRows = outcome.rowErrors.length;
  return {
    totalRows: outcome.validRows.length + erroredRows,
    validRows: outcome.validRows.length,
    erroredRows,
    totalErrors: outcome.rowErrors.reduce((sum, entry) => sum + entry.errors.length, 0),
  };
}

/** Return `true` when the outcome has no failing row. */
export function isCleanOutcome(outcome: ValidationOutcome): boolean {
  return outcome.rowErrors.length === 0;
}

/** Render one error as `<ErrorKind> at row[<index>]: <field> — <message>`. */
export function formatFieldError(error: FieldError): string {
  return `${error.kind} at row[${String(error.rowIndex)}]: ${error.fieldName} — ${error.message}`;
}
