import type { CoercedValue } from '../model/CoercedValue.js';
import type { FieldConstraints, FieldDescriptor } from '../model/FieldDescriptor.js';
import { OrderedRecord } from '../model/OrderedRecord.js';
import { isEmptyCell, type RawCell, type RawRow } from '../model/Record.js';
import type { Schema } from '../model/Schema.js';
import { ErrorKind, erroredRow, validRow, type FieldError, type RowResult } from '../model/ValidationResult.js';
import { coerce } from './TypeCoercer.js';

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;
const URI_PATTERN = /^[a-z][a-z\d+.-]*:\S+$/i;

/** Options for `RowValidator`. */
export interface RowValidatorOptions {
  /** Report columns that match no field as `UnknownField` errors. Default: `false`. */
  readonly strict?: boolean;
}

type ConstraintCheck =
  | { readonly ok: true; readonly value: CoercedValue }
  | { readonly ok: false; readonly kind: ErrorKind; readonly message: string };

/**
 * Applies a `Schema` to one raw row at a time.
 *
 * Fields are visited in Schema order, so errors come out first-field-first.
 * Within a field at most one error is reported: a missing required value is
 * never also a type error, and only the first failing constraint counts.
 */
export class RowValidator {
  private readonly strict: boolean;
  private readonly patterns: ReadonlyMap<string, RegExp>;

  /** @throws Error when a field's `pattern` constraint is not a valid regular expression. */
  constructor(
    private readonly schema: Schema,
    options?: RowValidatorOptions,
  ) {
    this.strict = options?.strict ?? false;
    this.patterns = compilePatterns(schema.fields);
  }

  /** Validate one row. `rowIndex` is the 1-based position of the row among data rows. */
  validate(row: RawRow, rowIndex: number): RowResult {
    const { cells, unknown } = this.resolveColumns(row);
    const errors: FieldError[] = [];
    const values: [string, CoercedValue][] = [];

    for (const field of this.schema.fields) {
      const raw = cells.get(field.name);
      const error = this.validateField(field, raw, rowIndex, values);
      if (error) errors.push(error);
    }

    if (this.strict) {
      for (const header of unknown) {
        errors.push({
          rowIndex,
          fieldName: header,
          kind: ErrorKind.UNKNOWN_FIELD,
          message: `Unknown field '${header}' is not allowed in strict mode`,
          value: row.get(header),
        });
      }
    }

    if (errors.length > 0) {
      return erroredRow({ rowIndex, errors, raw: row });
    }
    return validRow({ rowIndex, fields: OrderedRecord.from(values) });
  }

  private validateField(
    field: FieldDescriptor,
    raw: RawCell,
    rowIndex: number,
    values: [string, CoercedValue][],
  ): FieldError | null {
    if (field.required && isEmptyCell(raw)) {
      return {
        rowIndex,
        fieldName: field.name,
        kind: ErrorKind.MISSING_REQUIRED,
        message: `Field '${field.name}' is required`,
        value: raw,
      };
    }

    const coerced = coerce(raw, field.kind, field.format);
    if (!coerced.ok) {
      return {
        rowIndex,
        fieldName: field.name,
        kind: coerced.error.reason === 'format' ? ErrorKind.FORMAT_INVALID : ErrorKind.TYPE_MISMATCH,
        message: coerced.error.message,
        value: raw,
      };
    }

    const checked = this.checkConstraints(field, coerced.value);
    if (!checked.ok) {
      return { rowIndex, fieldName: field.name, kind: checked.kind, message: checked.message, value: raw };
    }

    values.push([field.name, checked.value]);
    return null;
  }

  /** Map input headers onto Schema fields. The first column resolving to a field wins. */
  private resolveColumns(row: RawRow): { cells: Map<string, RawCell>; unknown: string[] } {
    const cells = new Map<string, RawCell>();
    const unknown: string[] = [];

    for (const [header, value] of row.entries()) {
      const name = this.schema.resolveHeader(header);
      if (name === undefined) {
        unknown.push(header);
      } else if (!cells.has(name)) {
        cells.set(name, value);
      }
    }

    return { cells, unknown };
  }

  private checkConstraints(field: FieldDescriptor, value: CoercedValue): ConstraintCheck {
    if (value.kind === 'absent') return { ok: true, value };
    const constraints: FieldConstraints = field.constraints ?? {};
    const name = field.name;

    if (value.kind === 'integer' || value.kind === 'number') {
      if (constraints.minimum !== undefined && value.value < constraints.minimum) {
        return outOfRange(`Field '${name}' must be at least ${String(constraints.minimum)}, got ${String(value.value)}`);
      }
      if (constraints.maximum !== undefined && value.value > constraints.maximum) {
        return outOfRange(`Field '${name}' must be at most ${String(constraints.maximum)}, got ${String(value.value)}`);
      }
    }

    if (value.kind === 'string' || value.kind === 'array') {
      const length = value.value.length;
      const unit = value.kind === 'string' ? 'characters' : 'items';
      if (constraints.minLength !== undefined && length < constraints.minLength) {
        return formatInvalid(`Field '${name}' must have at least ${String(constraints.minLength)} ${unit}, got ${String(length)}`);
      }
      if (constraints.maxLength !== undefined && length > constraints.maxLength) {
        return formatInvalid(`Field '${name}' must have at most ${String(constraints.maxLength)} ${unit}, got ${String(length)}`);
      }
    }

    let result: CoercedValue = value;

    if (constraints.enum !== undefined && constraints.enum.length > 0) {
      const matched = matchEnum(value, constraints.enum);
      if (matched === null) {
        return formatInvalid(`Field '${name}' must be one of: ${constraints.enum.map(String).join(', ')}`);
      }
      result = matched;
    }

    if (result.kind !== 'string') return { ok: true, value: result };

    const pattern = this.patterns.get(name);
    if (pattern && !pattern.test(result.value)) {
      return {
        ok: false,
        kind: ErrorKind.PATTERN_MISMATCH,
        message: `Field '${name}' does not match pattern ${pattern.source}`,
      };
    }

    if (field.format === 'email' && !EMAIL_PATTERN.test(result.value)) {
      return formatInvalid(`Field '${name}' must be a valid email`);
    }
    if (field.format === 'uri' && !URI_PATTERN.test(result.value)) {
      return formatInvalid(`Field '${name}' must be a valid URI`);
    }

    return { ok: true, value: result };
  }
}

/** Find the enum entry equal to a value. Text compares case-insensitively and takes the listed spelling. */
function matchEnum(value: CoercedValue, allowed: readonly (string | number | boolean)[]): CoercedValue | null {
  switch (value.kind) {
    case 'string': {
      const key = value.value.trim().toLowerCase();
      const entry = allowed.find((candidate) => String(candidate).toLowerCase() === key);
      return entry === undefined ? null : { kind: 'string', value: String(entry) };
    }
    case 'integer':
    case 'number':
    case 'boolean': {
      const text = String(value.value);
      return allowed.some((candidate) => String(candidate) === text) ? value : null;
    }
    default:
      return value;
  }
}

function compilePatterns(fields: readonly FieldDescriptor[]): Map<string, RegExp> {
  const patterns = new Map<string, RegExp>();
  for (const field of fields) {
    const source = field.constraints?.pattern;
    if (source === undefined || source === '') continue;
    try {
      patterns.set(field.name, new RegExp(source));
    } catch (error) {
      throw new Error(`Invalid pattern for field '${field.name}': ${error instanceof Error ? error.message : String(error)}`);
    }
  }
  return patterns;
}

function outOfRange(message: string): ConstraintCheck {
  return { ok: false, kind: ErrorKind.OUT_OF_RANGE, message };
}

function formatInvalid(message: string): ConstraintCheck {
  return { ok: false, kind: ErrorKind.FORMAT_INVALID, message };
}
