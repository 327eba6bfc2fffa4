import type { CoercedValue } from '../model/CoercedValue.js';
import type { Schema } from '../model/Schema.js';
import type { ValidatedRow } from '../model/ValidationResult.js';
import { formatDate, formatNumber } from './TypeCoercer.js';

/** Header row of the output CSV: the Schema field names, in Schema order. */
export function formatHeader(schema: Schema): string[] {
  return [...schema.names];
}

/**
 * Render a validated row as output cells in Schema order, whatever the input
 * column order was. Fields missing from the row render empty.
 */
export function formatRow(schema: Schema, row: ValidatedRow): string[] {
  return schema.names.map((name) => {
    const value = row.fields.get(name);
    return value === undefined ? '' : formatValue(value);
  });
}

/** Render one coerced value as CSV cell text. */
export function formatValue(value: CoercedValue): string {
  switch (value.kind) {
    case 'absent':
      return '';
    case 'integer':
    case 'number':
      return formatNumber(value.value);
    case 'boolean':
      return value.value ? 'true' : 'false';
    case 'datetime':
      return formatDate(value.value, value.hasTime);
    case 'array':
    case 'object':
      return JSON.stringify(value.value);
    case 'string':
      return value.value;
  }
}

/** Render every validated row, preceded by the header row. */
export function formatTable(schema: Schema, rows: readonly ValidatedRow[]): string[][] {
  return [formatHeader(schema), ...rows.map((row) => formatRow(schema, row))];
}
