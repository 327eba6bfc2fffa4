import { OrderedRecord } from './OrderedRecord.js';

/** A JSON-compatible value, as held by `array` and `object` fields. */
export type JsonValue = string | number | boolean | null | JsonArray | JsonObject;

export type JsonArray = readonly JsonValue[];

export interface JsonObject {
  readonly [key: string]: JsonValue;
}

/**
 * A raw spreadsheet cell as delivered by a parser.
 *
 * `null`, `undefined` and whitespace-only text all count as an empty cell.
 * `Date` is the native date representation of spreadsheet readers.
 */
export type RawCell = string | number | boolean | Date | null | undefined | JsonArray | JsonObject;

/** One input data row keyed by header text, in input column order. */
export type RawRow = OrderedRecord<RawCell>;

/** Build a `RawRow` from a plain object keyed by header (e.g. a parsed CSV record). */
export function createRawRow(cells: Readonly<Record<string, RawCell>>): RawRow {
  return OrderedRecord.fromObject(cells);
}

/** Check whether a cell is the empty marker (`undefined`, `null` or blank text). */
export function isEmptyCell(value: RawCell): boolean {
  return value === undefined || value === null || (typeof value === 'string' && value.trim() === '');
}

/** Check whether every cell in a row is empty. */
export function isEmptyRow(row: RawRow): boolean {
  return row.values().every((value) => isEmptyCell(value));
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}
