import { ABSENT, type CoercedValue } from '../model/CoercedValue.js';
import { Kind } from '../model/FieldDescriptor.js';
import { isEmptyCell, isJsonObject, type JsonArray, type JsonValue, type RawCell } from '../model/Record.js';
import { hasTimeOfDay, parseDateText, parseSerialDate } from './parseDateTime.js';
import { parseLocaleNumber } from './parseLocaleNumber.js';

/** Why a coercion failed: the value is of the wrong shape, or text did not match any accepted format. */
export type CoercionFailure = 'type' | 'format';

/** A per-value coercion failure. Returned, never thrown. */
export interface CoercionError {
  readonly expectedKind: Kind;
  readonly rawValue: RawCell;
  readonly reason: CoercionFailure;
  readonly message: string;
}

export type CoercionResult =
  | { readonly ok: true; readonly value: CoercedValue }
  | { readonly ok: false; readonly error: CoercionError };

const TRUE_WORDS: ReadonlySet<string> = new Set(['true', 't', 'yes', 'y', '1']);
const FALSE_WORDS: ReadonlySet<string> = new Set(['false', 'f', 'no', 'n', '0']);
const ARRAY_DELIMITERS = [',', ';', '|', '\t'] as const;
const EMAIL_FORMAT = 'email';

/**
 * Convert a raw cell into the typed value demanded by `kind`.
 *
 * Empty cells always coerce to `absent`; whether that is acceptable is the
 * caller's decision. The function is pure: same input, same result.
 */
export function coerce(raw: RawCell, kind: Kind, format?: string): CoercionResult {
  if (isEmptyCell(raw)) return success(ABSENT);

  switch (kind) {
    case Kind.INTEGER:
      return coerceInteger(raw);
    case Kind.NUMBER:
      return coerceNumber(raw);
    case Kind.BOOLEAN:
      return coerceBoolean(raw);
    case Kind.DATE_TIME:
      return coerceDateTime(raw);
    case Kind.ARRAY:
      return coerceArray(raw);
    case Kind.OBJECT:
      return coerceObject(raw);
    case Kind.STRING:
      return coerceString(raw, format);
  }
}

/** Human-readable description of a raw value for error messages, e.g. `string "abc"`. */
export function describeRawValue(raw: RawCell): string {
  if (raw === null || raw === undefined) return 'empty cell';
  if (typeof raw === 'string') return `string "${raw}"`;
  if (typeof raw === 'number') return `number ${String(raw)}`;
  if (typeof raw === 'boolean') return `boolean ${String(raw)}`;
  if (raw instanceof Date) return Number.isNaN(raw.getTime()) ? 'invalid date' : `date ${raw.toISOString()}`;
  if (Array.isArray(raw)) return `array ${JSON.stringify(raw)}`;
  return `object ${JSON.stringify(raw)}`;
}

/**
 * Render any raw cell as text. Numbers use their shortest decimal form,
 * dates their ISO form and structures compact JSON.
 */
export function stringifyCell(raw: RawCell): string {
  if (raw === null || raw === undefined) return '';
  if (typeof raw === 'string') return raw;
  if (typeof raw === 'number') return formatNumber(raw);
  if (typeof raw === 'boolean') return raw ? 'true' : 'false';
  if (raw instanceof Date) return formatDate(raw, hasTimeOfDay(raw));
  return JSON.stringify(raw);
}

const EXPONENT_FORM = /^(-?)(\d+)(?:\.(\d+))?e([+-]\d+)$/;

/** Render a finite number in plain decimal digits: no exponent, no grouping, `-0` as `0`. */
export function formatNumber(value: number): string {
  if (Object.is(value, -0)) return '0';
  const text = String(value);
  const match = EXPONENT_FORM.exec(text);
  if (!match) return text;

  const [, sign = '', integerPart = '', fraction = '', exponent = '0'] = match;
  const digits = `${integerPart}${fraction}`;
  const point = integerPart.length + Number(exponent);

  if (point <= 0) return `${sign}0.${'0'.repeat(-point)}${digits}`;
  if (point >= digits.length) return `${sign}${digits}${'0'.repeat(point - digits.length)}`;
  return `${sign}${digits.slice(0, point)}.${digits.slice(point)}`;
}

/** Render an instant as `YYYY-MM-DD`, or as a full ISO date-time when it carries a time of day. */
export function formatDate(value: Date, hasTime: boolean): string {
  const iso = value.toISOString();
  return hasTime ? iso : iso.slice(0, 10);
}

function coerceInteger(raw: RawCell): CoercionResult {
  const parsed = toNumber(raw);
  if (parsed === null) return failure(Kind.INTEGER, raw, 'type');
  if (!Number.isInteger(parsed)) {
    return failure(Kind.INTEGER, raw, 'type', `expected integer, got ${describeRawValue(raw)} with a fractional part`);
  }
  if (!Number.isSafeInteger(parsed)) {
    return failure(Kind.INTEGER, raw, 'type', `expected integer, got ${describeRawValue(raw)} outside the safe integer range`);
  }
  return success({ kind: 'integer', value: parsed === 0 ? 0 : parsed });
}

function coerceNumber(raw: RawCell): CoercionResult {
  const parsed = toNumber(raw);
  if (parsed === null) return failure(Kind.NUMBER, raw, 'type');
  return success({ kind: 'number', value: parsed === 0 ? 0 : parsed });
}

function toNumber(raw: RawCell): number | null {
  if (typeof raw === 'number') return Number.isFinite(raw) ? raw : null;
  if (typeof raw === 'string') return parseLocaleNumber(raw);
  return null;
}

function coerceBoolean(raw: RawCell): CoercionResult {
  if (typeof raw === 'boolean') return success({ kind: 'boolean', value: raw });
  if (typeof raw === 'number') {
    if (raw === 1) return success({ kind: 'boolean', value: true });
    if (raw === 0) return success({ kind: 'boolean', value: false });
    return failure(Kind.BOOLEAN, raw, 'type');
  }
  if (typeof raw === 'string') {
    const word = raw.trim().toLowerCase();
    if (TRUE_WORDS.has(word)) return success({ kind: 'boolean', value: true });
    if (FALSE_WORDS.has(word)) return success({ kind: 'boolean', value: false });
  }
  return failure(Kind.BOOLEAN, raw, 'type');
}

function coerceDateTime(raw: RawCell): CoercionResult {
  if (raw instanceof Date) {
    if (Number.isNaN(raw.getTime())) return failure(Kind.DATE_TIME, raw, 'format');
    return success({ kind: 'datetime', value: new Date(raw.getTime()), hasTime: hasTimeOfDay(raw) });
  }

  if (typeof raw === 'number') {
    const parsed = parseSerialDate(raw);
    if (!parsed) {
      return failure(Kind.DATE_TIME, raw, 'format', `expected datetime, got ${describeRawValue(raw)} outside the serial date range`);
    }
    return success({ kind: 'datetime', value: parsed.value, hasTime: parsed.hasTime });
  }

  if (typeof raw === 'string') {
    const parsed = parseDateText(raw);
    if (!parsed) {
      return failure(Kind.DATE_TIME, raw, 'format', `expected datetime, got ${describeRawValue(raw)} in no recognized date format`);
    }
    return success({ kind: 'datetime', value: parsed.value, hasTime: parsed.hasTime });
  }

  return failure(Kind.DATE_TIME, raw, 'type');
}

function coerceArray(raw: RawCell): CoercionResult {
  if (Array.isArray(raw)) return success({ kind: 'array', value: raw });
  if (typeof raw === 'number' || typeof raw === 'boolean') return success({ kind: 'array', value: [raw] });

  if (typeof raw === 'string') {
    const text = raw.trim();
    if (text.startsWith('[')) {
      const parsed = parseJson(text);
      if (parsed === undefined || !Array.isArray(parsed)) {
        return failure(Kind.ARRAY, raw, 'format', `expected array, got ${describeRawValue(raw)} that is not a JSON array`);
      }
      return success({ kind: 'array', value: parsed });
    }
    return success({ kind: 'array', value: splitItems(text) });
  }

  return failure(Kind.ARRAY, raw, 'type');
}

function splitItems(text: string): JsonArray {
  const delimiter = ARRAY_DELIMITERS.find((candidate) => text.includes(candidate));
  if (delimiter === undefined) return [text];
  return text.split(delimiter).map((item) => item.trim());
}

function coerceObject(raw: RawCell): CoercionResult {
  if (isJsonObject(raw)) return success({ kind: 'object', value: raw });

  if (typeof raw === 'string' && raw.trim().startsWith('{')) {
    const parsed = parseJson(raw.trim());
    if (!isJsonObject(parsed)) {
      return failure(Kind.OBJECT, raw, 'format', `expected object, got ${describeRawValue(raw)} that is not a JSON object`);
    }
    return success({ kind: 'object', value: parsed });
  }

  return failure(Kind.OBJECT, raw, 'type');
}

function coerceString(raw: RawCell, format: string | undefined): CoercionResult {
  const text = stringifyCell(raw);
  if (format === EMAIL_FORMAT) return success({ kind: 'string', value: text.trim().toLowerCase() });
  return success({ kind: 'string', value: text });
}

function parseJson(text: string): JsonValue | undefined {
  try {
    return toJsonValue(JSON.parse(text));
  } catch {
    return undefined;
  }
}

function toJsonValue(value: unknown): JsonValue | undefined {
  if (value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (Array.isArray(value)) {
    const items: JsonValue[] = [];
    for (const item of value) {
      const converted = toJsonValue(item);
      if (converted === undefined) return undefined;
      items.push(converted);
    }
    return items;
  }
  if (typeof value === 'object') {
    const result: Record<string, JsonValue> = {};
    for (const [key, item] of Object.entries(value)) {
      const converted = toJsonValue(item);
      if (converted === undefined) return undefined;
      result[key] = converted;
    }
    return result;
  }
  return undefined;
}

function success(value: CoercedValue): CoercionResult {
  return { ok: true, value };
}

function failure(expectedKind: Kind, rawValue: RawCell, reason: CoercionFailure, message?: string): CoercionResult {
  return {
    ok: false,
    error: {
      expectedKind,
      rawValue,
      reason,
      message: message ?? `expected ${expectedKind}, got ${describeRawValue(rawValue)}`,
    },
  };
}
