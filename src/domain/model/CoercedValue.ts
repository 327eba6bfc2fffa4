import type { JsonArray, JsonObject } from './Record.js';

/** Placeholder for an optional field whose cell was empty. */
export interface AbsentValue {
  readonly kind: 'absent';
}

export interface IntegerValue {
  readonly kind: 'integer';
  readonly value: number;
}

export interface NumberValue {
  readonly kind: 'number';
  readonly value: number;
}

export interface BooleanValue {
  readonly kind: 'boolean';
  readonly value: boolean;
}

/**
 * A recognized date or date-time, normalized to a UTC instant.
 *
 * `hasTime` records whether the source carried a time of day, which decides
 * between date and date-time rendering.
 */
export interface DateTimeValue {
  readonly kind: 'datetime';
  readonly value: Date;
  readonly hasTime: boolean;
}

export interface ArrayValue {
  readonly kind: 'array';
  readonly value: JsonArray;
}

export interface ObjectValue {
  readonly kind: 'object';
  readonly value: JsonObject;
}

export interface StringValue {
  readonly kind: 'string';
  readonly value: string;
}

/** Successfully coerced cell value, tagged by kind. */
export type CoercedValue =
  | AbsentValue
  | IntegerValue
  | NumberValue
  | BooleanValue
  | DateTimeValue
  | ArrayValue
  | ObjectValue
  | StringValue;

export const ABSENT: AbsentValue = Object.freeze({ kind: 'absent' });

/** Check two coerced values for equality (dates by instant, structures by JSON form). */
export function coercedValuesEqual(a: CoercedValue, b: CoercedValue): boolean {
  switch (a.kind) {
    case 'absent':
      return b.kind === 'absent';
    case 'datetime':
      return b.kind === 'datetime' && a.hasTime === b.hasTime && a.value.getTime() === b.value.getTime();
    case 'array':
    case 'object':
      return b.kind === a.kind && JSON.stringify(a.value) === JSON.stringify(b.value);
    case 'integer':
    case 'number':
    case 'boolean':
    case 'string':
      return b.kind === a.kind && Object.is(a.value, b.value);
  }
}
