/**
 * Closed set of target kinds a field can be coerced into.
 *
 * Every dictionary type label maps to exactly one kind; see `SchemaConverter`.
 */
export const Kind = {
  INTEGER: 'integer',
  NUMBER: 'number',
  BOOLEAN: 'boolean',
  DATE_TIME: 'datetime',
  ARRAY: 'array',
  OBJECT: 'object',
  STRING: 'string',
} as const;

export type Kind = (typeof Kind)[keyof typeof Kind];

/** Format hint attached to `datetime` fields. */
export const DATE_TIME_FORMAT = 'date-time';

/** Optional value constraints copied from the dictionary's `constraints` block. */
export interface FieldConstraints {
  /** Inclusive lower bound for `integer` and `number` fields. */
  readonly minimum?: number;
  /** Inclusive upper bound for `integer` and `number` fields. */
  readonly maximum?: number;
  /** Minimum length of a `string` value, or item count of an `array` value. */
  readonly minLength?: number;
  /** Maximum length of a `string` value, or item count of an `array` value. */
  readonly maxLength?: number;
  /** Regular expression source a `string` value must match. */
  readonly pattern?: string;
  /** Allowed values. Text is matched case-insensitively and normalized to the listed spelling. */
  readonly enum?: readonly (string | number | boolean)[];
}

/** A single typed constraint in a `Schema`. Immutable once built. */
export interface FieldDescriptor {
  /** Unique field name. Also the output CSV column header. */
  readonly name: string;
  /** Target kind for coercion. */
  readonly kind: Kind;
  /** When `true`, an empty cell yields a `MissingRequired` error. */
  readonly required: boolean;
  /** Format hint (`date-time` for datetime fields, `email`, `uri`, ...). */
  readonly format?: string;
  /** Human-facing column title, usually what appears in the spreadsheet header. */
  readonly title?: string;
  readonly description?: string;
  readonly constraints?: FieldConstraints;
  /** Alternative header spellings resolved to this field. Case-insensitive, normalized. */
  readonly aliases: readonly string[];
}

/** Input accepted by `createFieldDescriptor()`. `required` and `aliases` default to `false` and `[]`. */
export interface FieldDescriptorInput {
  readonly name: string;
  readonly kind: Kind;
  readonly required?: boolean;
  readonly format?: string;
  readonly title?: string;
  readonly description?: string;
  readonly constraints?: FieldConstraints;
  readonly aliases?: readonly string[];
}

/** Build a frozen `FieldDescriptor`, dropping unset optional properties. */
export function createFieldDescriptor(input: FieldDescriptorInput): FieldDescriptor {
  const descriptor: FieldDescriptor = {
    name: input.name,
    kind: input.kind,
    required: input.required ?? false,
    aliases: Object.freeze([...(input.aliases ?? [])]),
    ...(input.format !== undefined ? { format: input.format } : {}),
    ...(input.title !== undefined ? { title: input.title } : {}),
    ...(input.description !== undefined ? { description: input.description } : {}),
    ...(input.constraints !== undefined ? { constraints: Object.freeze({ ...input.constraints }) } : {}),
  };
  return Object.freeze(descriptor);
}

