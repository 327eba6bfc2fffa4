import type { DataDictionary, DictionaryField } from '../model/DataDictionary.js';
import {
  DATE_TIME_FORMAT,
  Kind,
  createFieldDescriptor,
  type FieldConstraints,
  type FieldDescriptor,
} from '../model/FieldDescriptor.js';
import { Schema } from '../model/Schema.js';
import { SchemaConversionError, type DuplicateEntry } from '../model/errors.js';
import { normalizeHeader } from './normalizeHeader.js';

/** Options for `SchemaConverter`. */
export interface SchemaConverterOptions {
  /**
   * When `true`, a field whose name or title ends with `*` is required even
   * without `constraints.required`. Default: `true`.
   */
  readonly asteriskMarksRequired?: boolean;
}

/**
 * Builds a `Schema` from dictionary field definitions.
 *
 * The type mapping is total: unknown labels fall back to `string`. The only
 * failure mode is a duplicated field name or title.
 */
export class SchemaConverter {
  private readonly asteriskMarksRequired: boolean;

  constructor(options?: SchemaConverterOptions) {
    this.asteriskMarksRequired = options?.asteriskMarksRequired ?? true;
  }

  /** Map a dictionary type label to its `Kind`. */
  static mapKind(typeLabel: string | undefined): Kind {
    switch (typeLabel?.trim().toLowerCase()) {
      case 'integer':
        return Kind.INTEGER;
      case 'number':
      case 'float':
        return Kind.NUMBER;
      case 'boolean':
        return Kind.BOOLEAN;
      case 'datetime':
        return Kind.DATE_TIME;
      case 'array':
        return Kind.ARRAY;
      case 'object':
        return Kind.OBJECT;
      default:
        return Kind.STRING;
    }
  }

  /** Convert a whole dictionary, carrying its identifier and title into the schema metadata. */
  convertDictionary(dictionary: DataDictionary): Schema {
    return this.convert(dictionary.fields, {
      title: dictionary.title,
      ...(dictionary.identifier !== undefined ? { identifier: dictionary.identifier } : {}),
    });
  }

  /**
   * Convert ordered field definitions into a `Schema`, preserving their order.
   *
   * @throws SchemaConversionError listing every duplicated name and title.
   */
  convert(fields: readonly DictionaryField[], metadata?: { identifier?: string; title?: string }): Schema {
    const duplicates = findDuplicates(fields);
    if (duplicates.length > 0) {
      throw new SchemaConversionError(duplicates);
    }

    return new Schema(
      fields.map((field) => this.toDescriptor(field)),
      metadata,
    );
  }

  private toDescriptor(field: DictionaryField): FieldDescriptor {
    const kind = SchemaConverter.mapKind(field.type);

    return createFieldDescriptor({
      name: field.name,
      kind,
      required: this.isRequired(field),
      format: resolveFormat(kind, field.format),
      title: field.title,
      description: field.description,
      constraints: toConstraints(field),
    });
  }

  private isRequired(field: DictionaryField): boolean {
    if (field.constraints?.required === true) return true;
    if (!this.asteriskMarksRequired) return false;
    return field.name.trimEnd().endsWith('*') || (field.title?.trimEnd().endsWith('*') ?? false);
  }
}

function resolveFormat(kind: Kind, format: string | undefined): string | undefined {
  if (kind === Kind.DATE_TIME) return DATE_TIME_FORMAT;
  if (format === undefined || format === '' || format === 'default') return undefined;
  return format;
}

function toConstraints(field: DictionaryField): FieldConstraints | undefined {
  const source = field.constraints;
  if (!source) return undefined;

  const constraints: FieldConstraints = {
    ...(source.minimum !== undefined ? { minimum: source.minimum } : {}),
    ...(source.maximum !== undefined ? { maximum: source.maximum } : {}),
    ...(source.minLength !== undefined ? { minLength: source.minLength } : {}),
    ...(source.maxLength !== undefined ? { maxLength: source.maxLength } : {}),
    ...(source.pattern !== undefined ? { pattern: source.pattern } : {}),
    ...(source.enum !== undefined ? { enum: source.enum } : {}),
  };

  return Object.keys(constraints).length > 0 ? constraints : undefined;
}

function findDuplicates(fields: readonly DictionaryField[]): DuplicateEntry[] {
  const names = new Map<string, number[]>();
  const titles = new Map<string, number[]>();

  fields.forEach((field, index) => {
    record(names, field.name, index + 1);
    if (field.title !== undefined && field.title.trim() !== '') {
      record(titles, normalizeHeader(field.title), index + 1);
    }
  });

  return [
    ...collect(names, 'name'),
    ...collect(titles, 'title'),
  ];
}

function record(map: Map<string, number[]>, key: string, position: number): void {
  const positions = map.get(key) ?? [];
  positions.push(position);
  map.set(key, positions);
}

function collect(map: Map<string, number[]>, attribute: DuplicateEntry['attribute']): DuplicateEntry[] {
  return [...map.entries()]
    .filter(([, positions]) => positions.length > 1)
    .map(([value, positions]) => ({ attribute, value, positions }));
}
