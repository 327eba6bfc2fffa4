import type { FieldDescriptor } from './FieldDescriptor.js';
import { SchemaConversionError, type DuplicateEntry } from './errors.js';
import { headerKey } from '../services/normalizeHeader.js';

/** Descriptive metadata carried alongside the fields. */
export interface SchemaMetadata {
  /** Identifier of the dictionary the schema was built from. */
  readonly identifier?: string;
  readonly title?: string;
}

/**
 * Ordered, name-unique set of field descriptors used for validation.
 *
 * Built once per run and read-only afterwards. Besides the name → index
 * lookup it resolves spreadsheet headers to fields: a header matches a field's
 * name, title or any alias after normalization and case-folding.
 */
export class Schema {
  readonly fields: readonly FieldDescriptor[];
  readonly metadata: SchemaMetadata;
  private readonly positions: ReadonlyMap<string, number>;
  private readonly headerMap: ReadonlyMap<string, string>;

  /** @throws SchemaConversionError when two fields share a name. */
  constructor(fields: readonly FieldDescriptor[], metadata: SchemaMetadata = {}) {
    const positions = new Map<string, number>();
    const seen = new Map<string, number[]>();

    fields.forEach((field, index) => {
      const occurrences = seen.get(field.name) ?? [];
      occurrences.push(index + 1);
      seen.set(field.name, occurrences);
      if (!positions.has(field.name)) positions.set(field.name, index);
    });

    const duplicates: DuplicateEntry[] = [...seen.entries()]
      .filter(([, occurrences]) => occurrences.length > 1)
      .map(([value, occurrences]) => ({ attribute: 'name' as const, value, positions: occurrences }));
    if (duplicates.length > 0) {
      throw new SchemaConversionError(duplicates);
    }

    this.fields = Object.freeze([...fields]);
    this.metadata = Object.freeze({ ...metadata });
    this.positions = positions;
    this.headerMap = this.buildHeaderMap();
    Object.freeze(this);
  }

  get size(): number {
    return this.fields.length;
  }

  /** Field names in Schema order. */
  get names(): readonly string[] {
    return this.fields.map((f) => f.name);
  }

  has(name: string): boolean {
    return this.positions.has(name);
  }

  get(name: string): FieldDescriptor | undefined {
    const index = this.positions.get(name);
    return index === undefined ? undefined : this.fields[index];
  }

  /** Zero-based position of a field, or `-1` when the name is unknown. */
  indexOf(name: string): number {
    return this.positions.get(name) ?? -1;
  }

  /** Map an input header to the field it belongs to, or `undefined` for an unknown column. */
  resolveHeader(header: string): string | undefined {
    return this.headerMap.get(headerKey(header));
  }

  private buildHeaderMap(): Map<string, string> {
    const map = new Map<string, string>();

    // Exact names take priority over titles and aliases of other fields.
    for (const field of this.fields) {
      map.set(headerKey(field.name), field.name);
    }
    for (const field of this.fields) {
      const spellings = field.title !== undefined ? [field.title, ...field.aliases] : field.aliases;
      for (const spelling of spellings) {
        const key = headerKey(spelling);
        if (!map.has(key)) map.set(key, field.name);
      }
    }

    return map;
  }
}
