/**
 * Ordered mapping with unique keys: an explicit list of `[key, value]` pairs
 * plus a key → position lookup.
 *
 * Used wherever column order is observable (raw rows, validated rows), so
 * iteration always follows insertion order. When a key is supplied more than
 * once, the first occurrence wins.
 */
export class OrderedRecord<V> {
  private readonly pairs: (readonly [string, V])[] = [];
  private readonly positions = new Map<string, number>();

  private constructor() {}

  /** Build from `[key, value]` pairs. Later duplicates of a key are ignored. */
  static from<V>(entries: Iterable<readonly [string, V]>): OrderedRecord<V> {
    const record = new OrderedRecord<V>();
    for (const [key, value] of entries) {
      if (record.positions.has(key)) continue;
      record.positions.set(key, record.pairs.length);
      record.pairs.push([key, value]);
    }
    return record;
  }

  /** Build from a plain object, following its own enumerable key order. */
  static fromObject<V>(object: Readonly<Record<string, V>>): OrderedRecord<V> {
    return OrderedRecord.from(Object.entries(object));
  }

  static empty<V>(): OrderedRecord<V> {
    return new OrderedRecord<V>();
  }

  get size(): number {
    return this.pairs.length;
  }

  has(key: string): boolean {
    return this.positions.has(key);
  }

  get(key: string): V | undefined {
    const position = this.positions.get(key);
    return position === undefined ? undefined : this.pairs[position]?.[1];
  }

  keys(): string[] {
    return this.pairs.map(([key]) => key);
  }

  values(): V[] {
    return this.pairs.map(([, value]) => value);
  }

  entries(): (readonly [string, V])[] {
    return [...this.pairs];
  }

  [Symbol.iterator](): Iterator<readonly [string, V]> {
    return this.pairs[Symbol.iterator]();
  }

  /** Plain-object view, e.g. for JSON serialization. */
  toObject(): Record<string, V> {
    const object: Record<string, V> = {};
    for (const [key, value] of this.pairs) {
      object[key] = value;
    }
    return object;
  }
}
