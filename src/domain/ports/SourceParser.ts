import type { RawRow } from '../model/Record.js';

/** Turns the complete content of a source into raw rows keyed by header. */
export interface SourceParser {
  parse(data: Buffer): AsyncIterable<RawRow> | Iterable<RawRow>;
}
