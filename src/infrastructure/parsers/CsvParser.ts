import Papa from 'papaparse';
import type { SourceParser } from '../../domain/ports/SourceParser.js';
import { OrderedRecord } from '../../domain/model/OrderedRecord.js';
import { isEmptyRow, type RawCell, type RawRow } from '../../domain/model/Record.js';
import { assertUniqueHeaders, normalizeHeader } from '../../domain/services/normalizeHeader.js';

export interface CsvParserOptions {
  /** Field delimiter. Default: detected by papaparse. */
  readonly delimiter?: string;
  /** Text encoding of the input bytes. Default: `'utf-8'`. */
  readonly encoding?: BufferEncoding;
}

/**
 * Parses delimited text into raw rows. The first line is the header row.
 *
 * Headers are normalized, a repeated header raises `DuplicateHeaderError`,
 * columns with a blank header are dropped and blank lines are skipped.
 * Every cell stays text; typing is left to the coercer.
 */
export class CsvParser implements SourceParser {
  private readonly delimiter: string | undefined;
  private readonly encoding: BufferEncoding;

  constructor(options?: CsvParserOptions) {
    this.delimiter = options?.delimiter;
    this.encoding = options?.encoding ?? 'utf-8';
  }

  *parse(data: Buffer): Iterable<RawRow> {
    const content = data.toString(this.encoding).replace(/^\uFEFF/, '');

    const result = Papa.parse<string[]>(content, {
      header: false,
      delimiter: this.delimiter ?? '',
      skipEmptyLines: 'greedy',
      dynamicTyping: false,
    });

    const [headerLine, ...lines] = result.data;
    if (!headerLine) return;

    const headers = headerLine.map((header) => normalizeHeader(header));
    assertUniqueHeaders(headers);

    for (const line of lines) {
      const entries: [string, RawCell][] = [];
      headers.forEach((header, column) => {
        if (header !== '') entries.push([header, line[column]]);
      });

      const row = OrderedRecord.from(entries);
      if (isEmptyRow(row)) continue;
      yield row;
    }
  }
}
