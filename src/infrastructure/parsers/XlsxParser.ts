import { Readable } from 'node:stream';
import ExcelJS from 'exceljs';
import type { CellValue, Workbook, Worksheet } from 'exceljs';
import type { SourceParser } from '../../domain/ports/SourceParser.js';
import { OrderedRecord } from '../../domain/model/OrderedRecord.js';
import { isEmptyRow, type RawCell, type RawRow } from '../../domain/model/Record.js';
import { assertUniqueHeaders, normalizeHeader } from '../../domain/services/normalizeHeader.js';

export interface XlsxParserOptions {
  /** Worksheet to read. Default: the first worksheet. */
  readonly sheetName?: string;
}

/**
 * Parses an `.xlsx` workbook into raw rows using ExcelJS.
 *
 * Row 1 of the worksheet is the header row. Cells keep their native type
 * (numbers, booleans, dates); rich text, hyperlinks and formulas are reduced
 * to their text or cached result, error cells to their error code (`#N/A`).
 */
export class XlsxParser implements SourceParser {
  constructor(private readonly options: XlsxParserOptions = {}) {}

  async *parse(data: Buffer): AsyncIterable<RawRow> {
    const workbook = new ExcelJS.Workbook();
    await workbook.xlsx.read(Readable.from([data]));

    const sheet = this.selectSheet(workbook);
    const headerRow = sheet.getRow(1);
    const headers: string[] = [];
    for (let column = 1; column <= headerRow.cellCount; column++) {
      headers.push(normalizeHeader(cellText(headerRow.getCell(column).value)));
    }
    assertUniqueHeaders(headers);

    for (let rowNumber = 2; rowNumber <= sheet.rowCount; rowNumber++) {
      const row = sheet.getRow(rowNumber);
      const entries: [string, RawCell][] = [];
      headers.forEach((header, index) => {
        if (header !== '') entries.push([header, toRawCell(row.getCell(index + 1).value)]);
      });

      const record = OrderedRecord.from(entries);
      if (isEmptyRow(record)) continue;
      yield record;
    }
  }

  private selectSheet(workbook: Workbook): Worksheet {
    const name = this.options.sheetName;
    const sheet = name === undefined ? workbook.worksheets[0] : workbook.getWorksheet(name);
    if (!sheet) {
      throw new Error(name === undefined ? 'Workbook contains no worksheet' : `Worksheet '${name}' not found`);
    }
    return sheet;
  }
}

/** Reduce an ExcelJS cell value to a raw cell. */
export function toRawCell(value: CellValue): RawCell {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
  if (value instanceof Date) return value;
  if ('richText' in value) return value.richText.map((run) => run.text).join('');
  if ('hyperlink' in value) return cellText(value.text);
  if ('error' in value) return value.error;
  if ('result' in value) return toRawCell(value.result);
  return null;
}

function cellText(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  if (value instanceof Date) return value.toISOString();
  if (typeof value === 'object' && 'richText' in value && Array.isArray(value.richText)) {
    return value.richText.map((run: unknown) => cellText(run)).join('');
  }
  if (typeof value === 'object' && 'text' in value) return cellText(value.text);
  return '';
}
