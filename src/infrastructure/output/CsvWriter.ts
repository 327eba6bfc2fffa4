import Papa from 'papaparse';

/**
 * Serialize a header and rows of cell text as CSV.
 *
 * Every line, the last one included, ends with `\n`, so a header-only export
 * has the same shape as any other. Cells are quoted only when they contain the
 * delimiter, a quote or a line break.
 */
export function writeCsv(header: readonly string[], rows: readonly (readonly string[])[]): string {
  const lines = Papa.unparse([[...header], ...rows.map((row) => [...row])], { newline: '\n' });
  return `${lines}\n`;
}

/**
 * Upload file name for an export: `{datasetId}_{schemaId}_{YYYY-MM-DD_HH-mm-ss}.csv`,
 * with the timestamp in local time.
 */
export function buildExportFileName(datasetId: string, schemaId: string, date: Date): string {
  const pad = (value: number): string => String(value).padStart(2, '0');
  const day = `${String(date.getFullYear())}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}-${pad(date.getMinutes())}-${pad(date.getSeconds())}`;
  return `${datasetId}_${schemaId}_${day}_${time}.csv`;
}
