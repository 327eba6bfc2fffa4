export const XLSX_MIME_TYPE = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';

/** Detect MIME type from a file name or path based on its extension. */
export function detectMimeType(fileNameOrPath: string): string {
  const ext = fileNameOrPath.split('.').pop()?.toLowerCase();
  switch (ext) {
    case 'csv':
      return 'text/csv';
    case 'tsv':
      return 'text/tab-separated-values';
    case 'xlsx':
      return XLSX_MIME_TYPE;
    case 'json':
      return 'application/json';
    default:
      return 'application/octet-stream';
  }
}
