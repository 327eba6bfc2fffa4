import { formatTable } from '../../domain/services/OutputFormatter.js';
import { buildExportFileName, writeCsv } from '../../infrastructure/output/CsvWriter.js';
import type { RunContext } from '../RunContext.js';

export interface ExportCsvOptions {
  /** Dataset the file belongs to. When set, `fileName` follows the export naming convention. */
  readonly datasetId?: string;
  /** Schema identifier for the file name. Default: the dictionary identifier, else `'schema'`. */
  readonly schemaId?: string;
}

export interface ExportResult {
  /** CSV text: the Schema field names, then one line per valid row. */
  readonly content: string;
  readonly rowCount: number;
  readonly fileName?: string;
}

/** Use case: render the valid rows of a finished run as CSV. */
export class ExportCsv {
  constructor(private readonly ctx: RunContext) {}

  execute(options?: ExportCsvOptions): ExportResult {
    const { schema, outcome } = this.ctx;
    if (this.ctx.status !== 'VALIDATED' || !schema || !outcome) {
      throw new Error(`Cannot export in status ${this.ctx.status}. Call .validate() first.`);
    }

    const [header = [], ...rows] = formatTable(schema, outcome.validRows);
    const content = writeCsv(header, rows);

    const fileName =
      options?.datasetId !== undefined
        ? buildExportFileName(
            options.datasetId,
            options.schemaId ?? schema.metadata.identifier ?? 'schema',
            this.ctx.settings.now(),
          )
        : undefined;

    this.ctx.eventBus.emit({
      type: 'export:completed',
      runId: this.ctx.runId,
      rowCount: rows.length,
      ...(fileName !== undefined ? { fileName } : {}),
      timestamp: Date.now(),
    });

    return { content, rowCount: rows.length, ...(fileName !== undefined ? { fileName } : {}) };
  }
}
