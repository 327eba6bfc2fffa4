import type { RawRow } from '../model/Record.js';
import type { RowErrors, RowResult, ValidatedRow, ValidationOutcome } from '../model/ValidationResult.js';
import { BatchSplitter } from './BatchSplitter.js';
import type { RowValidator } from './RowValidator.js';

/** Progress counters reported after each batch of rows. */
export interface BatchProgress {
  /** Zero-based batch position. */
  readonly batchIndex: number;
  readonly rowCount: number;
  readonly validCount: number;
  readonly erroredCount: number;
  /** Rows processed so far, this batch included. */
  readonly processedRows: number;
}

/** Observer hooks for a processing run. Both are optional. */
export interface BatchListener {
  onRow?(result: RowResult): void;
  onBatch?(progress: BatchProgress): void;
}

export interface BatchProcessorOptions {
  /** Rows per progress batch. Default: `100`. */
  readonly batchSize?: number;
}

/**
 * Drives a `RowValidator` over every row of a batch.
 *
 * Rows are numbered 1..n in input order and validated exactly once. A failing
 * row never stops the run: every row ends up in exactly one of
 * `validRows` or `rowErrors`, both kept in input order.
 */
export class BatchProcessor {
  private readonly splitter: BatchSplitter;

  constructor(
    private readonly validator: RowValidator,
    options?: BatchProcessorOptions,
  ) {
    this.splitter = new BatchSplitter(options?.batchSize ?? 100);
  }

  process(rows: Iterable<RawRow>, listener: BatchListener = {}): ValidationOutcome {
    const validRows: ValidatedRow[] = [];
    const rowErrors: RowErrors[] = [];
    let rowIndex = 0;

    for (const batch of this.splitter.split(rows)) {
      let validCount = 0;
      let erroredCount = 0;

      for (const row of batch.items) {
        rowIndex++;
        const result = this.validator.validate(row, rowIndex);

        if (result.status === 'valid') {
          validRows.push(result.row);
          validCount++;
        } else {
          rowErrors.push(result.rowErrors);
          erroredCount++;
        }
        listener.onRow?.(result);
      }

      listener.onBatch?.({
        batchIndex: batch.batchIndex,
        rowCount: batch.items.length,
        validCount,
        erroredCount,
        processedRows: rowIndex,
      });
    }

    return { validRows, rowErrors };
  }
}
