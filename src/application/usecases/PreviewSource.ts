import type { ValidationOutcome } from '../../domain/model/ValidationResult.js';
import { BatchProcessor } from '../../domain/services/BatchProcessor.js';
import { RowValidator } from '../../domain/services/RowValidator.js';
import type { RunContext } from '../RunContext.js';
import { LoadSchema } from './LoadSchema.js';

/** Result of validating the first rows of a source. */
export interface PreviewResult {
  readonly outcome: ValidationOutcome;
  readonly totalSampled: number;
  /** Input headers in first-seen order. */
  readonly columns: readonly string[];
  /** Input headers that match no Schema field. */
  readonly unknownColumns: readonly string[];
  /** Schema fields that no input header maps to. */
  readonly missingFields: readonly string[];
}

/** Use case: validate a sample of rows without emitting row events or keeping an outcome. */
export class PreviewSource {
  constructor(private readonly ctx: RunContext) {}

  async execute(maxRows = 10): Promise<PreviewResult> {
    this.ctx.assertSourceConfigured();
    this.ctx.transitionTo('PREVIEWING');

    try {
      const schema = await new LoadSchema(this.ctx).execute();
      const rows = await this.ctx.readRows(maxRows);

      const columns = new Set<string>();
      for (const row of rows) {
        for (const header of row.keys()) columns.add(header);
      }

      const resolved = new Set<string>();
      const unknownColumns: string[] = [];
      for (const header of columns) {
        const name = schema.resolveHeader(header);
        if (name === undefined) unknownColumns.push(header);
        else resolved.add(name);
      }

      const processor = new BatchProcessor(new RowValidator(schema, { strict: this.ctx.settings.strict }), {
        batchSize: this.ctx.settings.batchSize,
      });
      const outcome = processor.process(rows);

      this.ctx.transitionTo('PREVIEWED');

      return {
        outcome,
        totalSampled: rows.length,
        columns: [...columns],
        unknownColumns,
        missingFields: schema.names.filter((name) => !resolved.has(name)),
      };
    } catch (error) {
      this.ctx.transitionTo('FAILED');
      throw error;
    }
  }
}
