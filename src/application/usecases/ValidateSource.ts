import type { ValidationOutcome } from '../../domain/model/ValidationResult.js';
import { summarizeOutcome } from '../../domain/model/ValidationResult.js';
import { BatchProcessor } from '../../domain/services/BatchProcessor.js';
import { RowValidator } from '../../domain/services/RowValidator.js';
import { renderErrorReport } from '../../domain/services/ErrorReport.js';
import type { RunContext } from '../RunContext.js';
import { LoadSchema } from './LoadSchema.js';

export const ERROR_LOG_TITLE = 'Validation errors';

/** Use case: validate every row of the source and keep the outcome on the run. */
export class ValidateSource {
  constructor(private readonly ctx: RunContext) {}

  async execute(): Promise<ValidationOutcome> {
    this.ctx.assertSourceConfigured();
    this.ctx.transitionTo('VALIDATING');

    const { runId, eventBus, settings } = this.ctx;
    eventBus.emit({ type: 'validation:started', runId, timestamp: Date.now() });

    try {
      const schema = await new LoadSchema(this.ctx).execute();
      const rows = await this.ctx.readRows();

      const processor = new BatchProcessor(new RowValidator(schema, { strict: settings.strict }), {
        batchSize: settings.batchSize,
      });

      const outcome = processor.process(rows, {
        onRow: (result) => {
          if (result.status === 'valid') {
            eventBus.emit({ type: 'row:validated', runId, rowIndex: result.row.rowIndex, timestamp: Date.now() });
          } else {
            eventBus.emit({
              type: 'row:failed',
              runId,
              rowIndex: result.rowErrors.rowIndex,
              errors: result.rowErrors.errors,
              timestamp: Date.now(),
            });
          }
        },
        onBatch: (progress) => {
          eventBus.emit({ type: 'batch:completed', runId, ...progress, timestamp: Date.now() });
        },
      });

      if (settings.errorLog && outcome.rowErrors.length > 0) {
        await settings.errorLog.write(ERROR_LOG_TITLE, renderErrorReport(outcome, settings.now()));
      }

      this.ctx.outcome = outcome;
      this.ctx.transitionTo('VALIDATED');
      eventBus.emit({
        type: 'validation:completed',
        runId,
        summary: summarizeOutcome(outcome),
        timestamp: Date.now(),
      });

      return outcome;
    } catch (error) {
      this.ctx.transitionTo('FAILED');
      eventBus.emit({
        type: 'validation:failed',
        runId,
        error: error instanceof Error ? error.message : String(error),
        timestamp: Date.now(),
      });
      throw error;
    }
  }
}
