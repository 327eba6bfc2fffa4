import type { Schema } from './domain/model/Schema.js';
import type { RunStatus } from './domain/model/RunStatus.js';
import type { OutcomeSummary, ValidationOutcome } from './domain/model/ValidationResult.js';
import { summarizeOutcome } from './domain/model/ValidationResult.js';
import type { DataSource } from './domain/ports/DataSource.js';
import type { DictionarySource } from './domain/ports/DictionarySource.js';
import type { ErrorLogSink } from './domain/ports/ErrorLogSink.js';
import type { SourceParser } from './domain/ports/SourceParser.js';
import type { DomainEvent, EventPayload, EventType } from './domain/events/DomainEvents.js';
import { renderErrorReport } from './domain/services/ErrorReport.js';
import type { HandlerErrorHook } from './application/EventBus.js';
import { RunContext } from './application/RunContext.js';
import { LoadSchema } from './application/usecases/LoadSchema.js';
import { ValidateSource } from './application/usecases/ValidateSource.js';
import { PreviewSource, type PreviewResult } from './application/usecases/PreviewSource.js';
import { ExportCsv, type ExportCsvOptions, type ExportResult } from './application/usecases/ExportCsv.js';

export interface SheetValidatorConfig {
  /** A ready Schema, or the dictionary source to build one from on first use. */
  readonly schema: Schema | DictionarySource;
  /** Rows per `batch:completed` progress event. Default: `100`. */
  readonly batchSize?: number;
  /** Report columns that match no field as `UnknownField` errors. Default: `false`. */
  readonly strict?: boolean;
  /** Treat a trailing `*` on a field name or title as "required". Default: `true`. */
  readonly asteriskMarksRequired?: boolean;
  /** Where the error report is written when a run has errored rows. Default: not written. */
  readonly errorLog?: ErrorLogSink;
  /** Receives errors thrown by event handlers. */
  readonly onHandlerError?: HandlerErrorHook;
  /** Clock for report timestamps and export file names. Default: `() => new Date()`. */
  readonly now?: () => Date;
}

export interface RunStatusResult {
  readonly state: RunStatus;
  /** Counters of the finished validation, once `validate()` has completed. */
  readonly summary?: OutcomeSummary;
}

/**
 * Facade for validating a spreadsheet against a data dictionary.
 *
 * Lifecycle: configure with `from()`, optionally `preview()`, then `validate()`
 * once and `exportCsv()` / `errorReport()` on the finished run.
 *
 * @example
 * ```typescript
 * const run = new SheetValidator({ schema: new UrlDictionarySource(baseUrl, 'samples-dictionary') })
 *   .from(new FilePathSource('samples.xlsx'), new XlsxParser({ sheetName: 'Sample' }));
 *
 * const outcome = await run.validate();
 * if (outcome.rowErrors.length === 0) {
 *   const { content, fileName } = run.exportCsv({ datasetId: 'dataset-1' });
 * }
 * ```
 */
export class SheetValidator {
  private readonly ctx: RunContext;

  constructor(config: SheetValidatorConfig) {
    this.ctx = new RunContext({
      schemaSource: config.schema,
      batchSize: config.batchSize ?? 100,
      strict: config.strict ?? false,
      asteriskMarksRequired: config.asteriskMarksRequired ?? true,
      now: config.now ?? (() => new Date()),
      ...(config.errorLog !== undefined ? { errorLog: config.errorLog } : {}),
      ...(config.onHandlerError !== undefined ? { onHandlerError: config.onHandlerError } : {}),
    });
  }

  /** Set the data source and its parser. */
  from(source: DataSource, parser: SourceParser): this {
    this.ctx.source = source;
    this.ctx.parser = parser;
    return this;
  }

  /** Subscribe to a specific domain event type. */
  on<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.ctx.eventBus.on(type, handler);
    return this;
  }

  /** Unsubscribe a handler registered with `on()`. */
  off<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.ctx.eventBus.off(type, handler);
    return this;
  }

  /** Subscribe to every domain event. */
  onAny(handler: (event: DomainEvent) => void): this {
    this.ctx.eventBus.onAny(handler);
    return this;
  }

  offAny(handler: (event: DomainEvent) => void): this {
    this.ctx.eventBus.offAny(handler);
    return this;
  }

  /** Build (or return) the run's Schema without touching the data source. */
  async loadSchema(): Promise<Schema> {
    return new LoadSchema(this.ctx).execute();
  }

  /** Validate the first `maxRows` rows. Can be repeated before `validate()`. */
  async preview(maxRows = 10): Promise<PreviewResult> {
    return new PreviewSource(this.ctx).execute(maxRows);
  }

  /**
   * Validate every row of the source.
   *
   * Rows with errors never make the run fail; only dictionary, source and
   * parser failures reject.
   */
  async validate(): Promise<ValidationOutcome> {
    return new ValidateSource(this.ctx).execute();
  }

  /** Render the valid rows as CSV. Requires a completed `validate()`. */
  exportCsv(options?: ExportCsvOptions): ExportResult {
    return new ExportCsv(this.ctx).execute(options);
  }

  /** Human-readable report of the errored rows. Requires a completed `validate()`. */
  errorReport(): string {
    const outcome = this.ctx.outcome;
    if (!outcome) {
      throw new Error('No validation outcome yet. Call .validate() first.');
    }
    return renderErrorReport(outcome, this.ctx.settings.now());
  }

  getStatus(): RunStatusResult {
    const outcome = this.ctx.outcome;
    return outcome ? { state: this.ctx.status, summary: summarizeOutcome(outcome) } : { state: this.ctx.status };
  }

  getRunId(): string {
    return this.ctx.runId;
  }
}
