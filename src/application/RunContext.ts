import type { RawRow } from '../domain/model/Record.js';
import type { Schema } from '../domain/model/Schema.js';
import type { ValidationOutcome } from '../domain/model/ValidationResult.js';
import type { DataSource } from '../domain/ports/DataSource.js';
import type { DictionarySource } from '../domain/ports/DictionarySource.js';
import type { ErrorLogSink } from '../domain/ports/ErrorLogSink.js';
import type { SourceParser } from '../domain/ports/SourceParser.js';
import { canTransition, type RunStatus } from '../domain/model/RunStatus.js';
import { EventBus, type HandlerErrorHook } from './EventBus.js';

/** Settings shared by the use cases of one run, defaults applied. */
export interface RunSettings {
  readonly schemaSource: Schema | DictionarySource;
  readonly batchSize: number;
  readonly strict: boolean;
  readonly asteriskMarksRequired: boolean;
  readonly errorLog?: ErrorLogSink;
  readonly onHandlerError?: HandlerErrorHook;
  readonly now: () => Date;
}

/**
 * Mutable state holder shared across all use cases within a single run.
 *
 * Internal: use cases receive a reference to it and update it as the run progresses.
 */
export class RunContext {
  readonly eventBus: EventBus;
  readonly runId: string;

  source: DataSource | null = null;
  parser: SourceParser | null = null;

  status: RunStatus = 'CREATED';
  schema: Schema | null = null;
  outcome: ValidationOutcome | null = null;

  constructor(readonly settings: RunSettings) {
    this.eventBus = new EventBus(settings.onHandlerError);
    this.runId = crypto.randomUUID();
  }

  transitionTo(newStatus: RunStatus): void {
    if (!canTransition(this.status, newStatus)) {
      throw new Error(`Invalid state transition: ${this.status} → ${newStatus}`);
    }
    this.status = newStatus;
  }

  assertSourceConfigured(): void {
    if (!this.source || !this.parser) {
      throw new Error('Source and parser must be configured. Call .from(source, parser) first.');
    }
  }

  /**
   * Drain the source completely, then parse it.
   *
   * @param maxRows - Stop after this many rows (for previews).
   */
  async readRows(maxRows?: number): Promise<RawRow[]> {
    const source = this.source;
    const parser = this.parser;
    if (!source || !parser) {
      throw new Error('Source and parser must be configured. Call .from(source, parser) first.');
    }

    const chunks: Buffer[] = [];
    for await (const chunk of source.read()) {
      chunks.push(chunk);
    }

    const rows: RawRow[] = [];
    for await (const row of parser.parse(Buffer.concat(chunks))) {
      if (maxRows !== undefined && rows.length >= maxRows) break;
      rows.push(row);
    }
    return rows;
  }
}
