import type { FieldError, OutcomeSummary } from '../model/ValidationResult.js';

/** Emitted once the Schema has been built from the data dictionary. */
export interface SchemaLoadedEvent {
  readonly type: 'schema:loaded';
  readonly runId: string;
  readonly identifier?: string;
  readonly title?: string;
  readonly fieldCount: number;
  readonly timestamp: number;
}

/** Emitted when `validate()` starts reading the source. */
export interface ValidationStartedEvent {
  readonly type: 'validation:started';
  readonly runId: string;
  readonly timestamp: number;
}

/** Emitted for each row that passed validation. */
export interface RowValidatedEvent {
  readonly type: 'row:validated';
  readonly runId: string;
  /** 1-based position among data rows. */
  readonly rowIndex: number;
  readonly timestamp: number;
}

/** Emitted for each row with at least one field error. */
export interface RowFailedEvent {
  readonly type: 'row:failed';
  readonly runId: string;
  readonly rowIndex: number;
  readonly errors: readonly FieldError[];
  readonly timestamp: number;
}

/** Emitted after each progress batch of rows. */
export interface BatchCompletedEvent {
  readonly type: 'batch:completed';
  readonly runId: string;
  readonly batchIndex: number;
  readonly rowCount: number;
  readonly validCount: number;
  readonly erroredCount: number;
  readonly processedRows: number;
  readonly timestamp: number;
}

/** Emitted when every row has been validated. Errored rows do not make a run fail. */
export interface ValidationCompletedEvent {
  readonly type: 'validation:completed';
  readonly runId: string;
  readonly summary: OutcomeSummary;
  readonly timestamp: number;
}

/** Emitted when the run stops on a fatal error (dictionary, source or parser failure). */
export interface ValidationFailedEvent {
  readonly type: 'validation:failed';
  readonly runId: string;
  readonly error: string;
  readonly timestamp: number;
}

/** Emitted after the valid rows have been written as CSV. */
export interface ExportCompletedEvent {
  readonly type: 'export:completed';
  readonly runId: string;
  readonly rowCount: number;
  readonly fileName?: string;
  readonly timestamp: number;
}

/** Discriminated union of all domain events. */
export type DomainEvent =
  | SchemaLoadedEvent
  | ValidationStartedEvent
  | RowValidatedEvent
  | RowFailedEvent
  | BatchCompletedEvent
  | ValidationCompletedEvent
  | ValidationFailedEvent
  | ExportCompletedEvent;

/** String literal union of all event type names. */
export type EventType = DomainEvent['type'];

/** Extract the payload type for a specific event type. */
export type EventPayload<T extends EventType> = Extract<DomainEvent, { type: T }>;
