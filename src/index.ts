// Main entry point
export { SheetValidator } from './SheetValidator.js';
export type { SheetValidatorConfig, RunStatusResult } from './SheetValidator.js';

// Domain model
export { Kind, DATE_TIME_FORMAT, createFieldDescriptor } from './domain/model/FieldDescriptor.js';
export type { FieldDescriptor, FieldDescriptorInput, FieldConstraints } from './domain/model/FieldDescriptor.js';
export { Schema } from './domain/model/Schema.js';
export type { SchemaMetadata } from './domain/model/Schema.js';
export { OrderedRecord } from './domain/model/OrderedRecord.js';
export { parseDataDictionary } from './domain/model/DataDictionary.js';
export type { DataDictionary, DictionaryField, DictionaryConstraints } from './domain/model/DataDictionary.js';
export { createRawRow, isEmptyCell, isEmptyRow } from './domain/model/Record.js';
export type { RawCell, RawRow, JsonValue, JsonArray, JsonObject } from './domain/model/Record.js';
export { ABSENT, coercedValuesEqual } from './domain/model/CoercedValue.js';
export type {
  CoercedValue,
  AbsentValue,
  IntegerValue,
  NumberValue,
  BooleanValue,
  DateTimeValue,
  ArrayValue,
  ObjectValue,
  StringValue,
} from './domain/model/CoercedValue.js';
export { ErrorKind, summarizeOutcome, isCleanOutcome, formatFieldError } from './domain/model/ValidationResult.js';
export type {
  FieldError,
  ValidatedRow,
  RowErrors,
  RowResult,
  ValidationOutcome,
  OutcomeSummary,
} from './domain/model/ValidationResult.js';
export { RunStatus } from './domain/model/RunStatus.js';
export {
  SchemaConversionError,
  DictionaryFormatError,
  DictionaryNotFoundError,
  DuplicateHeaderError,
} from './domain/model/errors.js';
export type { DuplicateEntry, DuplicateHeader } from './domain/model/errors.js';

// Domain services
export { SchemaConverter } from './domain/services/SchemaConverter.js';
export type { SchemaConverterOptions } from './domain/services/SchemaConverter.js';
export { coerce } from './domain/services/TypeCoercer.js';
export type { CoercionResult, CoercionError, CoercionFailure } from './domain/services/TypeCoercer.js';
export { RowValidator } from './domain/services/RowValidator.js';
export type { RowValidatorOptions } from './domain/services/RowValidator.js';
export { BatchProcessor } from './domain/services/BatchProcessor.js';
export type { BatchProcessorOptions, BatchListener, BatchProgress } from './domain/services/BatchProcessor.js';
export { BatchSplitter } from './domain/services/BatchSplitter.js';
export { formatHeader, formatRow, formatValue, formatTable } from './domain/services/OutputFormatter.js';
export { renderErrorReport } from './domain/services/ErrorReport.js';
export { normalizeHeader } from './domain/services/normalizeHeader.js';
export { parseLocaleNumber } from './domain/services/parseLocaleNumber.js';
export { parseDateText, parseSerialDate } from './domain/services/parseDateTime.js';
export type { ParsedDateTime, DateFormatName } from './domain/services/parseDateTime.js';

// Use case result types
export type { PreviewResult } from './application/usecases/PreviewSource.js';
export type { ExportCsvOptions, ExportResult } from './application/usecases/ExportCsv.js';
export { EventBus } from './application/EventBus.js';
export type { HandlerErrorHook } from './application/EventBus.js';

// Ports (for custom implementations)
export type { DataSource, SourceMetadata } from './domain/ports/DataSource.js';
export type { SourceParser } from './domain/ports/SourceParser.js';
export type { DictionarySource } from './domain/ports/DictionarySource.js';
export type { ErrorLogSink } from './domain/ports/ErrorLogSink.js';

// Domain events
export type {
  DomainEvent,
  EventType,
  EventPayload,
  SchemaLoadedEvent,
  ValidationStartedEvent,
  RowValidatedEvent,
  RowFailedEvent,
  BatchCompletedEvent,
  ValidationCompletedEvent,
  ValidationFailedEvent,
  ExportCompletedEvent,
} from './domain/events/DomainEvents.js';

// Infrastructure adapters (built-in)
export { CsvParser } from './infrastructure/parsers/CsvParser.js';
export type { CsvParserOptions } from './infrastructure/parsers/CsvParser.js';
export { XlsxParser } from './infrastructure/parsers/XlsxParser.js';
export type { XlsxParserOptions } from './infrastructure/parsers/XlsxParser.js';
export { BufferSource } from './infrastructure/sources/BufferSource.js';
export { FilePathSource } from './infrastructure/sources/FilePathSource.js';
export type { FilePathSourceOptions } from './infrastructure/sources/FilePathSource.js';
export { UrlDictionarySource } from './infrastructure/dictionary/UrlDictionarySource.js';
export type { UrlDictionarySourceOptions } from './infrastructure/dictionary/UrlDictionarySource.js';
export { StaticDictionarySource } from './infrastructure/dictionary/StaticDictionarySource.js';
export { FileErrorLog } from './infrastructure/output/FileErrorLog.js';
export type { FileErrorLogOptions } from './infrastructure/output/FileErrorLog.js';
export { writeCsv, buildExportFileName } from './infrastructure/output/CsvWriter.js';
export { detectMimeType } from './infrastructure/detectMimeType.js';
