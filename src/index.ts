// Main entry point
export { CsvDirectoryMerger, DEFAULT_ROOT_DIR, DEFAULT_OUT_DIR } from './CsvDirectoryMerger.js';
export type { MergerConfig } from './CsvDirectoryMerger.js';

// Domain model
export type { Header, Row } from './domain/model/Header.js';
export { stripBom, headersEqual, isEmptyHeader } from './domain/model/Header.js';
export type { ColumnMapping } from './domain/model/ColumnMapping.js';
export { buildColumnMapping, mapRow } from './domain/model/ColumnMapping.js';
export { DEFAULT_DELIMITER, parseDelimiter } from './domain/model/Delimiter.js';
export { MergeStatus, canTransition } from './domain/model/MergeStatus.js';
export type { DirectoryMergeResult, MergeSummary, SkipReason } from './domain/model/MergeResult.js';

// Domain services
export { HeaderReconciler } from './domain/services/HeaderReconciler.js';
export type { HeaderComparison } from './domain/services/HeaderReconciler.js';

// Application internals
export { EventBus } from './application/EventBus.js';
export type { HandlerErrorFn } from './application/EventBus.js';

// Ports (for custom implementations)
export type { SourceParser, ParserOptions } from './domain/ports/SourceParser.js';
export type { DirectorySource, SkippedEntryFn } from './domain/ports/DirectorySource.js';
export type { OutputSink, OutputFile } from './domain/ports/OutputSink.js';

// Domain events
export type {
  DomainEvent,
  EventType,
  EventPayload,
  RunStartedEvent,
  RunEmptyEvent,
  RunCompletedEvent,
  RunFailedEvent,
  EntrySkippedEvent,
  DirectoryStartedEvent,
  DirectorySkippedEvent,
  DirectoryPromotedEvent,
  FileMergedEvent,
  HeaderMismatchEvent,
  HeaderReorderedEvent,
} from './domain/events/DomainEvents.js';

// Infrastructure adapters (built-in)
export { CsvParser } from './infrastructure/parsers/CsvParser.js';
export type { CsvParserOptions } from './infrastructure/parsers/CsvParser.js';
export { CsvFileSink, serializeRow } from './infrastructure/writers/CsvFileSink.js';
export type { CsvFileSinkOptions } from './infrastructure/writers/CsvFileSink.js';
export { FsDirectorySource, isCsvPath } from './infrastructure/sources/FsDirectorySource.js';
export type { FsDirectorySourceOptions } from './infrastructure/sources/FsDirectorySource.js';
export { ConsoleReporter } from './infrastructure/reporters/ConsoleReporter.js';
export type { ConsoleReporterOptions, ReportLine, TextSink } from './infrastructure/reporters/ConsoleReporter.js';

// Command line
export { runCli, parseCliArgs, describeError } from './cli.js';
export type { CliOptions, CliIo } from './cli.js';
