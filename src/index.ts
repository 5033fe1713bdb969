// Main entry point
export { FuelPriceEtl } from './FuelPriceEtl.js';
export type { FuelPriceEtlConfig } from './FuelPriceEtl.js';
export { runCli } from './runCli.js';
export type { CliDependencies, CliOutput } from './runCli.js';

// Domain model
export type { RawRecord, SourceLine, RecordLine, MalformedLine } from './domain/model/Record.js';
export type { FuelSale, FuelSaleColumn } from './domain/model/FuelSale.js';
export { FUEL_SALE_COLUMNS, MANDATORY_COLUMNS } from './domain/model/FuelSale.js';
export type { RejectionReason, RowRejection, RejectionTally } from './domain/model/Rejection.js';
export { RejectionKind, emptyTally, tallyTotal } from './domain/model/Rejection.js';
export type { NormalizeResult } from './domain/model/NormalizeResult.js';
export type { Batch } from './domain/model/Batch.js';
export type { BatchResult } from './domain/model/BatchResult.js';
export type { RunCounters } from './domain/model/RunCounters.js';
export { RunStatus, canTransition, isTerminal } from './domain/model/RunStatus.js';
export type { ProductSummaryRow, RegionSummaryRow, StateRankingRow, RunReports } from './domain/model/Report.js';

// Domain services
export { normalize, parseDecimal, parseDate, parseTaxId, cleanText } from './domain/services/Normalizer.js';
export { resolveColumn, bindHeader } from './domain/services/ColumnResolver.js';

// Errors
export { PipelineError, SourceUnreachableError, StoreUnavailableError } from './domain/errors/PipelineError.js';
export type { PipelineErrorCode } from './domain/errors/PipelineError.js';

// Domain events
export type {
  DomainEvent,
  EventType,
  EventPayload,
  RunStartedEvent,
  RunReplacedEvent,
  RunProgressEvent,
  RunCompletedEvent,
  RunAbortedEvent,
  BatchStartedEvent,
  BatchLoadedEvent,
  RowRejectedEvent,
} from './domain/events/DomainEvents.js';

// Ports
export type { DataSource, SourceMetadata } from './domain/ports/DataSource.js';
export type { SalesStore } from './domain/ports/SalesStore.js';
export type { SourceParser } from './domain/ports/SourceParser.js';

// Application
export { ChunkReader, OpenedSource } from './application/ChunkReader.js';
export type { HandlerErrorFn } from './application/EventBus.js';
export type { RunOutcome, RunPipelineOptions } from './application/usecases/RunPipeline.js';
export { formatReports, formatRunSummary } from './application/ReportFormatter.js';

// Infrastructure: sources
export { FilePathSource } from './infrastructure/sources/FilePathSource.js';
export type { FilePathSourceOptions } from './infrastructure/sources/FilePathSource.js';
export { StreamSource } from './infrastructure/sources/StreamSource.js';
export type { StreamSourceOptions } from './infrastructure/sources/StreamSource.js';
export { UrlSource, DEFAULT_USER_AGENT } from './infrastructure/sources/UrlSource.js';
export type { UrlSourceOptions } from './infrastructure/sources/UrlSource.js';
export { createSource } from './infrastructure/sources/createSource.js';

// Infrastructure: parsing
export { CsvParser } from './infrastructure/parsers/CsvParser.js';
export type { CsvParserOptions } from './infrastructure/parsers/CsvParser.js';

// Infrastructure: stores
export { SequelizeSalesStore, createSqliteSequelize } from './infrastructure/store/SequelizeSalesStore.js';
export type { SqliteSequelizeOptions } from './infrastructure/store/SequelizeSalesStore.js';
export { InMemorySalesStore } from './infrastructure/store/InMemorySalesStore.js';
export type { InMemorySalesStoreOptions, InMemorySalesStoreFaults } from './infrastructure/store/InMemorySalesStore.js';

// Configuration and logging
export { loadConfig, parseCliArgs, configSchema, ConfigError, DEFAULT_SOURCE_URL } from './config/env.js';
export type { EtlConfig } from './config/env.js';
export { createLogger, attachRunLogger } from './logger.js';
export type { LoggerOptions, RunLoggerOptions } from './logger.js';
