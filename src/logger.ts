import pino from 'pino';
import type { DestinationStream, Logger } from 'pino';
import type { FuelPriceEtl } from './FuelPriceEtl.js';
import type {
  BatchLoadedEvent,
  RowRejectedEvent,
  RunAbortedEvent,
  RunCompletedEvent,
  RunProgressEvent,
  RunReplacedEvent,
  RunStartedEvent,
} from './domain/events/DomainEvents.js';
import type { RunCounters } from './domain/model/RunCounters.js';

export interface LoggerOptions {
  readonly level: string;
  /** `'development'` switches to pino-pretty output. */
  readonly nodeEnv?: string;
  /** Where JSON lines go. Default: stderr, so stdout carries only reports. */
  readonly destination?: DestinationStream;
}

/** Create the process logger: JSON lines with ISO timestamps and a `service` field. */
export function createLogger(options: LoggerOptions): Logger {
  const pretty = options.nodeEnv === 'development';

  return pino(
    {
      level: options.level,
      formatters: {
        level: (label) => ({ level: label }),
      },
      base: { service: 'fuel-price-etl' },
      timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,
      transport: pretty
        ? {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'HH:MM:ss.l',
              ignore: 'pid,hostname',
              destination: 2,
            },
          }
        : undefined,
    },
    pretty ? undefined : (options.destination ?? pino.destination(2)),
  );
}

export interface RunLoggerOptions {
  /** Rejected rows logged per batch before the rest are only counted. Default: `10`. */
  readonly maxRejectionsPerBatch?: number;
}

function countersFields(counters: RunCounters): Record<string, number> {
  return {
    rowsRead: counters.rowsRead,
    rowsLoaded: counters.rowsLoaded,
    rowsRejected: counters.rowsRejected,
    batchesProcessed: counters.batchesProcessed,
  };
}

/**
 * Log a run's lifecycle events. Returns a function that unsubscribes.
 *
 * Rejected rows are logged at `warn` up to the per-batch cap; the overflow is
 * reported once when the batch is loaded.
 */
export function attachRunLogger(etl: FuelPriceEtl, logger: Logger, options?: RunLoggerOptions): () => void {
  const cap = options?.maxRejectionsPerBatch ?? 10;
  const logged = new Map<number, number>();

  const onRejected = (e: RowRejectedEvent): void => {
    const count = (logged.get(e.batchIndex) ?? 0) + 1;
    logged.set(e.batchIndex, count);
    if (count > cap) return;
    logger.warn(
      {
        event: 'row.rejected',
        runId: e.runId,
        batchIndex: e.batchIndex,
        lineNumber: e.rejection.lineNumber,
        kind: e.rejection.kind,
        field: e.rejection.field,
      },
      `Line ${String(e.rejection.lineNumber)} rejected: ${e.rejection.message}`,
    );
  };

  const onLoaded = (e: BatchLoadedEvent): void => {
    const suppressed = (logged.get(e.batchIndex) ?? 0) - cap;
    logged.delete(e.batchIndex);
    if (suppressed > 0) {
      logger.warn(
        { event: 'row.rejected.suppressed', runId: e.runId, batchIndex: e.batchIndex, suppressed },
        `${String(suppressed)} more rejected rows in batch ${String(e.batchIndex)} not logged`,
      );
    }
    logger.debug(
      {
        event: 'batch.loaded',
        runId: e.runId,
        batchIndex: e.batchIndex,
        loadedCount: e.loadedCount,
        rejectedCount: e.rejectedCount,
      },
      `Batch ${String(e.batchIndex)} loaded`,
    );
  };

  const onStarted = (e: RunStartedEvent): void => {
    logger.info(
      {
        event: 'run.started',
        runId: e.runId,
        source: e.source.location ?? e.source.fileName,
        columns: e.columns,
        batchSize: e.batchSize,
      },
      'Run started',
    );
  };

  const onReplaced = (e: RunReplacedEvent): void => {
    logger.info({ event: 'run.replaced', runId: e.runId }, 'Table replaced');
  };

  const onProgress = (e: RunProgressEvent): void => {
    logger.info(
      { event: 'run.progress', runId: e.runId, ...countersFields(e.counters) },
      `${String(e.counters.rowsRead)} rows read`,
    );
  };

  const onCompleted = (e: RunCompletedEvent): void => {
    logger.info(
      { event: 'run.completed', runId: e.runId, elapsedMs: e.elapsedMs, ...countersFields(e.counters) },
      `Run completed in ${String(e.elapsedMs)}ms`,
    );
  };

  const onAborted = (e: RunAbortedEvent): void => {
    logger.error(
      { event: 'run.aborted', runId: e.runId, phase: e.phase, error: e.error, ...countersFields(e.counters) },
      `Run aborted during ${e.phase}`,
    );
  };

  etl
    .on('run:started', onStarted)
    .on('run:replaced', onReplaced)
    .on('row:rejected', onRejected)
    .on('batch:loaded', onLoaded)
    .on('run:progress', onProgress)
    .on('run:completed', onCompleted)
    .on('run:aborted', onAborted);

  return () => {
    etl
      .off('run:started', onStarted)
      .off('run:replaced', onReplaced)
      .off('row:rejected', onRejected)
      .off('batch:loaded', onLoaded)
      .off('run:progress', onProgress)
      .off('run:completed', onCompleted)
      .off('run:aborted', onAborted);
  };
}
