import { randomUUID } from 'node:crypto';
import type { LoadRun } from '../../domain/model/LoadRun.js';
import { createLoadRun, markTableReplaced } from '../../domain/model/LoadRun.js';
import type { RunReports } from '../../domain/model/Report.js';
import type { RunCounters } from '../../domain/model/RunCounters.js';
import { addBatchResult, emptyCounters } from '../../domain/model/RunCounters.js';
import { RunStatus, canTransition } from '../../domain/model/RunStatus.js';
import type { DataSource } from '../../domain/ports/DataSource.js';
import type { SalesStore } from '../../domain/ports/SalesStore.js';
import { StoreUnavailableError, errorMessage } from '../../domain/errors/PipelineError.js';
import type { ChunkReader, OpenedSource } from '../ChunkReader.js';
import type { EventBus } from '../EventBus.js';
import { GenerateReports } from './GenerateReports.js';
import type { GenerateReportsOptions } from './GenerateReports.js';
import { LoadBatch } from './LoadBatch.js';

/** Final state of a run, returned instead of thrown. */
export interface RunOutcome {
  readonly runId: string;
  readonly status: typeof RunStatus.DONE | typeof RunStatus.ABORTED;
  readonly counters: RunCounters;
  /** Present when the run reached `DONE`. */
  readonly reports: RunReports | null;
  /** The fatal error, when the run reached `ABORTED`. */
  readonly error: Error | null;
  /** State the run was in when it aborted. */
  readonly abortedIn: RunStatus | null;
  readonly elapsedMs: number;
}

export interface RunPipelineOptions extends GenerateReportsOptions {
  /** Emit `run:progress` every N batches. Default: `5`. */
  readonly progressEvery?: number;
}

/**
 * Use case: drive one load run through `START → REPLACING → STREAMING → REPORTING → DONE`.
 *
 * The source is opened before the table is touched, so an unreachable source
 * aborts with no mutation. The table is replaced exactly once, before the first
 * batch. Batches are read and loaded strictly one after another. Counters are a
 * value folded locally and handed back in the outcome. The source is closed
 * however the run ends.
 */
export class RunPipeline {
  private readonly loader: LoadBatch;
  private readonly progressEvery: number;

  constructor(
    private readonly reader: ChunkReader,
    private readonly store: SalesStore,
    private readonly eventBus: EventBus,
    private readonly options: RunPipelineOptions = {},
  ) {
    this.loader = new LoadBatch(store, eventBus);
    this.progressEvery = Math.max(1, options.progressEvery ?? 5);
  }

  async execute(source: DataSource): Promise<RunOutcome> {
    const runId = randomUUID();
    const startedAt = Date.now();
    let status: RunStatus = RunStatus.START;
    let counters = emptyCounters();
    let opened: OpenedSource | undefined;

    const transitionTo = (next: RunStatus): void => {
      if (!canTransition(status, next)) {
        throw new Error(`Invalid run transition: ${status} → ${next}`);
      }
      status = next;
    };

    try {
      opened = await this.reader.open(source);
      let run: LoadRun = createLoadRun(runId, startedAt);

      this.eventBus.emit({
        type: 'run:started',
        runId,
        source: opened.metadata,
        columns: opened.columns,
        batchSize: opened.batchSize,
        timestamp: Date.now(),
      });

      transitionTo(RunStatus.REPLACING);
      try {
        await this.store.replaceTable();
      } catch (error) {
        throw new StoreUnavailableError(`Table replace failed: ${errorMessage(error)}`, { cause: error });
      }
      run = markTableReplaced(run);
      this.eventBus.emit({ type: 'run:replaced', runId, timestamp: Date.now() });

      transitionTo(RunStatus.STREAMING);
      for await (const batch of opened.batches()) {
        this.eventBus.emit({
          type: 'batch:started',
          runId,
          batchIndex: batch.index,
          lineCount: batch.lines.length,
          timestamp: Date.now(),
        });

        const result = await this.loader.execute(batch, run);
        counters = addBatchResult(counters, result);

        this.eventBus.emit({
          type: 'batch:loaded',
          runId,
          batchIndex: result.batchIndex,
          loadedCount: result.loadedCount,
          rejectedCount: result.rejectedCount,
          reasons: result.reasons,
          timestamp: Date.now(),
        });

        if (counters.batchesProcessed % this.progressEvery === 0) {
          this.eventBus.emit({ type: 'run:progress', runId, counters, timestamp: Date.now() });
        }
      }

      transitionTo(RunStatus.REPORTING);
      const reports = await new GenerateReports(this.store, this.options).execute();

      transitionTo(RunStatus.DONE);
      const elapsedMs = Date.now() - startedAt;
      this.eventBus.emit({ type: 'run:completed', runId, counters, elapsedMs, timestamp: Date.now() });

      return { runId, status: RunStatus.DONE, counters, reports, error: null, abortedIn: null, elapsedMs };
    } catch (error) {
      const abortedIn: RunStatus = status;
      const cause = error instanceof Error ? error : new Error(String(error));
      transitionTo(RunStatus.ABORTED);
      const elapsedMs = Date.now() - startedAt;

      this.eventBus.emit({
        type: 'run:aborted',
        runId,
        phase: abortedIn,
        error: cause.message,
        counters,
        elapsedMs,
        timestamp: Date.now(),
      });

      return { runId, status: RunStatus.ABORTED, counters, reports: null, error: cause, abortedIn, elapsedMs };
    } finally {
      await opened?.close();
    }
  }
}
