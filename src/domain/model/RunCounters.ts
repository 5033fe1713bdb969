import type { BatchResult } from './BatchResult.js';
import type { RejectionTally } from './Rejection.js';
import { emptyTally, mergeTallies } from './Rejection.js';

/** Aggregate counters for one run. Immutable: fold batch results with `addBatchResult`. */
export interface RunCounters {
  readonly rowsRead: number;
  readonly rowsLoaded: number;
  readonly rowsRejected: number;
  readonly rejectedByKind: RejectionTally;
  readonly batchesProcessed: number;
}

export function emptyCounters(): RunCounters {
  return {
    rowsRead: 0,
    rowsLoaded: 0,
    rowsRejected: 0,
    rejectedByKind: emptyTally(),
    batchesProcessed: 0,
  };
}

export function addBatchResult(counters: RunCounters, result: BatchResult): RunCounters {
  return {
    rowsRead: counters.rowsRead + result.readCount,
    rowsLoaded: counters.rowsLoaded + result.loadedCount,
    rowsRejected: counters.rowsRejected + result.rejectedCount,
    rejectedByKind: mergeTallies(counters.rejectedByKind, result.reasons),
    batchesProcessed: counters.batchesProcessed + 1,
  };
}
