import type { Batch } from '../../domain/model/Batch.js';
import type { BatchResult } from '../../domain/model/BatchResult.js';
import type { FuelSale } from '../../domain/model/FuelSale.js';
import type { LoadRun } from '../../domain/model/LoadRun.js';
import type { RejectionTally, RowRejection } from '../../domain/model/Rejection.js';
import { RejectionKind, emptyTally, incrementTally } from '../../domain/model/Rejection.js';
import type { SalesStore } from '../../domain/ports/SalesStore.js';
import { normalize } from '../../domain/services/Normalizer.js';
import { StoreUnavailableError, errorMessage } from '../../domain/errors/PipelineError.js';
import type { EventBus } from '../EventBus.js';

/**
 * Use case: normalize one batch and persist its survivors as a single atomic insert.
 *
 * Rejections are final and counted, never retried. They are announced before
 * the insert, so a batch whose insert fails still reports them. A failed insert
 * is fatal to the run and surfaces as `StoreUnavailableError`.
 */
export class LoadBatch {
  constructor(
    private readonly store: SalesStore,
    private readonly eventBus: EventBus,
  ) {}

  async execute(batch: Batch, run: LoadRun): Promise<BatchResult> {
    if (!run.tableReplaced) {
      throw new Error(`Run ${run.runId}: refusing to load batch ${String(batch.index)} before the table is replaced`);
    }

    const staged: FuelSale[] = [];
    const rejections: RowRejection[] = [];
    let reasons: RejectionTally = emptyTally();

    for (const line of batch.lines) {
      if (line.kind === 'malformed') {
        rejections.push({
          kind: RejectionKind.COLUMN_COUNT_MISMATCH,
          lineNumber: line.lineNumber,
          message: `Expected ${String(line.expectedFieldCount)} fields, found ${String(line.fieldCount)}`,
        });
        reasons = incrementTally(reasons, RejectionKind.COLUMN_COUNT_MISMATCH);
        continue;
      }

      const result = normalize(line.record);
      if (result.ok) {
        staged.push(result.value);
      } else {
        rejections.push({ ...result.reason, lineNumber: line.lineNumber });
        reasons = incrementTally(reasons, result.reason.kind);
      }
    }

    for (const rejection of rejections) {
      this.eventBus.emit({
        type: 'row:rejected',
        runId: run.runId,
        batchIndex: batch.index,
        rejection,
        timestamp: Date.now(),
      });
    }

    if (staged.length > 0) {
      try {
        await this.store.insertBatch(staged);
      } catch (error) {
        throw new StoreUnavailableError(
          `Batch ${String(batch.index)} insert of ${String(staged.length)} rows failed: ${errorMessage(error)}`,
          { cause: error },
        );
      }
    }

    return {
      batchIndex: batch.index,
      readCount: batch.lines.length,
      loadedCount: staged.length,
      rejectedCount: rejections.length,
      reasons,
      rejections,
    };
  }
}
