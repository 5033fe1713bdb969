import type { RejectionTally, RowRejection } from './Rejection.js';

/** What the batch loader did with one batch. */
export interface BatchResult {
  readonly batchIndex: number;
  /** Lines in the batch, well-formed or not. */
  readonly readCount: number;
  /** Rows committed to the store. */
  readonly loadedCount: number;
  readonly rejectedCount: number;
  readonly reasons: RejectionTally;
  /** Every rejection in line order. Released with the batch. */
  readonly rejections: readonly RowRejection[];
}
