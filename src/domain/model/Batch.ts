import type { SourceLine } from './Record.js';

/** A contiguous slice of data lines, read and loaded as one unit. */
export interface Batch {
  /** Zero-based batch index within the run. */
  readonly index: number;
  /** Lines in arrival order. Structural defects keep their slot. */
  readonly lines: readonly SourceLine[];
}

export function createBatch(index: number, lines: readonly SourceLine[]): Batch {
  return { index, lines };
}

