import type { Batch } from '../model/Batch.js';
import { createBatch } from '../model/Batch.js';
import type { SourceLine } from '../model/Record.js';

/**
 * Domain service that groups a stream of source lines into fixed-size batches.
 *
 * Pure logic, no I/O. Only the batch being filled is held in memory; it is
 * handed off as soon as it reaches `batchSize`.
 */
export class BatchSplitter {
  constructor(private readonly batchSize: number) {
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new Error('Batch size must be a positive integer');
    }
  }

  /**
   * Split a stream of lines into batches of `batchSize`, in arrival order.
   * The final batch may contain fewer lines than `batchSize`.
   */
  async *split(lines: AsyncIterable<SourceLine>): AsyncIterable<Batch> {
    let buffer: SourceLine[] = [];
    let batchIndex = 0;

    for await (const line of lines) {
      buffer.push(line);

      if (buffer.length >= this.batchSize) {
        yield createBatch(batchIndex, buffer);
        buffer = [];
        batchIndex++;
      }
    }

    if (buffer.length > 0) {
      yield createBatch(batchIndex, buffer);
    }
  }
}
