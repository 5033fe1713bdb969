import type { Batch } from '../domain/model/Batch.js';
import type { FuelSaleColumn } from '../domain/model/FuelSale.js';
import type { SourceLine } from '../domain/model/Record.js';
import { malformedLine, recordLine } from '../domain/model/Record.js';
import type { DataSource, SourceMetadata } from '../domain/ports/DataSource.js';
import type { SourceParser } from '../domain/ports/SourceParser.js';
import { BatchSplitter } from '../domain/services/BatchSplitter.js';
import { bindHeader, missingColumns } from '../domain/services/ColumnResolver.js';
import { SourceUnreachableError, errorMessage } from '../domain/errors/PipelineError.js';
import type { PhysicalLine } from '../infrastructure/parsers/splitLines.js';
import { splitLines } from '../infrastructure/parsers/splitLines.js';

const BOM = '\uFEFF';

function describeSource(metadata: SourceMetadata): string {
  return metadata.location ?? metadata.fileName ?? 'source';
}

/**
 * A source whose header has been read and bound.
 *
 * The remaining lines are read lazily by `batches()`, which consumes the
 * underlying stream and can be iterated only once.
 */
export class OpenedSource {
  private consumed = false;

  constructor(
    /** Bound header: canonical column names where resolvable, raw names otherwise. Empty for an empty stream. */
    readonly columns: readonly string[],
    readonly metadata: SourceMetadata,
    private readonly lines: AsyncIterator<PhysicalLine>,
    private readonly parser: SourceParser,
    readonly batchSize: number,
  ) {}

  /** Canonical columns the header did not provide. Their values read as empty. */
  get missingColumns(): readonly FuelSaleColumn[] {
    return this.columns.length === 0 ? [] : missingColumns(this.columns);
  }

  /** Lazily split the remaining lines into batches of at most `batchSize`, in line order. */
  batches(): AsyncIterable<Batch> {
    if (this.consumed) {
      throw new Error('OpenedSource: batches have already been read. Open the source again for a new run.');
    }
    this.consumed = true;
    return new BatchSplitter(this.batchSize).split(this.sourceLines());
  }

  /**
   * Release the underlying stream: a file is closed, a response body cancelled.
   * Called when batch iteration ends for any reason; safe to call again.
   */
  async close(): Promise<void> {
    this.consumed = true;
    await this.lines.return?.();
  }

  private async *sourceLines(): AsyncIterable<SourceLine> {
    try {
      if (this.columns.length === 0) return;

      for (;;) {
        let next: IteratorResult<PhysicalLine>;
        try {
          next = await this.lines.next();
        } catch (error) {
          throw new SourceUnreachableError(
            `Failed reading ${describeSource(this.metadata)}: ${errorMessage(error)}`,
            { cause: error },
          );
        }
        if (next.done) return;

        const { text, lineNumber } = next.value;
        if (text.trim() === '') continue;

        const fields = this.parser.parseFields(text);
        if (fields.length !== this.columns.length) {
          yield malformedLine(lineNumber, fields.length, this.columns.length);
          continue;
        }

        const record: Record<string, string> = {};
        this.columns.forEach((column, i) => {
          // Duplicate header names: the first occurrence wins.
          if (record[column] === undefined) record[column] = fields[i] ?? '';
        });
        yield recordLine(lineNumber, record);
      }
    } finally {
      await this.close();
    }
  }
}

/**
 * Reads a delimited feed as a lazy sequence of fixed-size batches.
 *
 * `open()` reads only up to the header so an unreachable source is detected
 * before anything else happens. Memory per step is bounded by the batch size
 * and the source chunk size, never by the stream length.
 */
export class ChunkReader {
  constructor(
    private readonly parser: SourceParser,
    private readonly batchSize: number,
  ) {
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new Error('Batch size must be a positive integer');
    }
  }

  /**
   * Open the source and bind its header.
   *
   * @throws SourceUnreachableError when the source cannot be opened or read.
   */
  async open(source: DataSource): Promise<OpenedSource> {
    let metadata: SourceMetadata = {};
    let header: PhysicalLine | null = null;
    const lines = splitLines(source.read())[Symbol.asyncIterator]();

    try {
      metadata = source.metadata();
      for (;;) {
        const next = await lines.next();
        if (next.done) break;
        if (next.value.text.trim() !== '') {
          header = next.value;
          break;
        }
      }
    } catch (error) {
      throw new SourceUnreachableError(`Cannot open ${describeSource(metadata)}: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    const headerText = header ? header.text.replace(BOM, '') : '';
    const columns = header ? bindHeader(this.parser.parseFields(headerText)) : [];
    return new OpenedSource(columns, metadata, lines, this.parser, this.batchSize);
  }

  /** Open the source and yield its batches. Convenience for callers that do not need the header. */
  async *read(source: DataSource): AsyncIterable<Batch> {
    const opened = await this.open(source);
    yield* opened.batches();
  }
}
