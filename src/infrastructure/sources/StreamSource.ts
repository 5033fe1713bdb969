import type { DataSource, SourceMetadata } from '../../domain/ports/DataSource.js';
import { decodeChunks, iterateReadable } from './decodeChunks.js';

export interface StreamSourceOptions {
  /** Name reported in metadata and logs. Default: `'stream-input'`. */
  readonly fileName?: string;
  /** Size in bytes, when the producer knows it. */
  readonly fileSize?: number;
  /** Encoding of byte chunks. Default: `'utf-8'`. */
  readonly encoding?: string;
}

type Chunk = string | Uint8Array;

function isReadableStream(stream: AsyncIterable<Chunk> | ReadableStream<Chunk>): stream is ReadableStream<Chunk> {
  return 'getReader' in stream && typeof stream.getReader === 'function';
}

/** Source over an already open stream, such as `process.stdin` or a web `ReadableStream`. Readable once. */
export class StreamSource implements DataSource {
  private readonly name: string;
  private readonly encoding: string;
  private consumed = false;

  constructor(
    private readonly stream: AsyncIterable<Chunk> | ReadableStream<Chunk>,
    private readonly options: StreamSourceOptions = {},
  ) {
    this.name = options.fileName ?? 'stream-input';
    this.encoding = options.encoding ?? 'utf-8';
  }

  async *read(): AsyncIterable<string> {
    if (this.consumed) {
      throw new Error(`Stream ${this.name} was already read; a stream source can be read only once`);
    }
    this.consumed = true;

    const chunks = isReadableStream(this.stream) ? iterateReadable(this.stream) : this.stream;
    yield* decodeChunks(chunks, this.encoding);
  }

  metadata(): SourceMetadata {
    return { fileName: this.name, fileSize: this.options.fileSize, location: this.name };
  }
}
