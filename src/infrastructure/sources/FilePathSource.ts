import { createReadStream, statSync } from 'node:fs';
import { basename } from 'node:path';
import type { DataSource, SourceMetadata } from '../../domain/ports/DataSource.js';

export interface FilePathSourceOptions {
  /** Text encoding of the file. Default: `'utf-8'`. */
  readonly encoding?: BufferEncoding;
  /** Bytes read per chunk. Default: 64 KiB. */
  readonly chunkSize?: number;
}

/** Source that streams a local file. A missing file fails on the first read. */
export class FilePathSource implements DataSource {
  constructor(
    private readonly filePath: string,
    private readonly options: FilePathSourceOptions = {},
  ) {}

  async *read(): AsyncIterable<string> {
    const stream = createReadStream(this.filePath, {
      encoding: this.options.encoding ?? 'utf-8',
      highWaterMark: this.options.chunkSize ?? 64 * 1024,
    });

    for await (const chunk of stream) {
      yield typeof chunk === 'string' ? chunk : String(chunk);
    }
  }

  metadata(): SourceMetadata {
    return {
      fileName: basename(this.filePath),
      fileSize: statSync(this.filePath, { throwIfNoEntry: false })?.size,
      location: this.filePath,
    };
  }
}
