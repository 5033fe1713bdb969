import type { DataSource } from '../../domain/ports/DataSource.js';
import { FilePathSource } from './FilePathSource.js';
import { StreamSource } from './StreamSource.js';
import { UrlSource } from './UrlSource.js';

export interface CreateSourceOptions {
  readonly encoding?: BufferEncoding;
  /** Connection timeout for URL sources, in milliseconds. */
  readonly timeoutMs?: number;
  /** Stream used for the `-` location. Default: `process.stdin`. */
  readonly stdin?: AsyncIterable<string | Uint8Array>;
}

/** Pick the data source for a location: `http(s)://` URL, `-` for stdin, anything else a file path. */
export function createSource(location: string, options?: CreateSourceOptions): DataSource {
  if (/^https?:\/\//i.test(location)) {
    return new UrlSource(location, { timeout: options?.timeoutMs, encoding: options?.encoding });
  }
  if (location === '-') {
    return new StreamSource(options?.stdin ?? process.stdin, { fileName: 'stdin', encoding: options?.encoding });
  }
  return new FilePathSource(location, { encoding: options?.encoding });
}
