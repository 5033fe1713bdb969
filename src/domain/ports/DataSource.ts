/** Metadata about the data source, for logging. */
export interface SourceMetadata {
  readonly fileName?: string;
  readonly fileSize?: number;
  /** Where the data comes from (path, URL or `stdin`). */
  readonly location?: string;
}

/**
 * Port for reading the raw CSV feed from any origin (file, HTTP, stream).
 *
 * `read()` yields decoded text chunks lazily. Chunk boundaries are arbitrary
 * and may fall inside a line; the reader reassembles lines. A source that
 * cannot be opened throws on the first iteration.
 */
export interface DataSource {
  /** Yield text chunks for streaming consumption. */
  read(): AsyncIterable<string>;
  /** Return metadata about the source. */
  metadata(): SourceMetadata;
}
