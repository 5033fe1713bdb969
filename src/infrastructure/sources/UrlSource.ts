import type { DataSource, SourceMetadata } from '../../domain/ports/DataSource.js';
import { decodeChunks, iterateReadable } from './decodeChunks.js';

/** The ANP portal answers 403 to requests without a browser-like agent. */
export const DEFAULT_USER_AGENT = 'Mozilla/5.0 (compatible; fuel-price-etl)';

export interface UrlSourceOptions {
  /** Extra request headers. They override the defaults. */
  readonly headers?: Readonly<Record<string, string>>;
  /** Milliseconds to wait for the response headers. Default: `60000`. */
  readonly timeout?: number;
  /** Encoding of the response body. Default: `'utf-8'`. */
  readonly encoding?: string;
  /** Name reported in metadata. Default: the last segment of the URL path. */
  readonly fileName?: string;
}

function fileNameFromUrl(url: string): string {
  if (!URL.canParse(url)) return 'remote-file';
  const last = new URL(url).pathname.split('/').filter((segment) => segment !== '').pop();
  return last === undefined ? 'remote-file' : decodeURIComponent(last);
}

/**
 * Source that downloads the feed with `fetch` and decodes the body as it
 * arrives. The timeout covers the wait for headers only, so a slow but steady
 * download of a large file is not cut off.
 */
export class UrlSource implements DataSource {
  private readonly headers: Readonly<Record<string, string>>;
  private readonly timeout: number;
  private readonly encoding: string;

  constructor(
    private readonly url: string,
    private readonly options: UrlSourceOptions = {},
  ) {
    this.headers = { 'User-Agent': DEFAULT_USER_AGENT, ...options.headers };
    this.timeout = options.timeout ?? 60000;
    this.encoding = options.encoding ?? 'utf-8';
  }

  async *read(): AsyncIterable<string> {
    const response = await this.request();
    if (!response.ok) {
      throw new Error(`HTTP ${String(response.status)} ${response.statusText} from ${this.url}`);
    }

    if (response.body === null) {
      const text = await response.text();
      if (text !== '') yield text;
      return;
    }
    yield* decodeChunks(iterateReadable(response.body), this.encoding);
  }

  metadata(): SourceMetadata {
    return { fileName: this.options.fileName ?? fileNameFromUrl(this.url), location: this.url };
  }

  private async request(): Promise<Response> {
    const controller = new AbortController();
    const timer = setTimeout(() => {
      controller.abort();
    }, this.timeout);

    try {
      return await fetch(this.url, { headers: this.headers, signal: controller.signal });
    } finally {
      clearTimeout(timer);
    }
  }
}
