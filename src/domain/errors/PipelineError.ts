/** Machine-readable code of a fatal pipeline error. */
export type PipelineErrorCode = 'SOURCE_UNREACHABLE' | 'STORE_UNAVAILABLE';

/** Base class for errors that abort a run. Row-level defects are never thrown. */
export class PipelineError extends Error {
  readonly code: PipelineErrorCode;

  constructor(code: PipelineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** The input could not be opened or read. */
export class SourceUnreachableError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('SOURCE_UNREACHABLE', message, options);
  }
}

/** The store refused a replace, insert or query. */
export class StoreUnavailableError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('STORE_UNAVAILABLE', message, options);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
