/** A key-value record as split from one source line, keyed by canonical column name. */
export interface RawRecord {
  readonly [column: string]: string;
}

/** A well-formed data line: its field count matched the header. */
export interface RecordLine {
  readonly kind: 'record';
  /** One-based line number in the source, counting the header as line 1. */
  readonly lineNumber: number;
  readonly record: RawRecord;
}

/**
 * A data line whose field count differs from the header's.
 *
 * Structural defects never reach the normalizer; the batch loader tallies them
 * as `ColumnCountMismatch` rejections.
 */
export interface MalformedLine {
  readonly kind: 'malformed';
  readonly lineNumber: number;
  readonly fieldCount: number;
  readonly expectedFieldCount: number;
}

/** One data line of the input stream, in arrival order. */
export type SourceLine = RecordLine | MalformedLine;

export function recordLine(lineNumber: number, record: RawRecord): RecordLine {
  return { kind: 'record', lineNumber, record };
}

export function malformedLine(lineNumber: number, fieldCount: number, expectedFieldCount: number): MalformedLine {
  return { kind: 'malformed', lineNumber, fieldCount, expectedFieldCount };
}
