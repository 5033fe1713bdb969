import type { RunCounters } from '../model/RunCounters.js';
import type { RejectionTally, RowRejection } from '../model/Rejection.js';
import type { SourceMetadata } from '../ports/DataSource.js';

/** Emitted once the source is open and its header bound. */
export interface RunStartedEvent {
  readonly type: 'run:started';
  readonly runId: string;
  readonly source: SourceMetadata;
  /** Bound header columns, canonical names first resolved from aliases. */
  readonly columns: readonly string[];
  readonly batchSize: number;
  readonly timestamp: number;
}

/** Emitted after the target table has been fully replaced. */
export interface RunReplacedEvent {
  readonly type: 'run:replaced';
  readonly runId: string;
  readonly timestamp: number;
}

/** Emitted every `progressEvery` batches with the running counters. */
export interface RunProgressEvent {
  readonly type: 'run:progress';
  readonly runId: string;
  readonly counters: RunCounters;
  readonly timestamp: number;
}

/** Emitted when the run reaches `DONE`. */
export interface RunCompletedEvent {
  readonly type: 'run:completed';
  readonly runId: string;
  readonly counters: RunCounters;
  readonly elapsedMs: number;
  readonly timestamp: number;
}

/** Emitted when the run reaches `ABORTED`. */
export interface RunAbortedEvent {
  readonly type: 'run:aborted';
  readonly runId: string;
  /** State the run was in when the fatal error occurred. */
  readonly phase: string;
  readonly error: string;
  readonly counters: RunCounters;
  readonly elapsedMs: number;
  readonly timestamp: number;
}

/** Emitted when a batch is handed to the loader. */
export interface BatchStartedEvent {
  readonly type: 'batch:started';
  readonly runId: string;
  readonly batchIndex: number;
  readonly lineCount: number;
  readonly timestamp: number;
}

/** Emitted after a batch has been committed. */
export interface BatchLoadedEvent {
  readonly type: 'batch:loaded';
  readonly runId: string;
  readonly batchIndex: number;
  readonly loadedCount: number;
  readonly rejectedCount: number;
  readonly reasons: RejectionTally;
  readonly timestamp: number;
}

/** Emitted for each row excluded from the load. */
export interface RowRejectedEvent {
  readonly type: 'row:rejected';
  readonly runId: string;
  readonly batchIndex: number;
  readonly rejection: RowRejection;
  readonly timestamp: number;
}

/** Discriminated union of all domain events. */
export type DomainEvent =
  | RunStartedEvent
  | RunReplacedEvent
  | RunProgressEvent
  | RunCompletedEvent
  | RunAbortedEvent
  | BatchStartedEvent
  | BatchLoadedEvent
  | RowRejectedEvent;

/** String literal union of all event type names. */
export type EventType = DomainEvent['type'];

/** Extract the payload type for a specific event type. */
export type EventPayload<T extends EventType> = Extract<DomainEvent, { type: T }>;
