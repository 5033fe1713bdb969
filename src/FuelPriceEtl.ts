import type { DomainEvent, EventPayload, EventType } from './domain/events/DomainEvents.js';
import type { DataSource } from './domain/ports/DataSource.js';
import type { SalesStore } from './domain/ports/SalesStore.js';
import type { SourceParser } from './domain/ports/SourceParser.js';
import { ChunkReader } from './application/ChunkReader.js';
import { EventBus } from './application/EventBus.js';
import type { HandlerErrorFn } from './application/EventBus.js';
import { RunPipeline } from './application/usecases/RunPipeline.js';
import type { RunOutcome } from './application/usecases/RunPipeline.js';
import { CsvParser } from './infrastructure/parsers/CsvParser.js';

/** Configuration for a fuel price load. */
export interface FuelPriceEtlConfig {
  /** Destination of the normalized rows and source of the reports. */
  readonly store: SalesStore;
  /** Number of source lines per batch. Default: `5000`. */
  readonly batchSize?: number;
  /** Field delimiter of the feed. Ignored when `parser` is given. Default: `';'`. */
  readonly delimiter?: string;
  /** Line parser. Default: `CsvParser` with `delimiter`. */
  readonly parser?: SourceParser;
  /** Emit `run:progress` every N batches. Default: `5`. */
  readonly progressEvery?: number;
  /** Product the state ranking is computed for. Default: `'GASOLINA'`. */
  readonly rankingProduct?: string;
  /** Number of states in the ranking. Default: `5`. */
  readonly rankingLimit?: number;
  /** Receives errors thrown by event subscribers. Default: a process warning. */
  readonly onHandlerError?: HandlerErrorFn;
}

/**
 * Facade over one load: read → normalize → replace and load → report.
 *
 * Each `run()` replaces the table and streams the given source into it. Runs
 * on one instance must not overlap.
 *
 * @example
 * ```typescript
 * const etl = new FuelPriceEtl({ store: SequelizeSalesStore.open('anp_2024.db'), batchSize: 2000 });
 * etl.on('run:completed', (e) => console.log(`${e.counters.rowsLoaded} rows in ${e.elapsedMs}ms`));
 * const outcome = await etl.run(new FilePathSource('./precos.csv'));
 * ```
 */
export class FuelPriceEtl {
  private readonly eventBus: EventBus;
  private readonly pipeline: RunPipeline;

  constructor(config: FuelPriceEtlConfig) {
    this.eventBus = new EventBus(config.onHandlerError);
    const parser = config.parser ?? new CsvParser({ delimiter: config.delimiter ?? ';' });
    const reader = new ChunkReader(parser, config.batchSize ?? 5000);
    this.pipeline = new RunPipeline(reader, config.store, this.eventBus, {
      progressEvery: config.progressEvery,
      rankingProduct: config.rankingProduct,
      rankingLimit: config.rankingLimit,
    });
  }

  /** Subscribe to a lifecycle event. Returns `this` for chaining. */
  on<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.eventBus.on(type, handler);
    return this;
  }

  /** Unsubscribe a handler registered with `on()`. */
  off<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.eventBus.off(type, handler);
    return this;
  }

  /** Subscribe to all events regardless of type. Returns `this` for chaining. */
  onAny(handler: (event: DomainEvent) => void): this {
    this.eventBus.onAny(handler);
    return this;
  }

  /** Unsubscribe a wildcard handler previously registered with `onAny()`. */
  offAny(handler: (event: DomainEvent) => void): this {
    this.eventBus.offAny(handler);
    return this;
  }

  /**
   * Run one load from `source`. Never throws for run failures: an aborted run
   * comes back as an outcome with status `ABORTED` and the cause.
   */
  async run(source: DataSource): Promise<RunOutcome> {
    return this.pipeline.execute(source);
  }
}
