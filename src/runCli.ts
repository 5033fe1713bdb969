import type { Logger } from 'pino';
import { FuelPriceEtl } from './FuelPriceEtl.js';
import { ConfigError, USAGE, loadConfig, parseCliArgs } from './config/env.js';
import type { EtlConfig } from './config/env.js';
import { attachRunLogger, createLogger } from './logger.js';
import { formatReports, formatRunSummary } from './application/ReportFormatter.js';
import { RunStatus } from './domain/model/RunStatus.js';
import type { SalesStore } from './domain/ports/SalesStore.js';
import { createSource } from './infrastructure/sources/createSource.js';
import { SequelizeSalesStore } from './infrastructure/store/SequelizeSalesStore.js';

/** Where the CLI writes. Each call is one block of text; a newline is appended. */
export interface CliOutput {
  out(text: string): void;
  err(text: string): void;
}

export interface CliDependencies {
  readonly output?: CliOutput;
  readonly logger?: Logger;
  /** Store factory. Default: a SQLite file at `config.dbPath`. */
  readonly openStore?: (config: EtlConfig, logger: Logger) => SalesStore;
  /** Stream read for the `-` source. Default: `process.stdin`. */
  readonly stdin?: AsyncIterable<string | Uint8Array>;
}

const processOutput: CliOutput = {
  out: (text) => {
    process.stdout.write(`${text}\n`);
  },
  err: (text) => {
    process.stderr.write(`${text}\n`);
  },
};

function openSqliteStore(config: EtlConfig, logger: Logger): SalesStore {
  return SequelizeSalesStore.open(config.dbPath, {
    logging: (sql) => {
      logger.trace({ event: 'sql', sql }, 'SQL');
    },
  });
}

/**
 * Run the command line: resolve configuration, load the source, print the
 * reports and the run summary. Resolves to the process exit code.
 */
export async function runCli(
  argv: readonly string[],
  env: NodeJS.ProcessEnv,
  deps: CliDependencies = {},
): Promise<number> {
  const output = deps.output ?? processOutput;

  let config: EtlConfig;
  try {
    const args = parseCliArgs(argv);
    if (args.help) {
      output.out(USAGE);
      return 0;
    }
    config = loadConfig(env, args.overrides);
  } catch (error) {
    if (!(error instanceof ConfigError)) throw error;
    output.err(`${error.message}\n\n${USAGE}`);
    return 1;
  }

  const logger = deps.logger ?? createLogger({ level: config.logLevel, nodeEnv: config.nodeEnv });
  const store = (deps.openStore ?? openSqliteStore)(config, logger);

  const etl = new FuelPriceEtl({
    store,
    batchSize: config.batchSize,
    delimiter: config.delimiter,
    rankingProduct: config.rankingProduct,
    onHandlerError: (error, event) => {
      logger.error({ event: 'handler.failed', eventType: event.type, err: error }, 'Event handler failed');
    },
  });
  attachRunLogger(etl, logger);

  try {
    const source = createSource(config.source, {
      encoding: config.encoding,
      timeoutMs: config.requestTimeoutMs,
      stdin: deps.stdin,
    });
    const outcome = await etl.run(source);

    if (outcome.reports) {
      output.out(`${formatReports(outcome.reports)}\n`);
    }
    output.out(formatRunSummary(outcome.status, outcome.counters));

    if (outcome.status === RunStatus.ABORTED) {
      output.err(`Error: ${outcome.error?.message ?? `run aborted during ${String(outcome.abortedIn)}`}`);
      return 1;
    }
    return 0;
  } finally {
    await store.close();
  }
}
