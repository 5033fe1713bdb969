import { parseArgs } from 'node:util';
import { z } from 'zod';

/** ANP monthly survey of gasoline and ethanol prices, January 2024. */
export const DEFAULT_SOURCE_URL =
  'https://www.gov.br/anp/pt-br/centrais-de-conteudo/dados-abertos/arquivos/shpc/dsan/2024/precos-gasolina-etanol-01.csv';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export const configSchema = z.object({
  source: z.string().trim().min(1, 'must not be empty'),
  batchSize: z.coerce.number().int().positive(),
  dbPath: z.string().trim().min(1, 'must not be empty'),
  delimiter: z.string().length(1, 'must be a single character'),
  encoding: z
    .string()
    .trim()
    .refine((value): value is BufferEncoding => Buffer.isEncoding(value), 'is not a supported text encoding'),
  requestTimeoutMs: z.coerce.number().int().positive(),
  rankingProduct: z
    .string()
    .trim()
    .min(1, 'must not be empty')
    .transform((value) => value.toUpperCase()),
  logLevel: z.enum(LOG_LEVELS),
  nodeEnv: z.string(),
});

export type EtlConfig = z.infer<typeof configSchema>;

/** Flags and environment variables could not be turned into a valid configuration. */
export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

export const USAGE = `Usage: fuel-etl [source] [options]

Loads an ANP fuel price CSV into SQLite and prints the price reports.
source is a URL, a file path, or - for stdin.

Options:
  -s, --source <src>           same as the positional source (env ETL_SOURCE)
  -b, --batch-size <n>         lines per batch, default 5000 (env ETL_BATCH_SIZE)
      --db-path <file>         SQLite file, default anp_2024.db (env ETL_DB_PATH)
  -d, --delimiter <char>       field delimiter, default ; (env ETL_DELIMITER)
      --encoding <name>        source text encoding, default utf-8 (env ETL_ENCODING)
      --timeout <ms>           HTTP timeout, default 60000 (env ETL_REQUEST_TIMEOUT_MS)
      --ranking-product <name> product for the state ranking, default GASOLINA (env ETL_RANKING_PRODUCT)
      --log-level <level>      fatal|error|warn|info|debug|trace|silent, default info (env LOG_LEVEL)
  -h, --help                   show this message`;

export interface CliArgs {
  readonly help: boolean;
  readonly overrides: Readonly<Record<string, string | undefined>>;
}

function readFlags(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      allowPositionals: true,
      strict: true,
      options: {
        source: { type: 'string', short: 's' },
        'batch-size': { type: 'string', short: 'b' },
        'db-path': { type: 'string' },
        delimiter: { type: 'string', short: 'd' },
        encoding: { type: 'string' },
        timeout: { type: 'string' },
        'ranking-product': { type: 'string' },
        'log-level': { type: 'string' },
        help: { type: 'boolean', short: 'h' },
      },
    });
  } catch (error) {
    throw new ConfigError(error instanceof Error ? error.message : String(error), { cause: error });
  }
}

/** Parse command-line flags. Unknown flags are an error. */
export function parseCliArgs(argv: readonly string[]): CliArgs {
  const { values, positionals } = readFlags(argv);
  if (positionals.length > 1) {
    throw new ConfigError(`Expected at most one source, got ${String(positionals.length)}`);
  }

  return {
    help: values.help ?? false,
    overrides: {
      source: values.source ?? positionals[0],
      batchSize: values['batch-size'],
      dbPath: values['db-path'],
      delimiter: values.delimiter,
      encoding: values.encoding,
      requestTimeoutMs: values.timeout,
      rankingProduct: values['ranking-product'],
      logLevel: values['log-level'],
    },
  };
}

/**
 * Resolve the configuration: defaults, then environment, then flags.
 *
 * @throws ConfigError listing every invalid option.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Readonly<Record<string, string | undefined>> = {},
): EtlConfig {
  const merged = {
    source: overrides['source'] ?? env['ETL_SOURCE'] ?? DEFAULT_SOURCE_URL,
    batchSize: overrides['batchSize'] ?? env['ETL_BATCH_SIZE'] ?? '5000',
    dbPath: overrides['dbPath'] ?? env['ETL_DB_PATH'] ?? 'anp_2024.db',
    delimiter: overrides['delimiter'] ?? env['ETL_DELIMITER'] ?? ';',
    encoding: overrides['encoding'] ?? env['ETL_ENCODING'] ?? 'utf-8',
    requestTimeoutMs: overrides['requestTimeoutMs'] ?? env['ETL_REQUEST_TIMEOUT_MS'] ?? '60000',
    rankingProduct: overrides['rankingProduct'] ?? env['ETL_RANKING_PRODUCT'] ?? 'GASOLINA',
    logLevel: overrides['logLevel'] ?? env['LOG_LEVEL'] ?? 'info',
    nodeEnv: env['NODE_ENV'] ?? 'production',
  };

  const result = configSchema.safeParse(merged);
  if (!result.success) {
    const details = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ConfigError(`Invalid configuration: ${details}`, { cause: result.error });
  }
  return result.data;
}
