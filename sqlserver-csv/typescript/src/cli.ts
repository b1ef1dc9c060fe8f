/**
 * Command-line entry point.
 *
 * Parses options, opens and checks the connection, then runs every batch
 * read from stdin. Fatal errors print one line on stderr and exit with
 * status 1; per-batch failures do not change the exit status.
 * @module cli
 */

import type { Readable } from 'stream';
import { v4 as uuidv4 } from 'uuid';
import { USAGE, createRunConfig, parseCliArgs, redactConfig } from './config/index.js';
import type { CliOptions, Environment, RunConfig } from './config/index.js';
import { SqlServerConnection } from './connection/index.js';
import type { CsvDestination } from './csv/index.js';
import { errorMessage } from './errors/index.js';
import { ConsoleLogger } from './observability/index.js';
import type { LogDestination, Logger } from './observability/index.js';
import { readBatches } from './operations/batch.js';
import { QueryExecutor } from './operations/query.js';
import { runBatches } from './operations/runner.js';
import type { ConnectionConfig, QueryConnection } from './types/index.js';

/**
 * Process streams the CLI works on.
 */
export interface CliIo {
  stdin: Readable;
  stdout: CsvDestination;
  stderr: LogDestination;
}

/**
 * A connection the CLI can check and close.
 */
export interface ManagedConnection extends QueryConnection {
  ping(): Promise<void>;
  close(): Promise<void>;
}

/**
 * Replaceable collaborators.
 */
export interface CliDependencies {
  /** Creates the connection (default: SqlServerConnection) */
  connect?: (config: ConnectionConfig, logger: Logger) => ManagedConnection;
  /** Logger (default: ConsoleLogger on stderr at the configured level) */
  logger?: Logger;
}

function writeOut(stdout: CsvDestination, text: string): Promise<void> {
  return new Promise((resolve, reject) => {
    stdout.write(text, (error) => (error ? reject(error) : resolve()));
  });
}

/**
 * Runs the CLI.
 *
 * @param argv - Arguments without the node and script paths
 * @param env - Environment, for --csenv and the log level default
 * @returns Process exit status
 */
export async function main(
  argv: readonly string[],
  env: Environment,
  io: CliIo,
  deps: CliDependencies = {}
): Promise<number> {
  let options: CliOptions;
  let config: RunConfig;
  try {
    options = parseCliArgs(argv, env);
    if (options.help) {
      await writeOut(io.stdout, USAGE);
      return 0;
    }
    config = createRunConfig(options, env);
  } catch (error) {
    io.stderr.write(`${errorMessage(error)}\n`);
    return 1;
  }

  const logger =
    deps.logger ??
    new ConsoleLogger({ level: config.logLevel, destination: io.stderr, context: { runId: uuidv4() } });
  logger.debug('Configuration loaded', {
    connection: redactConfig(config.connection),
    nullLiteral: config.nullLiteral,
    timeoutMs: config.timeoutMs,
  });

  const connect = deps.connect ?? ((connection, log) => new SqlServerConnection(connection, { logger: log }));
  const connection = connect(config.connection, logger);

  try {
    await connection.ping();

    const executor = new QueryExecutor(connection, {
      timeoutMs: config.timeoutMs,
      nullLiteral: config.nullLiteral,
      logger,
    });
    const summary = await runBatches({
      batches: readBatches(io.stdin, { logger }),
      executor,
      output: io.stdout,
      errors: io.stderr,
      logger,
    });

    logger.info('Run complete', { batches: summary.batches, failed: summary.failed });
    return 0;
  } catch (error) {
    io.stderr.write(`${errorMessage(error)}\n`);
    return 1;
  } finally {
    try {
      await connection.close();
    } catch (error) {
      logger.warn('Error closing connection', { error: errorMessage(error) });
    }
  }
}
