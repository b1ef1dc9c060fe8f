/**
 * Query execution.
 *
 * Submits one batch under a deadline and writes each of its result sets to
 * the sink as a blank-line-delimited CSV block.
 * @module operations/query
 */

import { QueryTimeoutError, toExecutionError, errorMessage } from '../errors/index.js';
import type { Logger } from '../observability/index.js';
import { NoopLogger } from '../observability/index.js';
import { DEFAULT_NULL_LITERAL, DEFAULT_QUERY_TIMEOUT_SECONDS } from '../types/index.js';
import type { QueryConnection, RecordSink, ResultCursor } from '../types/index.js';
import { streamResultSet } from './stream.js';

/** Largest delay setTimeout honors; longer delays fire immediately. */
const MAX_TIMER_DELAY_MS = 2147483647;

/**
 * Query executor options.
 */
export interface QueryExecutorOptions {
  /** Per-batch deadline in milliseconds (default 60s) */
  timeoutMs?: number;
  /** Text written for SQL NULL (default "NULL") */
  nullLiteral?: string;
  /** Logger for execution diagnostics */
  logger?: Logger;
}

/**
 * Outcome of one executed batch.
 */
export interface ExecutionSummary {
  /** Result sets seen, including those with zero columns */
  resultSets: number;
  /** Rows written per result set that had columns */
  rowCounts: number[];
  /** Wall-clock execution time in milliseconds */
  durationMs: number;
}

/**
 * Executes statement batches and projects their results to CSV.
 */
export class QueryExecutor {
  private readonly connection: QueryConnection;
  private readonly timeoutMs: number;
  private readonly nullLiteral: string;
  private readonly logger: Logger;

  /**
   * Creates a new QueryExecutor.
   *
   * @param connection - Open database connection
   * @param options - Deadline, null literal and logger
   */
  constructor(connection: QueryConnection, options: QueryExecutorOptions = {}) {
    this.connection = connection;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_QUERY_TIMEOUT_SECONDS * 1000;
    this.nullLiteral = options.nullLiteral ?? DEFAULT_NULL_LITERAL;
    this.logger = options.logger ?? new NoopLogger();
  }

  /**
   * Executes one batch and writes its result sets to the sink.
   *
   * An empty separator record precedes every result set. Result sets with
   * zero columns produce only the separator.
   *
   * @param text - Statement text, passed through verbatim
   * @param sink - Destination for the CSV records
   * @returns Result-set and row counts
   * @throws {ExecutionError} If submission, iteration or close fails
   * @throws {QueryTimeoutError} If the deadline elapses
   * @throws {QueryRowError} If a row cannot be formatted
   * @throws {SinkWriteError} If the sink fails
   */
  async execute(text: string, sink: RecordSink): Promise<ExecutionSummary> {
    const startTime = Date.now();
    const controller = new AbortController();
    const timer = setTimeout(() => {
      this.logger.warn('Query deadline exceeded, cancelling', { timeoutMs: this.timeoutMs });
      controller.abort(new QueryTimeoutError(this.timeoutMs));
    }, Math.min(this.timeoutMs, MAX_TIMER_DELAY_MS));

    try {
      this.logger.debug('Executing query', {
        query: redactQuery(text),
        timeoutMs: this.timeoutMs,
      });

      let cursor: ResultCursor;
      try {
        cursor = await this.connection.query(text, controller.signal);
      } catch (error) {
        throw this.wrapError(error, 'error executing query', controller.signal);
      }

      const summary = await this.drain(cursor, sink, controller.signal);
      const durationMs = Date.now() - startTime;

      this.logger.debug('Query executed successfully', {
        resultSets: summary.resultSets,
        rowCounts: summary.rowCounts,
        durationMs,
      });

      return { ...summary, durationMs };
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * Walks every result set of the cursor, then closes it.
   */
  private async drain(
    cursor: ResultCursor,
    sink: RecordSink,
    signal: AbortSignal
  ): Promise<Omit<ExecutionSummary, 'durationMs'>> {
    let resultSets = 0;
    const rowCounts: number[] = [];

    try {
      do {
        resultSets++;
        await sink.write([]);

        if (cursor.columns.length > 0) {
          const rows = await streamResultSet(cursor.columns, cursor.rows(), sink, {
            nullLiteral: this.nullLiteral,
            signal,
          });
          rowCounts.push(rows);
          this.logger.trace('Result set written', { resultSet: resultSets, rows });
        }
      } while (await cursor.nextResultSet());
    } catch (error) {
      await this.closeAfterFailure(cursor);
      throw this.wrapError(error, 'error reading result set', signal);
    }

    try {
      await cursor.close();
    } catch (error) {
      throw this.wrapError(error, 'error from result set', signal);
    }

    return { resultSets, rowCounts };
  }

  private async closeAfterFailure(cursor: ResultCursor): Promise<void> {
    try {
      await cursor.close();
    } catch (closeError) {
      // The original failure is the one reported.
      this.logger.debug('Error closing result cursor after failure', {
        error: errorMessage(closeError),
      });
    }
  }

  private wrapError(error: unknown, context: string, signal: AbortSignal): Error {
    if (signal.aborted && signal.reason instanceof QueryTimeoutError) {
      return signal.reason;
    }
    return toExecutionError(error, context, this.timeoutMs);
  }
}

function redactQuery(query: string): string {
  const maxLength = 200;
  if (query.length <= maxLength) {
    return query;
  }
  return query.substring(0, maxLength) + '...';
}
