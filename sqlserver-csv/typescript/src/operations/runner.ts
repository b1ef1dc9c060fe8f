/**
 * Batch runner.
 *
 * Executes batches one at a time, flushing CSV output after each and
 * reporting per-batch failures on the error stream without stopping.
 * @module operations/runner
 */

import { v4 as uuidv4 } from 'uuid';
import { CsvWriter } from '../csv/index.js';
import type { CsvDestination } from '../csv/index.js';
import { ExecutionError, errorMessage } from '../errors/index.js';
import type { LogDestination, Logger } from '../observability/index.js';
import { NoopLogger } from '../observability/index.js';
import type { Batch, RecordSink } from '../types/index.js';
import type { ExecutionSummary } from './query.js';

/**
 * Anything able to execute a batch into a sink.
 */
export interface BatchExecutor {
  execute(text: string, sink: RecordSink): Promise<ExecutionSummary>;
}

/**
 * Batch runner options.
 */
export interface BatchRunnerOptions {
  /** Batches to execute, in order */
  batches: AsyncIterable<Batch>;
  /** Executes each batch */
  executor: BatchExecutor;
  /** CSV output, e.g. process.stdout */
  output: CsvDestination;
  /** Error reports, e.g. process.stderr */
  errors: LogDestination;
  /** Logger for run diagnostics */
  logger?: Logger;
}

/**
 * Outcome of a run.
 */
export interface RunSummary {
  /** Batches executed */
  batches: number;
  /** Batches that failed */
  failed: number;
}

/**
 * Formats a batch failure for the error stream.
 *
 * Errors reported by SQL Server add their structured detail as a JSON line.
 */
export function formatErrorReport(error: unknown): string {
  let report = `${errorMessage(error)}\n`;
  if (error instanceof ExecutionError && error.serverReported) {
    report += `${JSON.stringify(error.toJSON())}\n`;
  }
  return report;
}

/**
 * Runs every batch to completion.
 *
 * @throws {InputReadError} If reading the batches fails
 */
export async function runBatches(options: BatchRunnerOptions): Promise<RunSummary> {
  const logger = options.logger ?? new NoopLogger();
  const summary: RunSummary = { batches: 0, failed: 0 };

  for await (const batch of options.batches) {
    summary.batches++;
    const batchLogger = logger.child({ batch: batch.sequence, batchId: uuidv4() });
    const writer = new CsvWriter(options.output);

    let failure: unknown;
    try {
      const result = await options.executor.execute(batch.text, writer);
      batchLogger.info('Batch completed', {
        startLine: batch.startLine,
        resultSets: result.resultSets,
        rows: result.rowCounts.reduce((a, b) => a + b, 0),
        durationMs: result.durationMs,
      });
    } catch (error) {
      failure = error;
    }

    try {
      await writer.flush();
    } catch (error) {
      if (failure === undefined) {
        failure = error;
      } else {
        batchLogger.debug('Flush failed after batch error', { error: errorMessage(error) });
      }
    }

    if (failure !== undefined) {
      summary.failed++;
      batchLogger.info('Batch failed', {
        startLine: batch.startLine,
        error: errorMessage(failure),
      });
      options.errors.write(formatErrorReport(failure));
    }
  }

  logger.debug('Input exhausted', { ...summary });
  return summary;
}
