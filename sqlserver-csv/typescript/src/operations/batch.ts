/**
 * Batch splitting.
 *
 * Accumulates input lines until a `GO` line and yields the accumulated text
 * as one batch.
 * @module operations/batch
 */

import { createInterface } from 'readline';
import type { Readable } from 'stream';
import { InputReadError } from '../errors/index.js';
import type { Logger } from '../observability/index.js';
import { NoopLogger } from '../observability/index.js';
import { BATCH_SEPARATOR } from '../types/index.js';
import type { Batch } from '../types/index.js';

/**
 * Batch reader options.
 */
export interface BatchReaderOptions {
  /** Logger for input diagnostics */
  logger?: Logger;
}

/**
 * Whether a line terminates the pending batch.
 */
export function isBatchSeparator(line: string): boolean {
  return line.trim().toUpperCase() === BATCH_SEPARATOR;
}

/**
 * Splits a line stream into GO-terminated batches.
 *
 * Each line of a batch is re-terminated with CRLF. Text after the last GO
 * line is never executed.
 *
 * @param lines - Input lines without terminators
 */
export async function* splitBatches(
  lines: AsyncIterable<string> | Iterable<string>,
  options: BatchReaderOptions = {}
): AsyncGenerator<Batch> {
  const logger = options.logger ?? new NoopLogger();
  let text = '';
  let lineNumber = 0;
  let startLine = 1;
  let sequence = 0;

  for await (const line of lines) {
    lineNumber++;
    if (isBatchSeparator(line)) {
      sequence++;
      yield { sequence, text, startLine };
      text = '';
      startLine = lineNumber + 1;
    } else {
      text += `${line}\r\n`;
    }
  }

  if (text.length > 0) {
    logger.debug('Discarding trailing batch without GO', {
      startLine,
      length: text.length,
    });
  }
}

/**
 * Reads GO-terminated batches from a stream.
 *
 * @param input - Statement text, e.g. process.stdin
 * @throws {InputReadError} If the stream fails
 */
export async function* readBatches(
  input: Readable,
  options: BatchReaderOptions = {}
): AsyncGenerator<Batch> {
  const lines = createInterface({ input, crlfDelay: Infinity, terminal: false });
  let lastLine = 0;

  async function* numbered(): AsyncGenerator<string> {
    try {
      for await (const line of lines) {
        lastLine++;
        yield line;
      }
    } catch (error) {
      throw new InputReadError(error, lastLine + 1);
    }
  }

  try {
    yield* splitBatches(numbered(), options);
  } finally {
    lines.close();
  }
}
