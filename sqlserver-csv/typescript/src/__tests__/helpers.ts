/**
 * Shared test fixtures.
 */

import type { CsvDestination, CsvRecord, LogDestination, RecordSink } from '../index.js';

/**
 * Collects everything written to it.
 */
export class MemoryDestination implements CsvDestination, LogDestination {
  readonly chunks: string[] = [];
  failWith: Error | undefined;

  write(chunk: string, callback?: (error?: Error | null) => void): boolean {
    if (this.failWith !== undefined) {
      callback?.(this.failWith);
      return false;
    }
    this.chunks.push(chunk);
    callback?.();
    return true;
  }

  get text(): string {
    return this.chunks.join('');
  }
}

/**
 * Record sink keeping every record in memory.
 */
export class RecordingSink implements RecordSink {
  readonly records: CsvRecord[] = [];
  flushes = 0;

  async write(record: CsvRecord): Promise<void> {
    this.records.push([...record]);
  }

  async flush(): Promise<void> {
    this.flushes++;
  }
}

/**
 * A driver error carrying SQL Server's error token fields.
 */
export function serverError(message: string, number: number, lineNumber = 1): Error {
  return Object.assign(new Error(message), {
    number,
    state: 1,
    class: 16,
    lineNumber,
    serverName: 'sim-server',
    procName: '',
  });
}
