/**
 * CSV record sink.
 *
 * RFC 4180 style output: fields containing a comma, a double quote, CR or LF,
 * or starting with whitespace are quoted, with embedded quotes doubled.
 * Records end with LF.
 * @module csv
 */

import { SinkWriteError } from '../errors/index.js';
import type { CsvRecord, RecordSink } from '../types/index.js';

/**
 * Stream the writer sends its output to.
 */
export interface CsvDestination {
  write(chunk: string, callback: (error?: Error | null) => void): boolean;
}

/**
 * CSV writer options.
 */
export interface CsvWriterOptions {
  /** Buffered characters that trigger a write to the destination (default 4096) */
  bufferSize?: number;
}

const FIELD_NEEDS_QUOTES = /[",\r\n]|^\s/;

/**
 * Quotes a field when CSV requires it.
 */
export function quoteField(field: string): string {
  if (!FIELD_NEEDS_QUOTES.test(field)) {
    return field;
  }
  return `"${field.replace(/"/g, '""')}"`;
}

/**
 * Serializes one record, including its line terminator.
 *
 * A record of a single empty field is written as `""` so it cannot be
 * mistaken for the empty separator record.
 */
export function formatRecord(record: CsvRecord): string {
  if (record.length === 1 && record[0] === '') {
    return '""\n';
  }
  return `${record.map(quoteField).join(',')}\n`;
}

/**
 * Buffered CSV writer implementing the record sink.
 */
export class CsvWriter implements RecordSink {
  private readonly destination: CsvDestination;
  private readonly bufferSize: number;
  private buffer = '';
  private recordCount = 0;

  constructor(destination: CsvDestination, options: CsvWriterOptions = {}) {
    this.destination = destination;
    this.bufferSize = options.bufferSize ?? 4096;
  }

  /** Number of records accepted so far */
  get records(): number {
    return this.recordCount;
  }

  async write(record: CsvRecord): Promise<void> {
    this.buffer += formatRecord(record);
    this.recordCount++;
    if (this.buffer.length >= this.bufferSize) {
      await this.flush();
    }
  }

  async flush(): Promise<void> {
    if (this.buffer.length === 0) {
      return;
    }
    const chunk = this.buffer;
    this.buffer = '';
    await new Promise<void>((resolve, reject) => {
      try {
        this.destination.write(chunk, (error) => {
          if (error) {
            reject(new SinkWriteError(error));
          } else {
            resolve();
          }
        });
      } catch (error) {
        reject(new SinkWriteError(error));
      }
    });
  }
}
