/**
 * Result-set streaming.
 *
 * Writes one result set to a record sink as a header record followed by one
 * record per row, in driver order, without buffering the result set.
 * @module operations/stream
 */

import { QueryRowError } from '../errors/index.js';
import { formatValue } from '../formatting/value.js';
import { renderHeader } from '../formatting/header.js';
import type { ColumnDescriptor, RawRow, RecordSink } from '../types/index.js';

/**
 * Result-set streaming options.
 */
export interface StreamOptions {
  /** Text written for SQL NULL */
  nullLiteral: string;
  /** Stops the stream before the next row once aborted */
  signal?: AbortSignal;
}

/**
 * Streams one result set to the sink.
 *
 * Rows written before a failure stay written.
 *
 * @param columns - Columns of the result set (at least one)
 * @param rows - The result set's rows, consumed once
 * @param sink - Destination for the header and row records
 * @returns Number of rows written
 * @throws {QueryRowError} If a row cannot be decoded or formatted
 * @throws {SinkWriteError} If the sink fails
 */
export async function streamResultSet(
  columns: readonly ColumnDescriptor[],
  rows: AsyncIterable<RawRow>,
  sink: RecordSink,
  options: StreamOptions
): Promise<number> {
  await sink.write(renderHeader(columns));

  let rowCount = 0;
  for await (const row of rows) {
    options.signal?.throwIfAborted();

    const record = formatRow(columns, row, options.nullLiteral, rowCount + 1);
    await sink.write(record);
    rowCount++;
  }

  return rowCount;
}

/**
 * Formats every cell of one row.
 *
 * @param rowNumber - 1-based row index, for error reporting
 * @throws {QueryRowError} If the row is malformed or a cell fails to format
 */
export function formatRow(
  columns: readonly ColumnDescriptor[],
  row: RawRow,
  nullLiteral: string,
  rowNumber: number
): string[] {
  if (row.length !== columns.length) {
    throw new QueryRowError(
      rowNumber,
      new Error(`expected ${columns.length} values, got ${row.length}`)
    );
  }

  const record = new Array<string>(columns.length);
  for (let i = 0; i < columns.length; i++) {
    const column = columns[i];
    const value = row[i];
    if (column === undefined || value === undefined) {
      throw new QueryRowError(rowNumber, new Error(`missing value for column ${i + 1}`));
    }
    try {
      record[i] = formatValue(column, value, nullLiteral);
    } catch (error) {
      throw new QueryRowError(rowNumber, error);
    }
  }
  return record;
}
