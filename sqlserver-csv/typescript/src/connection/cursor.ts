/**
 * Result cursor over a streaming mssql request.
 *
 * The driver pushes `recordset`, `row`, `error` and `done` events; the
 * cursor queues them and lets the executor pull result sets and rows in
 * order. The request is paused while the queue is over its high-water mark.
 * @module connection/cursor
 */

import type { Logger } from '../observability/index.js';
import { NoopLogger } from '../observability/index.js';
import { errorMessage } from '../errors/index.js';
import {
  NULL_CELL,
  NVARCHAR_MAX_LENGTH,
  RawCellValue,
  VARCHAR_MAX_LENGTH,
} from '../types/index.js';
import type { ColumnDescriptor, RawRow, ResultCursor } from '../types/index.js';

/**
 * The part of mssql.Request the cursor drives.
 */
export interface StreamingRequest {
  stream: boolean;
  arrayRowMode: boolean;
  on(event: string, listener: (...args: unknown[]) => void): this;
  query(command: string): Promise<unknown>;
  pause(): unknown;
  resume(): unknown;
  cancel(): unknown;
}

/**
 * Cursor options.
 */
export interface MssqlCursorOptions {
  /** Cancels the request once aborted; the abort reason becomes the error */
  signal: AbortSignal;
  /** Logger for driver diagnostics */
  logger?: Logger;
  /** Queued events that pause the request (default 512) */
  highWaterMark?: number;
}

type CursorEvent =
  | { readonly type: 'recordset'; readonly columns: readonly ColumnDescriptor[] }
  | { readonly type: 'row'; readonly row: RawRow }
  | { readonly type: 'end' };

const END: CursorEvent = { type: 'end' };

/** dataLength the driver reports for (MAX) types */
const DRIVER_MAX_DATA_LENGTH = 65535;

/**
 * Forward-only cursor fed by a streaming request.
 */
export class MssqlResultCursor implements ResultCursor {
  private readonly request: StreamingRequest;
  private readonly signal: AbortSignal;
  private readonly logger: Logger;
  private readonly highWaterMark: number;
  private readonly queue: CursorEvent[] = [];
  private readonly onAbort = (): void => this.abort();
  private streamColumns: readonly ColumnDescriptor[] = [];
  private currentColumns: readonly ColumnDescriptor[] = [];
  private lookahead: CursorEvent | undefined;
  private wake: (() => void) | undefined;
  private ended = false;
  private drained = false;
  private closed = false;
  private paused = false;
  private failed = false;
  private failure: unknown;

  private constructor(request: StreamingRequest, options: MssqlCursorOptions) {
    this.request = request;
    this.signal = options.signal;
    this.logger = options.logger ?? new NoopLogger();
    this.highWaterMark = options.highWaterMark ?? 512;
  }

  /**
   * Submits the batch and waits for its first result set or completion.
   *
   * @throws The driver error, or the abort reason, if the batch fails before
   *   producing a result set
   */
  static async open(
    request: StreamingRequest,
    text: string,
    options: MssqlCursorOptions
  ): Promise<MssqlResultCursor> {
    options.signal.throwIfAborted();

    const cursor = new MssqlResultCursor(request, options);
    cursor.start(text);

    let first = await cursor.take();
    while (first.type === 'row') {
      first = await cursor.take();
    }

    if (first.type === 'recordset') {
      cursor.currentColumns = first.columns;
      return cursor;
    }

    cursor.detach();
    if (cursor.failed) {
      throw cursor.failure;
    }
    return cursor;
  }

  get columns(): readonly ColumnDescriptor[] {
    return this.currentColumns;
  }

  async *rows(): AsyncGenerator<RawRow> {
    for (;;) {
      const event = await this.next();
      if (event.type !== 'row') {
        if (event.type === 'recordset') {
          this.lookahead = event;
        }
        return;
      }
      yield event.row;
    }
  }

  async nextResultSet(): Promise<boolean> {
    for (;;) {
      const event = await this.next();
      if (event.type === 'row') {
        continue;
      }
      if (event.type === 'recordset') {
        this.currentColumns = event.columns;
        return true;
      }
      return false;
    }
  }

  async close(): Promise<void> {
    if (!this.closed) {
      if (!this.ended) {
        this.ended = true;
        this.logger.debug('Cancelling unfinished request');
        this.request.cancel();
      }
      this.detach();
      this.queue.length = 0;
      this.notify();
    }
    if (this.failed) {
      throw this.failure;
    }
  }

  private start(text: string): void {
    this.signal.addEventListener('abort', this.onAbort, { once: true });

    this.request.stream = true;
    this.request.arrayRowMode = true;

    this.request.on('recordset', (metadata) => {
      this.streamColumns = describeColumns(metadata);
      this.logger.trace('Result set started', { columns: this.streamColumns.length });
      this.push({ type: 'recordset', columns: this.streamColumns });
    });
    this.request.on('row', (row) => {
      this.push({ type: 'row', row: decodeRow(this.streamColumns, row) });
    });
    this.request.on('error', (error) => this.fail(error));
    this.request.on('done', () => this.finish());

    void this.request.query(text).then(
      () => this.finish(),
      (error: unknown) => this.fail(error)
    );
  }

  private push(event: CursorEvent): void {
    if (this.ended) {
      return;
    }
    this.queue.push(event);
    if (!this.paused && this.queue.length > this.highWaterMark) {
      this.paused = true;
      this.request.pause();
    }
    this.notify();
  }

  private fail(error: unknown): void {
    if (this.ended) {
      this.logger.debug('Ignoring driver error after end of batch', { error: errorMessage(error) });
      return;
    }
    this.failed = true;
    this.failure = error;
    this.finish();
  }

  private finish(): void {
    if (this.ended) {
      return;
    }
    this.queue.push(END);
    this.ended = true;
    this.notify();
  }

  private abort(): void {
    const running = !this.ended;
    this.fail(this.signal.reason);
    if (running) {
      this.request.cancel();
    }
  }

  private detach(): void {
    this.closed = true;
    this.signal.removeEventListener('abort', this.onAbort);
  }

  private notify(): void {
    const wake = this.wake;
    this.wake = undefined;
    wake?.();
  }

  private async next(): Promise<CursorEvent> {
    const event = this.lookahead;
    if (event !== undefined) {
      this.lookahead = undefined;
      return event;
    }
    return this.take();
  }

  private async take(): Promise<CursorEvent> {
    for (;;) {
      if (this.drained || this.closed) {
        return END;
      }
      const event = this.queue.shift();
      if (event !== undefined) {
        if (event.type === 'end') {
          this.drained = true;
        }
        if (this.paused && this.queue.length <= this.highWaterMark / 2) {
          this.paused = false;
          this.request.resume();
        }
        return event;
      }
      await new Promise<void>((resolve) => {
        this.wake = resolve;
      });
    }
  }
}

// ============================================================================
// Metadata and Value Decoding
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function readNumber(record: Record<string, unknown>, key: string): number | undefined {
  const value = record[key];
  return typeof value === 'number' ? value : undefined;
}

function typeDeclaration(type: unknown): string {
  if ((typeof type === 'function' || isRecord(type)) && 'declaration' in type) {
    const declaration = type.declaration;
    if (typeof declaration === 'string') {
      return declaration.toUpperCase();
    }
  }
  return '';
}

function columnLength(typeName: string, dataLength: number | undefined): number | undefined {
  // The driver leaves dataLength unset for XML.
  switch (typeName) {
    case 'TEXT':
    case 'IMAGE':
      return 2147483647;
    case 'NTEXT':
      return 1073741823;
    case 'XML':
      return NVARCHAR_MAX_LENGTH;
    default:
      break;
  }
  if (dataLength === undefined) {
    return undefined;
  }
  switch (typeName) {
    case 'VARCHAR':
    case 'CHAR':
    case 'VARBINARY':
    case 'BINARY':
      return dataLength === DRIVER_MAX_DATA_LENGTH ? VARCHAR_MAX_LENGTH : dataLength;
    case 'NVARCHAR':
    case 'NCHAR':
      return dataLength === DRIVER_MAX_DATA_LENGTH ? NVARCHAR_MAX_LENGTH : Math.floor(dataLength / 2);
    default:
      return undefined;
  }
}

/**
 * Converts one column's driver metadata to a descriptor.
 *
 * Lengths follow SQL Server's declared sizes: NVARCHAR/NCHAR in characters,
 * and the (MAX) types as their sentinel lengths.
 */
export function describeColumn(metadata: unknown): ColumnDescriptor {
  if (!isRecord(metadata)) {
    return { name: '', databaseTypeName: '' };
  }

  const name = typeof metadata.name === 'string' ? metadata.name : '';
  const databaseTypeName = typeDeclaration(metadata.type);
  const length = columnLength(databaseTypeName, readNumber(metadata, 'length'));
  const nullable = typeof metadata.nullable === 'boolean' ? metadata.nullable : undefined;

  let decimalSize: ColumnDescriptor['decimalSize'];
  if (databaseTypeName === 'DECIMAL' || databaseTypeName === 'NUMERIC') {
    const precision = readNumber(metadata, 'precision');
    const scale = readNumber(metadata, 'scale');
    if (precision !== undefined && scale !== undefined) {
      decimalSize = { precision, scale };
    }
  }

  return {
    name,
    databaseTypeName,
    ...(nullable === undefined ? {} : { nullable }),
    ...(length === undefined ? {} : { length }),
    ...(decimalSize === undefined ? {} : { decimalSize }),
  };
}

/**
 * Converts a `recordset` event payload to descriptors in column order.
 *
 * Array row mode delivers an array; otherwise columns are keyed by name and
 * ordered by their `index`.
 */
export function describeColumns(metadata: unknown): ColumnDescriptor[] {
  if (Array.isArray(metadata)) {
    return metadata.map((column: unknown) => describeColumn(column));
  }
  if (!isRecord(metadata)) {
    return [];
  }
  return Object.values(metadata)
    .map((column, position) => ({
      column,
      index: isRecord(column) ? readNumber(column, 'index') ?? position : position,
    }))
    .sort((a, b) => a.index - b.index)
    .map(({ column }) => describeColumn(column));
}

/**
 * Converts one driver value to a raw cell.
 *
 * BIGINT values the driver delivers as strings become bigints.
 */
export function decodeCell(column: ColumnDescriptor | undefined, value: unknown): RawCellValue {
  if (value === null || value === undefined) {
    return NULL_CELL;
  }
  switch (typeof value) {
    case 'boolean':
      return RawCellValue.boolean(value);
    case 'number':
      return Number.isInteger(value) ? RawCellValue.integer(value) : RawCellValue.float(value);
    case 'bigint':
      return RawCellValue.integer(value);
    case 'string':
      if (column?.databaseTypeName === 'BIGINT' && /^-?\d+$/.test(value)) {
        return RawCellValue.integer(BigInt(value));
      }
      return RawCellValue.text(value);
    default:
      break;
  }
  if (value instanceof Uint8Array) {
    return RawCellValue.bytes(value);
  }
  if (value instanceof Date) {
    return RawCellValue.datetime(value);
  }
  return RawCellValue.text(JSON.stringify(value) ?? String(value));
}

/**
 * Converts a `row` event payload to raw cells in column order.
 */
export function decodeRow(columns: readonly ColumnDescriptor[], row: unknown): RawRow {
  const values: unknown[] = Array.isArray(row) ? row : isRecord(row) ? Object.values(row) : [row];
  return values.map((value, i) => decodeCell(columns[i], value));
}
