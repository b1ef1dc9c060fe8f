/**
 * Tests for the streaming mssql cursor.
 */

import { EventEmitter } from 'events';
import {
  MssqlResultCursor,
  describeColumn,
  describeColumns,
  decodeCell,
  renderColumnLabel,
  RawCellValue,
  QueryTimeoutError,
  NVARCHAR_MAX_LENGTH,
  VARCHAR_MAX_LENGTH,
} from '../index.js';
import type { RawRow, ResultCursor, StreamingRequest } from '../index.js';

class FakeRequest extends EventEmitter implements StreamingRequest {
  stream = false;
  arrayRowMode = false;
  readonly submitted: string[] = [];
  pauses = 0;
  resumes = 0;
  cancels = 0;

  query(command: string): Promise<unknown> {
    this.submitted.push(command);
    return new Promise((resolve) => {
      this.once('done', resolve);
    });
  }

  pause(): boolean {
    this.pauses++;
    return true;
  }

  resume(): boolean {
    this.resumes++;
    return true;
  }

  cancel(): void {
    this.cancels++;
  }
}

const intColumn = (name: string, index = 0) => ({
  index,
  name,
  length: 4,
  type: { declaration: 'int' },
  nullable: false,
  precision: 10,
  scale: 0,
});

async function readRows(cursor: ResultCursor): Promise<RawRow[]> {
  const rows: RawRow[] = [];
  for await (const row of cursor.rows()) {
    rows.push(row);
  }
  return rows;
}

describe('MssqlResultCursor', () => {
  it('should stream one result set', async () => {
    const request = new FakeRequest();
    const opening = MssqlResultCursor.open(request, 'SELECT 1 AS x', { signal: new AbortController().signal });
    request.emit('recordset', [intColumn('x')]);
    request.emit('row', [1]);
    request.emit('done', {});

    const cursor = await opening;

    expect(request.stream).toBe(true);
    expect(request.arrayRowMode).toBe(true);
    expect(request.submitted).toEqual(['SELECT 1 AS x']);
    expect(cursor.columns).toEqual([{ name: 'x', databaseTypeName: 'INT', nullable: false }]);
    expect(await readRows(cursor)).toEqual([[RawCellValue.integer(1)]]);
    expect(await cursor.nextResultSet()).toBe(false);
    await expect(cursor.close()).resolves.toBeUndefined();
  });

  it('should advance through result sets, skipping unread rows', async () => {
    const request = new FakeRequest();
    const opening = MssqlResultCursor.open(request, 'q', { signal: new AbortController().signal });
    request.emit('recordset', [intColumn('a')]);
    request.emit('row', [1]);
    request.emit('row', [2]);
    request.emit('recordset', [intColumn('b')]);
    request.emit('row', [3]);
    request.emit('done', {});

    const cursor = await opening;
    expect(await cursor.nextResultSet()).toBe(true);
    expect(cursor.columns.map(c => c.name)).toEqual(['b']);
    expect(await readRows(cursor)).toEqual([[RawCellValue.integer(3)]]);
    expect(await cursor.nextResultSet()).toBe(false);
  });

  it('should stop a row sequence at the next result set', async () => {
    const request = new FakeRequest();
    const opening = MssqlResultCursor.open(request, 'q', { signal: new AbortController().signal });
    request.emit('recordset', [intColumn('a')]);
    request.emit('row', [1]);
    request.emit('recordset', [intColumn('b')]);
    request.emit('done', {});

    const cursor = await opening;
    expect(await readRows(cursor)).toEqual([[RawCellValue.integer(1)]]);
    expect(await cursor.nextResultSet()).toBe(true);
    expect(await readRows(cursor)).toEqual([]);
    expect(await cursor.nextResultSet()).toBe(false);
  });

  it('should present a batch without result sets as zero columns', async () => {
    const request = new FakeRequest();
    const opening = MssqlResultCursor.open(request, 'UPDATE t SET x = 1', { signal: new AbortController().signal });
    request.emit('done', { rowsAffected: [3] });

    const cursor = await opening;
    expect(cursor.columns).toEqual([]);
    expect(await cursor.nextResultSet()).toBe(false);
    await cursor.close();
    expect(request.cancels).toBe(0);
  });

  it('should reject when the batch fails before its first result set', async () => {
    const request = new FakeRequest();
    const failure = new Error("Invalid object name 'nope'.");
    const opening = MssqlResultCursor.open(request, 'q', { signal: new AbortController().signal });
    request.emit('error', failure);
    request.emit('done', {});

    await expect(opening).rejects.toBe(failure);
  });

  it('should end rows on a later error and throw it from close', async () => {
    const request = new FakeRequest();
    const failure = new Error('Divide by zero error encountered.');
    const opening = MssqlResultCursor.open(request, 'q', { signal: new AbortController().signal });
    request.emit('recordset', [intColumn('x')]);
    request.emit('row', [1]);
    request.emit('error', failure);
    request.emit('row', [2]);
    request.emit('done', {});

    const cursor = await opening;
    expect(await readRows(cursor)).toEqual([[RawCellValue.integer(1)]]);
    expect(await cursor.nextResultSet()).toBe(false);
    await expect(cursor.close()).rejects.toBe(failure);
  });

  it('should cancel the request when the signal aborts', async () => {
    const request = new FakeRequest();
    const controller = new AbortController();
    const opening = MssqlResultCursor.open(request, 'q', { signal: controller.signal });
    request.emit('recordset', [intColumn('x')]);
    request.emit('row', [1]);

    const cursor = await opening;
    const timeout = new QueryTimeoutError(10);
    controller.abort(timeout);

    expect(request.cancels).toBe(1);
    expect(await readRows(cursor)).toEqual([[RawCellValue.integer(1)]]);
    await expect(cursor.close()).rejects.toBe(timeout);
  });

  it('should refuse to start once the signal has aborted', async () => {
    const request = new FakeRequest();
    const controller = new AbortController();
    const timeout = new QueryTimeoutError(10);
    controller.abort(timeout);

    await expect(MssqlResultCursor.open(request, 'q', { signal: controller.signal })).rejects.toBe(timeout);
    expect(request.submitted).toEqual([]);
  });

  it('should pause the request while the queue is full', async () => {
    const request = new FakeRequest();
    const opening = MssqlResultCursor.open(request, 'q', {
      signal: new AbortController().signal,
      highWaterMark: 2,
    });
    request.emit('recordset', [intColumn('x')]);
    request.emit('row', [1]);
    request.emit('row', [2]);
    request.emit('row', [3]);
    request.emit('done', {});
    expect(request.pauses).toBe(1);

    const cursor = await opening;
    expect(await readRows(cursor)).toHaveLength(3);
    expect(request.resumes).toBe(1);
  });

  it('should cancel an unfinished request on close', async () => {
    const request = new FakeRequest();
    const opening = MssqlResultCursor.open(request, 'q', { signal: new AbortController().signal });
    request.emit('recordset', [intColumn('x')]);

    const cursor = await opening;
    await cursor.close();
    request.emit('error', new Error('Canceled.'));

    expect(request.cancels).toBe(1);
    await expect(cursor.close()).resolves.toBeUndefined();
  });
});

describe('describeColumn', () => {
  const meta = (declaration: string, length: number | undefined, extra: Record<string, unknown> = {}) => ({
    index: 0,
    name: 'c',
    length,
    type: { declaration },
    nullable: true,
    ...extra,
  });

  it('should report n-type lengths in characters', () => {
    expect(describeColumn(meta('nvarchar', 100)).length).toBe(50);
    expect(describeColumn(meta('nchar', 20)).length).toBe(10);
  });

  it('should report max types with their sentinel lengths', () => {
    expect(describeColumn(meta('nvarchar', 65535)).length).toBe(NVARCHAR_MAX_LENGTH);
    expect(describeColumn(meta('varchar', 65535)).length).toBe(VARCHAR_MAX_LENGTH);
    expect(describeColumn(meta('varbinary', 65535)).length).toBe(VARCHAR_MAX_LENGTH);
    expect(describeColumn(meta('xml', undefined)).length).toBe(NVARCHAR_MAX_LENGTH);
    expect(describeColumn(meta('ntext', 0)).length).toBe(1073741823);
    expect(describeColumn(meta('text', 0)).length).toBe(2147483647);
  });

  it('should render XML columns as max length without a driver length', () => {
    const column = describeColumn({ ...meta('xml', undefined), name: 'doc' });
    expect(renderColumnLabel(column)).toBe('[doc] XML(max) NULL');
  });

  it('should report lengths only for variable-length types', () => {
    expect(describeColumn(meta('int', 4))).toEqual({ name: 'c', databaseTypeName: 'INT', nullable: true });
  });

  it('should report precision and scale for decimals', () => {
    expect(describeColumn(meta('decimal', 9, { precision: 10, scale: 2 }))).toEqual({
      name: 'c',
      databaseTypeName: 'DECIMAL',
      nullable: true,
      decimalSize: { precision: 10, scale: 2 },
    });
    expect(describeColumn(meta('money', 8, { precision: 19, scale: 4 })).decimalSize).toBeUndefined();
  });

  it('should read the declaration from driver type functions', () => {
    const type = Object.assign(() => undefined, { declaration: 'uniqueidentifier' });
    expect(describeColumn({ name: 'id', type, nullable: false }).databaseTypeName).toBe('UNIQUEIDENTIFIER');
  });

  it('should order keyed column metadata by index', () => {
    const columns = describeColumns({ b: intColumn('b', 1), a: intColumn('a', 0) });
    expect(columns.map(c => c.name)).toEqual(['a', 'b']);
  });
});

describe('decodeCell', () => {
  const column = (databaseTypeName: string) => ({ name: 'c', databaseTypeName });

  it('should decode driver values into raw cells', () => {
    expect(decodeCell(column('INT'), null)).toEqual(RawCellValue.null());
    expect(decodeCell(column('BIT'), true)).toEqual(RawCellValue.boolean(true));
    expect(decodeCell(column('INT'), 7)).toEqual(RawCellValue.integer(7));
    expect(decodeCell(column('FLOAT'), 1.5)).toEqual(RawCellValue.float(1.5));
    expect(decodeCell(column('NVARCHAR'), '42')).toEqual(RawCellValue.text('42'));
  });

  it('should decode BIGINT strings as bigints', () => {
    expect(decodeCell(column('BIGINT'), '9007199254740993')).toEqual(RawCellValue.integer(9007199254740993n));
  });

  it('should keep bytes and dates', () => {
    const bytes = Buffer.from([1, 2]);
    const date = new Date(Date.UTC(2024, 0, 1));
    expect(decodeCell(column('VARBINARY'), bytes)).toEqual({ kind: 'bytes', value: bytes });
    expect(decodeCell(column('DATE'), date)).toEqual({ kind: 'datetime', value: date });
  });

  it('should render other objects as JSON text', () => {
    expect(decodeCell(column('GEOGRAPHY'), { x: 1 })).toEqual(RawCellValue.text('{"x":1}'));
  });
});
