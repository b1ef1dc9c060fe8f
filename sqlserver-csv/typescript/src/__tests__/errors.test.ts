/**
 * Tests for error types.
 */

import {
  SqlServerError,
  SqlServerErrorCode,
  ConnectionFailedError,
  ExecutionError,
  QueryTimeoutError,
  QueryRowError,
  MalformedIdentifierError,
  InputReadError,
  isSqlServerError,
  readServerError,
  isDriverTimeout,
  toExecutionError,
  redactConnectionString,
} from '../index.js';
import { serverError } from './helpers.js';

describe('error types', () => {
  it('should share the base class and carry codes', () => {
    const error = new QueryTimeoutError(60000);

    expect(error).toBeInstanceOf(ExecutionError);
    expect(error).toBeInstanceOf(SqlServerError);
    expect(isSqlServerError(error)).toBe(true);
    expect(error.code).toBe(SqlServerErrorCode.QueryTimeout);
    expect(error.serverReported).toBe(false);
  });

  it('should describe connection failures', () => {
    expect(new ConnectionFailedError('db.test', 1433).message).toBe('Failed to connect to SQL Server at db.test:1433');
  });

  it('should number failing rows', () => {
    const error = new QueryRowError(3, new MalformedIdentifierError('invalid UUID (got 4 bytes)'));

    expect(error.message).toBe('error in row 3: Malformed UNIQUEIDENTIFIER: invalid UUID (got 4 bytes)');
    expect(error.row).toBe(3);
    expect(error.cause).toBeInstanceOf(MalformedIdentifierError);
  });

  it('should record the failing input line', () => {
    expect(new InputReadError(new Error('EIO'), 12).toJSON()).toMatchObject({
      code: 'INPUT_READ',
      message: 'Failed to read input: EIO',
      details: { line: 12 },
    });
  });
});

describe('readServerError', () => {
  it('should read the server error fields', () => {
    expect(readServerError(serverError('Divide by zero error encountered.', 8134, 3))).toEqual({
      number: 8134,
      state: 1,
      class: 16,
      message: 'Divide by zero error encountered.',
      serverName: 'sim-server',
      procName: '',
      lineNumber: 3,
    });
  });

  it('should ignore errors without a server error number', () => {
    expect(readServerError(new Error('socket hang up'))).toBeUndefined();
    expect(readServerError(Object.assign(new Error('timeout'), { number: -2 }))).toBeUndefined();
    expect(readServerError('text')).toBeUndefined();
  });
});

describe('toExecutionError', () => {
  it('should pass sqlserver-csv errors through', () => {
    const error = new QueryRowError(1, new Error('bad'));
    expect(toExecutionError(error, 'error reading result set')).toBe(error);
  });

  it('should prefix driver errors with the failing step', () => {
    const error = toExecutionError(new Error('socket hang up'), 'error executing query');

    expect(error).toBeInstanceOf(ExecutionError);
    expect(error.message).toBe('error executing query: socket hang up');
    expect(error.toJSON()['serverReported']).toBe(false);
  });

  it('should map driver timeouts', () => {
    const timeout = Object.assign(new Error('Timeout'), { code: 'ETIMEOUT' });

    expect(isDriverTimeout(timeout)).toBe(true);
    expect(isDriverTimeout(new Error('other'))).toBe(false);
    expect(toExecutionError(timeout, 'error executing query', 500)).toBeInstanceOf(QueryTimeoutError);
  });
});

describe('redactConnectionString', () => {
  it('should mask passwords in both formats', () => {
    expect(redactConnectionString('Server=h;User Id=a;Password=test-secret')).toBe('Server=h;User Id=a;Password=***');
    expect(redactConnectionString('Server=h;PWD=test-secret;Database=d')).toBe('Server=h;PWD=***;Database=d');
    expect(redactConnectionString('sqlserver://app:test-secret@h/db')).toBe('sqlserver://app:***@h/db');
  });
});
