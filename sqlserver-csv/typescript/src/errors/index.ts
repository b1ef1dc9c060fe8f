/**
 * Error types for sqlserver-csv.
 *
 * Fatal errors (configuration, connectivity, input) stop the process before
 * any output; batch errors (execution, timeout, row, sink) end the current
 * batch and are reported on stderr.
 */

// ============================================================================
// Error Codes
// ============================================================================

/**
 * sqlserver-csv error codes.
 */
export enum SqlServerErrorCode {
  // Configuration errors
  ConfigurationError = 'CONFIGURATION_ERROR',
  InvalidConnectionString = 'INVALID_CONNECTION_STRING',

  // Connection errors
  ConnectionFailed = 'CONNECTION_FAILED',

  // Input errors
  InputRead = 'INPUT_READ',

  // Query errors
  ExecutionError = 'EXECUTION_ERROR',
  QueryTimeout = 'QUERY_TIMEOUT',
  QueryRow = 'QUERY_ROW',
  MalformedIdentifier = 'MALFORMED_IDENTIFIER',

  // Output errors
  SinkWrite = 'SINK_WRITE',
}

/**
 * SQL Server error numbers with special handling.
 */
export enum SqlServerErrorNumber {
  /** Client-side timeout reported by the driver */
  QueryTimeout = -2,
}

/**
 * Structured error detail reported by SQL Server.
 */
export interface SqlServerErrorResponse {
  /** SQL Server error number */
  number: number;
  /** SQL Server error state */
  state?: number;
  /** SQL Server severity */
  class?: number;
  /** Error message */
  message?: string;
  /** Server name */
  serverName?: string;
  /** Procedure name (if error in stored procedure) */
  procName?: string;
  /** Line number in SQL batch or procedure */
  lineNumber?: number;
}

// ============================================================================
// Base Error Class
// ============================================================================

/**
 * Base sqlserver-csv error class.
 */
export class SqlServerError extends Error {
  /** Error code */
  readonly code: SqlServerErrorCode;
  /** SQL Server error number (if from SQL Server) */
  readonly errorNumber?: number;
  /** SQL Server error state */
  readonly errorState?: number;
  /** SQL Server severity class */
  readonly severity?: number;
  /** Additional error details */
  readonly details?: Record<string, unknown>;

  constructor(options: {
    code: SqlServerErrorCode;
    message: string;
    errorNumber?: number;
    errorState?: number;
    severity?: number;
    details?: Record<string, unknown>;
    cause?: unknown;
  }) {
    super(options.message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'SqlServerError';
    this.code = options.code;
    this.errorNumber = options.errorNumber;
    this.errorState = options.errorState;
    this.severity = options.severity;
    this.details = options.details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Creates a JSON representation of the error.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      errorNumber: this.errorNumber,
      errorState: this.errorState,
      severity: this.severity,
      details: this.details,
    };
  }
}

// ============================================================================
// Configuration Errors (Fatal)
// ============================================================================

/**
 * Configuration error.
 */
export class ConfigurationError extends SqlServerError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({
      code: SqlServerErrorCode.ConfigurationError,
      message: `Configuration error: ${message}`,
      details,
    });
    this.name = 'ConfigurationError';
  }
}

/**
 * Invalid connection string format.
 */
export class InvalidConnectionStringError extends SqlServerError {
  constructor(connectionString: string, reason?: string) {
    super({
      code: SqlServerErrorCode.InvalidConnectionString,
      message: reason
        ? `Invalid connection string: ${reason}`
        : 'Invalid connection string format',
      details: { connectionString: redactConnectionString(connectionString) },
    });
    this.name = 'InvalidConnectionStringError';
  }
}

// ============================================================================
// Connection Errors (Fatal)
// ============================================================================

/**
 * Opening or pinging the SQL Server connection failed.
 */
export class ConnectionFailedError extends SqlServerError {
  constructor(host: string, port: number, cause?: unknown) {
    super({
      code: SqlServerErrorCode.ConnectionFailed,
      message: cause === undefined
        ? `Failed to connect to SQL Server at ${host}:${port}`
        : `Failed to connect to SQL Server at ${host}:${port}: ${errorMessage(cause)}`,
      details: { host, port },
      cause,
    });
    this.name = 'ConnectionFailedError';
  }
}

// ============================================================================
// Input Errors (Fatal)
// ============================================================================

/**
 * Reading statement text from the input stream failed.
 */
export class InputReadError extends SqlServerError {
  constructor(cause: unknown, line?: number) {
    super({
      code: SqlServerErrorCode.InputRead,
      message: `Failed to read input: ${errorMessage(cause)}`,
      details: line === undefined ? undefined : { line },
      cause,
    });
    this.name = 'InputReadError';
  }
}

// ============================================================================
// Query Errors (Batch)
// ============================================================================

/**
 * Query submission or result iteration failed.
 */
export class ExecutionError extends SqlServerError {
  /** Whether SQL Server itself reported the error */
  readonly serverReported: boolean;

  constructor(
    message: string,
    options: {
      server?: SqlServerErrorResponse;
      cause?: unknown;
      code?: SqlServerErrorCode;
      details?: Record<string, unknown>;
    } = {}
  ) {
    const server = options.server;
    super({
      code: options.code ?? SqlServerErrorCode.ExecutionError,
      message,
      errorNumber: server?.number,
      errorState: server?.state,
      severity: server?.class,
      details: server
        ? {
            lineNumber: server.lineNumber,
            serverName: server.serverName,
            procName: server.procName,
            ...options.details,
          }
        : options.details,
      cause: options.cause,
    });
    this.name = 'ExecutionError';
    this.serverReported = server !== undefined;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), serverReported: this.serverReported };
  }
}

/**
 * The batch deadline elapsed before the query finished.
 */
export class QueryTimeoutError extends ExecutionError {
  constructor(timeoutMs: number, cause?: unknown) {
    super(`Query timeout after ${timeoutMs}ms`, {
      code: SqlServerErrorCode.QueryTimeout,
      details: { timeoutMs },
      cause,
    });
    this.name = 'QueryTimeoutError';
  }
}

/**
 * Decoding or formatting a specific row failed.
 */
export class QueryRowError extends SqlServerError {
  /** 1-based index of the failing row within its result set */
  readonly row: number;

  constructor(row: number, cause: unknown) {
    super({
      code: SqlServerErrorCode.QueryRow,
      message: `error in row ${row}: ${errorMessage(cause)}`,
      details: { row },
      cause,
    });
    this.name = 'QueryRowError';
    this.row = row;
  }
}

/**
 * A UNIQUEIDENTIFIER cell could not be decoded.
 */
export class MalformedIdentifierError extends SqlServerError {
  constructor(reason: string) {
    super({
      code: SqlServerErrorCode.MalformedIdentifier,
      message: `Malformed UNIQUEIDENTIFIER: ${reason}`,
    });
    this.name = 'MalformedIdentifierError';
  }
}

// ============================================================================
// Output Errors (Batch)
// ============================================================================

/**
 * Writing CSV output failed.
 */
export class SinkWriteError extends SqlServerError {
  constructor(cause: unknown) {
    super({
      code: SqlServerErrorCode.SinkWrite,
      message: `Failed to write CSV output: ${errorMessage(cause)}`,
      cause,
    });
    this.name = 'SinkWriteError';
  }
}

// ============================================================================
// Error Utilities
// ============================================================================

/**
 * Checks if an error is a sqlserver-csv error.
 */
export function isSqlServerError(error: unknown): error is SqlServerError {
  return error instanceof SqlServerError;
}

/**
 * Extracts the message of an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Reads SQL Server's structured error detail from a driver error.
 *
 * The mssql RequestError copies the server's error token fields onto itself;
 * a numeric `number` field marks an error the server reported.
 */
export function readServerError(error: unknown): SqlServerErrorResponse | undefined {
  if (typeof error !== 'object' || error === null) {
    return undefined;
  }
  if (!('number' in error) || typeof error.number !== 'number') {
    return undefined;
  }
  if (error.number === SqlServerErrorNumber.QueryTimeout) {
    return undefined;
  }

  const response: SqlServerErrorResponse = { number: error.number };
  if ('state' in error && typeof error.state === 'number') {
    response.state = error.state;
  }
  if ('class' in error && typeof error.class === 'number') {
    response.class = error.class;
  }
  if ('message' in error && typeof error.message === 'string') {
    response.message = error.message;
  }
  if ('serverName' in error && typeof error.serverName === 'string') {
    response.serverName = error.serverName;
  }
  if ('procName' in error && typeof error.procName === 'string') {
    response.procName = error.procName;
  }
  if ('lineNumber' in error && typeof error.lineNumber === 'number') {
    response.lineNumber = error.lineNumber;
  }
  return response;
}

/**
 * Whether a driver error is the driver's own request timeout.
 */
export function isDriverTimeout(error: unknown): boolean {
  if (typeof error !== 'object' || error === null) {
    return false;
  }
  if ('code' in error && error.code === 'ETIMEOUT') {
    return true;
  }
  return 'number' in error && error.number === SqlServerErrorNumber.QueryTimeout;
}

/**
 * Maps a driver failure to an execution error.
 *
 * sqlserver-csv errors pass through unchanged; anything else is prefixed with
 * the step that failed.
 *
 * @param error - The thrown value
 * @param context - The failing step, e.g. "error executing query"
 * @param timeoutMs - The batch deadline, for driver timeouts
 */
export function toExecutionError(
  error: unknown,
  context: string,
  timeoutMs = 0
): SqlServerError {
  if (isSqlServerError(error)) {
    return error;
  }
  if (isDriverTimeout(error)) {
    return new QueryTimeoutError(timeoutMs, error);
  }
  return new ExecutionError(`${context}: ${errorMessage(error)}`, {
    server: readServerError(error),
    cause: error,
  });
}

/**
 * Masks the password in a connection string.
 */
export function redactConnectionString(connectionString: string): string {
  return connectionString
    .replace(/(password|pwd)=[^;]*/gi, '$1=***')
    .replace(/^([a-z]+:\/\/[^:/@]*:)[^@]*@/i, '$1***@');
}
