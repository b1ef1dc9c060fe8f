/**
 * sqlserver-csv
 *
 * Executes GO-separated SQL Server batches and writes every result set as a
 * typed-header CSV block.
 *
 * @module sqlserver-csv
 */

// ============================================================================
// Type Exports
// ============================================================================

export {
  EncryptionMode,
  AuthenticationType,
  RawCellValue,
  NULL_CELL,
  validateConnectionConfig,
  DEFAULT_SQLSERVER_PORT,
  DEFAULT_CONNECT_TIMEOUT,
  PING_TIMEOUT_MS,
  DEFAULT_QUERY_TIMEOUT_SECONDS,
  DEFAULT_NULL_LITERAL,
  DEFAULT_APPLICATION_NAME,
  BATCH_SEPARATOR,
  VARCHAR_MAX_LENGTH,
  NVARCHAR_MAX_LENGTH,
  MAX_LENGTH_SENTINELS,
} from './types/index.js';
export type {
  ConnectionConfig,
  DecimalSize,
  ColumnDescriptor,
  RawRow,
  CsvRecord,
  RecordSink,
  ResultCursor,
  QueryConnection,
  Batch,
} from './types/index.js';

// ============================================================================
// Error Exports
// ============================================================================

export {
  SqlServerErrorCode,
  SqlServerErrorNumber,
  SqlServerError,
  ConfigurationError,
  InvalidConnectionStringError,
  ConnectionFailedError,
  InputReadError,
  ExecutionError,
  QueryTimeoutError,
  QueryRowError,
  MalformedIdentifierError,
  SinkWriteError,
  isSqlServerError,
  errorMessage,
  readServerError,
  isDriverTimeout,
  toExecutionError,
  redactConnectionString,
} from './errors/index.js';
export type { SqlServerErrorResponse } from './errors/index.js';

// ============================================================================
// Configuration Exports
// ============================================================================

export {
  LOG_LEVEL_ENV,
  USAGE,
  normalizeArgs,
  parseCliArgs,
  resolveConnectionString,
  createRunConfig,
  parseConnectionString,
  redactConfig,
} from './config/index.js';
export type { Environment, CliOptions, RunConfig } from './config/index.js';

// ============================================================================
// Observability Exports
// ============================================================================

export {
  LogLevel,
  ConsoleLogger,
  NoopLogger,
  InMemoryLogger,
  parseLogLevel,
} from './observability/index.js';
export type { Logger, LogDestination, LogEntry } from './observability/index.js';

// ============================================================================
// Formatting and Output Exports
// ============================================================================

export {
  formatValue,
  formatUniqueIdentifier,
  encodeUniqueIdentifier,
  formatDefault,
  renderHeader,
  renderColumnLabel,
} from './formatting/index.js';
export { CsvWriter, quoteField, formatRecord } from './csv/index.js';
export type { CsvDestination, CsvWriterOptions } from './csv/index.js';

// ============================================================================
// Operation Exports
// ============================================================================

export { streamResultSet, formatRow } from './operations/stream.js';
export type { StreamOptions } from './operations/stream.js';
export { QueryExecutor } from './operations/query.js';
export type { QueryExecutorOptions, ExecutionSummary } from './operations/query.js';
export { isBatchSeparator, splitBatches, readBatches } from './operations/batch.js';
export type { BatchReaderOptions } from './operations/batch.js';
export { runBatches, formatErrorReport } from './operations/runner.js';
export type { BatchExecutor, BatchRunnerOptions, RunSummary } from './operations/runner.js';

// ============================================================================
// Connection Exports
// ============================================================================

export {
  SqlServerConnection,
  toMssqlConfig,
  MssqlResultCursor,
  describeColumn,
  describeColumns,
  decodeCell,
  decodeRow,
} from './connection/index.js';
export type {
  SqlServerConnectionOptions,
  StreamingRequest,
  MssqlCursorOptions,
} from './connection/index.js';

// ============================================================================
// Simulation Exports
// ============================================================================

export {
  SimulatedConnection,
  SimulatedResultCursor,
  normalizeQuery,
} from './simulation/index.js';
export type {
  SimulatedResultSet,
  SimulatedRowFailure,
  SimulatedResponse,
} from './simulation/index.js';

// ============================================================================
// CLI Exports
// ============================================================================

export { main } from './cli.js';
export type { CliIo, CliDependencies, ManagedConnection } from './cli.js';
