/**
 * Core type definitions for sqlserver-csv.
 *
 * Connection settings, column metadata, decoded cell values, and the cursor
 * and sink seams the result-set projection is written against.
 */

// ============================================================================
// Connection Types
// ============================================================================

/**
 * SQL Server encryption mode for connections.
 */
export enum EncryptionMode {
  /** No encryption */
  Disable = 'disable',
  /** Require encryption */
  Require = 'require',
  /** Require encryption and verify server certificate */
  Strict = 'strict',
}

/**
 * SQL Server authentication type.
 */
export enum AuthenticationType {
  /** SQL Server authentication (username/password) */
  SqlServer = 'sql-server',
  /** NTLM authentication against a Windows domain */
  Ntlm = 'ntlm',
}

/**
 * SQL Server connection configuration.
 *
 * SECURITY: password field is marked as sensitive and never logged.
 */
export interface ConnectionConfig {
  /** Database server hostname or IP address */
  host: string;
  /** Database server port (default: 1433) */
  port: number;
  /** Database name; the login's default database when absent */
  database?: string;
  /** Database username */
  username: string;
  /**
   * Database password (SENSITIVE - never logged).
   * @sensitive
   */
  password: string;
  /** Authentication type */
  authenticationType: AuthenticationType;
  /** Encryption mode for connection */
  encryptionMode: EncryptionMode;
  /** Whether to trust the server certificate (for self-signed certs) */
  trustServerCertificate: boolean;
  /** Connection timeout in milliseconds */
  connectTimeout: number;
  /** Application name reported to the server */
  applicationName: string;
  /** SQL Server instance name (for named instances) */
  instanceName?: string;
  /** Domain for NTLM authentication */
  domain?: string;
}

// ============================================================================
// Result Set Types
// ============================================================================

/**
 * Precision and scale of a DECIMAL/NUMERIC column.
 */
export interface DecimalSize {
  readonly precision: number;
  readonly scale: number;
}

/**
 * Column metadata reported by the driver for one result set.
 */
export interface ColumnDescriptor {
  /** Column name (empty for unnamed expressions) */
  readonly name: string;
  /** Upper-case SQL Server type tag, e.g. INT, NVARCHAR, UNIQUEIDENTIFIER */
  readonly databaseTypeName: string;
  /** Whether the column allows NULL; absent when unknown */
  readonly nullable?: boolean;
  /** Declared length for variable-length types; see MAX_LENGTH_SENTINELS */
  readonly length?: number;
  /** Precision and scale for DECIMAL/NUMERIC columns */
  readonly decimalSize?: DecimalSize;
}

/**
 * A decoded cell value as delivered by the driver.
 */
export type RawCellValue =
  | { readonly kind: 'null' }
  | { readonly kind: 'boolean'; readonly value: boolean }
  | { readonly kind: 'integer'; readonly value: number | bigint }
  | { readonly kind: 'float'; readonly value: number }
  | { readonly kind: 'bytes'; readonly value: Uint8Array }
  | { readonly kind: 'text'; readonly value: string }
  | { readonly kind: 'datetime'; readonly value: Date };

/**
 * RawCellValue factory functions.
 */
export const RawCellValue = {
  null(): RawCellValue {
    return NULL_CELL;
  },
  boolean(value: boolean): RawCellValue {
    return { kind: 'boolean', value };
  },
  integer(value: number | bigint): RawCellValue {
    return { kind: 'integer', value };
  },
  float(value: number): RawCellValue {
    return { kind: 'float', value };
  },
  bytes(value: Uint8Array): RawCellValue {
    return { kind: 'bytes', value };
  },
  text(value: string): RawCellValue {
    return { kind: 'text', value };
  },
  datetime(value: Date): RawCellValue {
    return { kind: 'datetime', value };
  },
};

/**
 * The shared SQL NULL cell.
 */
export const NULL_CELL: RawCellValue = { kind: 'null' };

/**
 * One row of decoded cells, in column order.
 */
export type RawRow = readonly RawCellValue[];

/**
 * One CSV record. An empty record renders as an empty line.
 */
export type CsvRecord = readonly string[];

// ============================================================================
// Driver and Sink Seams
// ============================================================================

/**
 * Destination for formatted records.
 */
export interface RecordSink {
  /** Writes one record */
  write(record: CsvRecord): Promise<void>;
  /** Pushes buffered records to the underlying stream */
  flush(): Promise<void>;
}

/**
 * Forward-only cursor over the result sets of one submitted batch.
 *
 * The cursor starts positioned on the first result set, which may have
 * zero columns when the batch returns no tabular data.
 */
export interface ResultCursor {
  /** Columns of the current result set */
  readonly columns: readonly ColumnDescriptor[];
  /** Rows of the current result set; may be iterated once */
  rows(): AsyncIterable<RawRow>;
  /** Advances to the next result set; false when there are no more */
  nextResultSet(): Promise<boolean>;
  /** Releases the cursor and throws any error the batch ended with */
  close(): Promise<void>;
}

/**
 * A database handle able to submit statement text.
 */
export interface QueryConnection {
  /**
   * Submits a batch and resolves once its first result set (or completion)
   * is known.
   *
   * @param text - Statement text, passed through verbatim
   * @param signal - Aborted when the batch deadline elapses
   */
  query(text: string, signal: AbortSignal): Promise<ResultCursor>;
}

/**
 * A block of statement text terminated by a GO line.
 */
export interface Batch {
  /** 1-based batch number within the input */
  sequence: number;
  /** CRLF-joined statement text */
  text: string;
  /** 1-based input line the batch text starts on */
  startLine: number;
}

// ============================================================================
// Validation Utilities
// ============================================================================

/**
 * Validates connection configuration.
 *
 * @returns Array of validation error messages (empty if valid)
 */
export function validateConnectionConfig(config: ConnectionConfig): string[] {
  const errors: string[] = [];

  if (!config.host || config.host.trim().length === 0) {
    errors.push('Host cannot be empty');
  }
  if (config.host.length > 255) {
    errors.push('Host exceeds maximum length of 255 characters');
  }

  if (!Number.isInteger(config.port) || config.port < 1 || config.port > 65535) {
    errors.push('Port must be between 1 and 65535');
  }

  if (config.database !== undefined && config.database.length > SQLSERVER_IDENTIFIER_MAX_LENGTH) {
    errors.push('Database name exceeds SQL Server maximum of 128 characters');
  }

  if (!config.username || config.username.trim().length === 0) {
    errors.push('Username cannot be empty');
  }
  if (config.username.length > SQLSERVER_IDENTIFIER_MAX_LENGTH) {
    errors.push('Username exceeds SQL Server maximum of 128 characters');
  }
  if (!config.password || config.password.length === 0) {
    errors.push('Password cannot be empty');
  }

  if (config.authenticationType === AuthenticationType.Ntlm && !config.domain) {
    errors.push('Domain is required for NTLM authentication');
  }

  if (Number.isNaN(config.connectTimeout) || config.connectTimeout < 0) {
    errors.push('Connect timeout cannot be negative');
  }
  if (config.connectTimeout > 300000) {
    errors.push('Connect timeout exceeds maximum of 5 minutes (300000ms)');
  }

  if (config.instanceName && config.instanceName.length > 64) {
    errors.push('Instance name exceeds maximum length of 64 characters');
  }

  return errors;
}

// ============================================================================
// Constants
// ============================================================================

/**
 * Default SQL Server port.
 */
export const DEFAULT_SQLSERVER_PORT = 1433;

/**
 * Default connection timeout (30 seconds).
 */
export const DEFAULT_CONNECT_TIMEOUT = 30000;

/**
 * Deadline for the startup connectivity check (10 seconds).
 */
export const PING_TIMEOUT_MS = 10000;

/**
 * Default per-batch query timeout in seconds.
 */
export const DEFAULT_QUERY_TIMEOUT_SECONDS = 60;

/**
 * Default text written for SQL NULL.
 */
export const DEFAULT_NULL_LITERAL = 'NULL';

/**
 * Application name reported to the server.
 */
export const DEFAULT_APPLICATION_NAME = 'sqlserver-csv';

/**
 * Line content that terminates a batch (compared trimmed, upper-cased).
 */
export const BATCH_SEPARATOR = 'GO';

/**
 * Length the driver reports for VARCHAR(MAX)/VARBINARY(MAX).
 */
export const VARCHAR_MAX_LENGTH = 2147483645;

/**
 * Length the driver reports for NVARCHAR(MAX)/XML.
 */
export const NVARCHAR_MAX_LENGTH = 1073741822;

/**
 * Column lengths rendered as "(max)" in headers.
 */
export const MAX_LENGTH_SENTINELS: ReadonlySet<number> = new Set([
  VARCHAR_MAX_LENGTH,
  NVARCHAR_MAX_LENGTH,
]);

/**
 * SQL Server identifier maximum length.
 */
export const SQLSERVER_IDENTIFIER_MAX_LENGTH = 128;
