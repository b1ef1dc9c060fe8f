/**
 * SQL Server connection management.
 *
 * Owns the single mssql connection used for the whole run: opened and
 * checked at startup, then used for one streaming request per batch.
 * @module connection
 */

import mssql from 'mssql';
import type { ConnectionPool as MssqlConnectionPool, config as MssqlConfig } from 'mssql';
import { ConnectionFailedError, errorMessage } from '../errors/index.js';
import type { Logger } from '../observability/index.js';
import { NoopLogger } from '../observability/index.js';
import { AuthenticationType, EncryptionMode, PING_TIMEOUT_MS } from '../types/index.js';
import type { ConnectionConfig, QueryConnection, ResultCursor } from '../types/index.js';
import { MssqlResultCursor } from './cursor.js';

export { MssqlResultCursor, describeColumn, describeColumns, decodeCell, decodeRow } from './cursor.js';
export type { StreamingRequest, MssqlCursorOptions } from './cursor.js';

/**
 * Converts ConnectionConfig to mssql configuration.
 *
 * The pool holds at most one connection and never times requests out on
 * its own; batch deadlines are enforced by cancelling the request.
 */
export function toMssqlConfig(config: ConnectionConfig): MssqlConfig {
  const mssqlConfig: MssqlConfig = {
    server: config.host,
    port: config.port,
    database: config.database,
    user: config.username,
    password: config.password,
    connectionTimeout: config.connectTimeout,
    requestTimeout: 0,
    pool: {
      min: 0,
      max: 1,
    },
    options: {
      encrypt: config.encryptionMode !== EncryptionMode.Disable,
      trustServerCertificate:
        config.encryptionMode === EncryptionMode.Strict ? false : config.trustServerCertificate,
      enableArithAbort: true,
      appName: config.applicationName,
    },
  };

  // Named instances are resolved through the browser service, not the port
  if (config.instanceName) {
    mssqlConfig.options = { ...mssqlConfig.options, instanceName: config.instanceName };
    delete mssqlConfig.port;
  }

  if (config.authenticationType === AuthenticationType.Ntlm && config.domain) {
    mssqlConfig.domain = config.domain;
  }

  return mssqlConfig;
}

/**
 * SQL Server connection options.
 */
export interface SqlServerConnectionOptions {
  /** Logger for connection diagnostics */
  logger?: Logger;
}

/**
 * The process's database handle.
 */
export class SqlServerConnection implements QueryConnection {
  private readonly config: ConnectionConfig;
  private readonly logger: Logger;
  private readonly pool: MssqlConnectionPool;
  private closed = false;

  constructor(config: ConnectionConfig, options: SqlServerConnectionOptions = {}) {
    this.config = config;
    this.logger = options.logger ?? new NoopLogger();
    this.pool = new mssql.ConnectionPool(toMssqlConfig(config));

    this.pool.on('error', (err: Error) => {
      this.logger.error('Unexpected connection error', {
        error: err.message,
      });
    });
  }

  /**
   * Establishes the connection.
   *
   * @throws {ConnectionFailedError} If the server cannot be reached or the
   *   login fails
   */
  async open(): Promise<void> {
    if (this.pool.connected) {
      return;
    }
    try {
      await this.pool.connect();
      this.logger.info('Connected to SQL Server', {
        host: this.config.host,
        port: this.config.port,
        database: this.config.database,
      });
    } catch (error) {
      this.logger.debug('Connection attempt failed', { error: errorMessage(error) });
      throw new ConnectionFailedError(this.config.host, this.config.port, error);
    }
  }

  /**
   * Connects if needed and runs a trivial query under a deadline.
   *
   * @throws {ConnectionFailedError} If the check fails or the deadline elapses
   */
  async ping(timeoutMs: number = PING_TIMEOUT_MS): Promise<void> {
    const check = (async () => {
      await this.open();
      try {
        await this.pool.request().query('SELECT 1');
      } catch (error) {
        throw new ConnectionFailedError(this.config.host, this.config.port, error);
      }
    })();

    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(
          new ConnectionFailedError(
            this.config.host,
            this.config.port,
            new Error(`connectivity check timed out after ${timeoutMs}ms`)
          )
        );
      }, timeoutMs);
    });

    try {
      await Promise.race([check, deadline]);
    } catch (error) {
      // The check may still settle after the deadline.
      check.catch((late: unknown) => {
        this.logger.debug('Connectivity check settled after failure', { error: errorMessage(late) });
      });
      throw error;
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * Starts a streaming request for one batch.
   */
  async query(text: string, signal: AbortSignal): Promise<ResultCursor> {
    return MssqlResultCursor.open(this.pool.request(), text, {
      signal,
      logger: this.logger,
    });
  }

  /**
   * Closes the connection. Safe to call more than once.
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await this.pool.close();
    this.logger.debug('Connection closed');
  }
}
