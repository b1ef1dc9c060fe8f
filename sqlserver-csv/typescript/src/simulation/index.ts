/**
 * Simulated SQL Server connection.
 *
 * Serves scripted result sets, errors and delays in process, enabling
 * deterministic testing and development workflows without a live database.
 *
 * @module simulation
 */

import { setTimeout as delay } from 'timers/promises';
import type { ColumnDescriptor, QueryConnection, RawRow, ResultCursor } from '../types/index.js';

// ============================================================================
// Types
// ============================================================================

/**
 * One scripted result set.
 */
export interface SimulatedResultSet {
  columns: ColumnDescriptor[];
  rows: RawRow[];
}

/**
 * Failure raised while rows are being read.
 */
export interface SimulatedRowFailure {
  /** 0-based result set the failure occurs in */
  resultSet: number;
  /** Rows delivered before the failure */
  afterRows: number;
  /** Error the cursor's close() throws */
  error: unknown;
}

/**
 * Scripted response to one batch.
 */
export interface SimulatedResponse {
  /** Result sets in order; none means a batch without tabular output */
  resultSets?: SimulatedResultSet[];
  /** Error rejecting the submission */
  error?: unknown;
  /** Error ending row iteration part way */
  rowFailure?: SimulatedRowFailure;
  /** Delay before the submission settles */
  delayMs?: number;
  /** Delay before each row */
  rowDelayMs?: number;
}

/**
 * Normalizes statement text for matching: trims and collapses whitespace.
 */
export function normalizeQuery(text: string): string {
  return text.trim().replace(/\s+/g, ' ');
}

async function pause(ms: number, signal: AbortSignal): Promise<void> {
  try {
    await delay(ms, undefined, { signal });
  } catch (error) {
    throw signal.aborted ? signal.reason : error;
  }
}

// ============================================================================
// Simulated Connection
// ============================================================================

/**
 * In-process connection answering batches from a script.
 */
export class SimulatedConnection implements QueryConnection {
  private readonly responses = new Map<string, SimulatedResponse>();
  private readonly submitted: string[] = [];
  private fallback: SimulatedResponse | undefined;
  private pingError: unknown;
  private closedFlag = false;

  /**
   * Scripts the response for a batch, matched on normalized text.
   */
  respondTo(text: string, response: SimulatedResponse): this {
    this.responses.set(normalizeQuery(text), response);
    return this;
  }

  /**
   * Scripts the response for batches without their own script.
   */
  respondToAny(response: SimulatedResponse): this {
    this.fallback = response;
    return this;
  }

  /**
   * Makes the connectivity check fail with the given error.
   */
  failPingWith(error: unknown): this {
    this.pingError = error;
    return this;
  }

  /** Batch texts submitted so far, verbatim */
  get queries(): readonly string[] {
    return [...this.submitted];
  }

  /** Whether close() was called */
  get closed(): boolean {
    return this.closedFlag;
  }

  async ping(): Promise<void> {
    if (this.pingError !== undefined) {
      throw this.pingError;
    }
  }

  async query(text: string, signal: AbortSignal): Promise<ResultCursor> {
    if (this.closedFlag) {
      throw new Error('connection is closed');
    }
    this.submitted.push(text);
    signal.throwIfAborted();

    const response = this.responses.get(normalizeQuery(text)) ?? this.fallback;
    if (response === undefined) {
      throw new Error(`no simulated response for: ${normalizeQuery(text)}`);
    }

    if (response.delayMs !== undefined) {
      await pause(response.delayMs, signal);
    }
    if (response.error !== undefined) {
      throw response.error;
    }
    return new SimulatedResultCursor(response, signal);
  }

  async close(): Promise<void> {
    this.closedFlag = true;
  }
}

// ============================================================================
// Simulated Cursor
// ============================================================================

/**
 * Cursor over scripted result sets.
 */
export class SimulatedResultCursor implements ResultCursor {
  private readonly resultSets: SimulatedResultSet[];
  private readonly rowFailure: SimulatedRowFailure | undefined;
  private readonly rowDelayMs: number | undefined;
  private readonly signal: AbortSignal;
  private index = 0;
  private ended = false;
  private failed = false;
  private failure: unknown;

  constructor(response: SimulatedResponse, signal: AbortSignal) {
    this.resultSets = response.resultSets ?? [];
    this.rowFailure = response.rowFailure;
    this.rowDelayMs = response.rowDelayMs;
    this.signal = signal;
  }

  get columns(): readonly ColumnDescriptor[] {
    return this.resultSets[this.index]?.columns ?? [];
  }

  async *rows(): AsyncGenerator<RawRow> {
    const resultSet = this.resultSets[this.index];
    if (resultSet === undefined || this.ended) {
      return;
    }

    for (const [position, row] of resultSet.rows.entries()) {
      if (this.rowFailure?.resultSet === this.index && this.rowFailure.afterRows === position) {
        this.fail(this.rowFailure.error);
        return;
      }
      if (this.rowDelayMs !== undefined) {
        try {
          await pause(this.rowDelayMs, this.signal);
        } catch (error) {
          this.fail(error);
          return;
        }
      }
      yield row;
    }

    if (this.rowFailure?.resultSet === this.index && this.rowFailure.afterRows >= resultSet.rows.length) {
      this.fail(this.rowFailure.error);
    }
  }

  async nextResultSet(): Promise<boolean> {
    if (this.ended || this.index + 1 >= this.resultSets.length) {
      this.ended = true;
      return false;
    }
    this.index++;
    return true;
  }

  async close(): Promise<void> {
    this.ended = true;
    if (this.failed) {
      throw this.failure;
    }
  }

  private fail(error: unknown): void {
    this.failed = true;
    this.failure = error;
    this.ended = true;
  }
}
