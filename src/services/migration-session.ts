/**
 * Migration Session
 *
 * Owns one database connection and at most one transaction. The session is
 * passed explicitly to every collaborator that must share the transaction
 * (history repository, lock provider, migrator).
 */

import { getLogger, MigrationCancelledError, SessionStateError, toError } from '../lib/error-handler';

export interface SqlQueryResult {
  rows: Array<Record<string, unknown>>;
  rowCount: number | null;
}

/**
 * Minimal connection surface the session needs. A pg pool client is adapted
 * to it in database-connections; tests use an in-process fake.
 */
export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<SqlQueryResult>;
  /**
   * Asks the server to stop the statement running on this connection.
   * Resolves to false when the request could not be delivered.
   */
  cancel?(): Promise<boolean>;
  /** `destroy` closes the connection instead of returning it to its pool. */
  release?(destroy?: boolean): void;
}

export interface ExecuteOptions {
  values?: unknown[];
  /**
   * Aborting rejects at once and asks the server to cancel the statement;
   * the caller must roll back.
   */
  signal?: AbortSignal;
}

const PREVIEW_LENGTH = 200;

function preview(sql: string): string {
  return sql.length > PREVIEW_LENGTH ? `${sql.slice(0, PREVIEW_LENGTH)}...` : sql;
}

export class MigrationSession {
  private transactionActive = false;
  private disposed = false;
  private statementTimeoutChanged = false;
  private discardConnection = false;
  private interrupted: Promise<boolean> | null = null;
  private logger = getLogger();

  constructor(private readonly client: SqlClient) {}

  get inTransaction(): boolean {
    return this.transactionActive;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  async beginTransaction(): Promise<void> {
    this.ensureOpen();
    if (this.transactionActive) {
      throw new SessionStateError('A transaction is already active on this session');
    }

    await this.client.query('BEGIN');
    this.transactionActive = true;
  }

  async commit(): Promise<void> {
    this.ensureOpen();
    if (!this.transactionActive) {
      throw new SessionStateError('No active transaction to commit');
    }

    try {
      await this.client.query('COMMIT');
    } finally {
      this.transactionActive = false;
    }
  }

  /**
   * Rolls back the active transaction, if any. Errors raised while rolling
   * back are logged and dropped so the failure that caused the rollback is
   * the one the caller sees.
   *
   * After an abort the rollback waits for the cancelled statement to stop,
   * since the connection runs one statement at a time.
   */
  async rollback(): Promise<void> {
    await this.settleInterrupted();
    if (!this.transactionActive) {
      return;
    }

    try {
      await this.client.query('ROLLBACK');
    } catch (error) {
      this.logger.warn('Rollback failed', { error_message: toError(error).message });
    } finally {
      this.transactionActive = false;
    }
  }

  /**
   * Executes one batch and returns the affected row count.
   */
  async execute(sql: string, options: ExecuteOptions = {}): Promise<number> {
    const result = await this.query(sql, options.values, options.signal);
    return result.rowCount ?? 0;
  }

  async query(sql: string, values?: unknown[], signal?: AbortSignal): Promise<SqlQueryResult> {
    this.ensureOpen();

    if (!signal) {
      return this.client.query(sql, values);
    }

    if (signal.aborted) {
      throw new MigrationCancelledError({ sql: preview(sql) });
    }

    const running = this.client.query(sql, values);
    let cancel: (error: Error) => void = () => undefined;
    const cancelled = new Promise<never>((_, reject) => {
      cancel = reject;
    });
    const onAbort = (): void => {
      cancel(new MigrationCancelledError({ sql: preview(sql) }));
      this.interrupted = this.interrupt(running);
    };

    signal.addEventListener('abort', onAbort, { once: true });
    try {
      return await Promise.race([running, cancelled]);
    } finally {
      signal.removeEventListener('abort', onAbort);
    }
  }

  /**
   * First column of the first row, or null when there are no rows.
   */
  async queryScalar(sql: string, values?: unknown[]): Promise<unknown> {
    const result = await this.query(sql, values);
    const [row] = result.rows;
    if (!row) {
      return null;
    }
    const [first] = Object.values(row);
    return first ?? null;
  }

  /**
   * First column of every row, as strings. Null values are skipped.
   */
  async queryStrings(sql: string, values?: unknown[]): Promise<string[]> {
    const result = await this.query(sql, values);
    const strings: string[] = [];
    for (const row of result.rows) {
      const [first] = Object.values(row);
      if (first !== null && first !== undefined) {
        strings.push(String(first));
      }
    }
    return strings;
  }

  /**
   * Sets the session's statement timeout. 0 disables it.
   */
  async setCommandTimeout(timeoutMs: number): Promise<void> {
    if (!Number.isInteger(timeoutMs) || timeoutMs < 0) {
      throw new SessionStateError(`Command timeout must be a non-negative integer, got ${timeoutMs}`);
    }
    this.statementTimeoutChanged = true;
    await this.query(`SELECT set_config('statement_timeout', $1, false)`, [`${timeoutMs}ms`]);
  }

  /**
   * Closes the connection on dispose instead of returning it to the pool.
   * For session state that could not be cleaned up, such as a held advisory lock.
   */
  discardOnDispose(reason: string): void {
    if (!this.discardConnection) {
      this.logger.warn('Connection will be closed on dispose', { reason });
    }
    this.discardConnection = true;
  }

  /**
   * Rolls back any active transaction, restores the statement timeout and
   * releases the connection.
   */
  async dispose(): Promise<void> {
    if (this.disposed) {
      return;
    }

    await this.rollback();
    if (this.isDisposed) {
      return;
    }

    if (this.statementTimeoutChanged && !this.discardConnection) {
      try {
        await this.client.query('RESET statement_timeout');
      } catch (error) {
        this.discardOnDispose(`statement_timeout could not be reset: ${toError(error).message}`);
      }
    }
    this.close(this.discardConnection);
  }

  /**
   * Requests cancellation of a statement the caller stopped waiting for.
   * Resolves to true once the statement has settled and the connection can
   * take the next one.
   */
  private async interrupt(running: Promise<SqlQueryResult>): Promise<boolean> {
    const settled = running.then(() => true, () => true);
    if (!this.client.cancel) {
      return false;
    }

    try {
      if (!(await this.client.cancel())) {
        return false;
      }
    } catch (error) {
      this.logger.warn('Could not cancel the running statement', { error_message: toError(error).message });
      return false;
    }
    return settled;
  }

  /**
   * Waits for an aborted statement to stop. One that cannot be stopped is
   * abandoned with its connection; the server then rolls back the
   * transaction and drops the session's locks.
   */
  private async settleInterrupted(): Promise<void> {
    const interrupted = this.interrupted;
    if (!interrupted) {
      return;
    }
    this.interrupted = null;

    if (await interrupted) {
      return;
    }
    this.logger.warn('Closing the connection of a statement that could not be cancelled');
    this.transactionActive = false;
    this.close(true);
  }

  private close(destroy: boolean): void {
    this.disposed = true;
    this.client.release?.(destroy);
  }

  private ensureOpen(): void {
    if (this.disposed) {
      throw new SessionStateError('Session has been disposed');
    }
  }
}
