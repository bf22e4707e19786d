/**
 * Database Connections
 *
 * pg pool management for the migrator: opens sessions over pooled clients
 * and creates the target database when it does not exist yet.
 */

import { Client, ClientConfig, Pool, PoolClient, PoolConfig } from 'pg';
import { DatabaseConfig, getConfig } from './environment-config';
import { getLogger, toError } from './error-handler';
import { quoteIdentifier } from './sql-dialect';
import { MigrationSession, SqlClient, SqlQueryResult } from '../services/migration-session';

const MAINTENANCE_DATABASE = 'postgres';
const INVALID_CATALOG_NAME = '3D000';
const INSUFFICIENT_PRIVILEGE = '42501';

export enum DatabaseEnsureStatus {
  FAILED = 'failed',
  ALREADY_EXISTS = 'already_exists',
  CREATED = 'created',
  SKIPPED_NO_MAINTENANCE_ACCESS = 'skipped_no_maintenance_access',
  SKIPPED_NO_CREATE_PERMISSION = 'skipped_no_create_permission'
}

export interface DatabaseEnsureResult {
  status: DatabaseEnsureStatus;
  database: string;
  error?: Error;
}

export interface ConnectionPoolStats {
  totalCount: number;
  idleCount: number;
  waitingCount: number;
}

function sqlStateOf(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Adapts a pooled pg client to the session's SqlClient surface.
 */
export class PgSqlClient implements SqlClient {
  constructor(
    private readonly client: PoolClient,
    private readonly cancelRunning?: () => Promise<boolean>
  ) {}

  async query(text: string, values?: unknown[]): Promise<SqlQueryResult> {
    const result = await this.client.query(text, values);
    return { rows: result.rows, rowCount: result.rowCount };
  }

  async cancel(): Promise<boolean> {
    return this.cancelRunning ? this.cancelRunning() : false;
  }

  release(destroy: boolean = false): void {
    this.client.release(destroy);
  }
}

export class DatabaseConnectionManager {
  private pool: Pool | null = null;
  private logger = getLogger();

  constructor(private readonly config: DatabaseConfig = getConfig().database) {}

  /**
   * Name of the database the migrator targets.
   */
  get databaseName(): string {
    if (this.config.connectionString) {
      return decodeURIComponent(new URL(this.config.connectionString).pathname.replace(/^\//, ''));
    }
    return this.config.database;
  }

  getPool(): Pool {
    if (this.pool) {
      return this.pool;
    }

    const pool = new Pool(this.toPoolConfig());

    pool.on('error', err => {
      this.logger.error('Idle database client error', err, { database: this.databaseName });
    });

    this.pool = pool;
    return pool;
  }

  /**
   * Checks out one client and wraps it in a session. Dispose the session to
   * return the client to the pool.
   */
  async openSession(): Promise<MigrationSession> {
    const client = await this.getPool().connect();
    const backendPid = await this.readBackendPid(client);
    const cancel = backendPid === null ? undefined : (): Promise<boolean> => this.cancelBackend(backendPid);
    return new MigrationSession(new PgSqlClient(client, cancel));
  }

  /**
   * Cancels the statement running on another backend. Uses its own
   * connection: the target's connection is busy with that statement.
   */
  async cancelBackend(pid: number): Promise<boolean> {
    const client = new Client(this.toClientConfig());
    await client.connect();
    try {
      const result = await client.query<{ cancelled: unknown }>('SELECT pg_cancel_backend($1) AS cancelled', [pid]);
      const cancelled = result.rows[0]?.cancelled === true;
      this.logger.info('Cancel requested for running statement', { pid, cancelled });
      return cancelled;
    } finally {
      await client.end();
    }
  }

  getPoolStats(): ConnectionPoolStats | null {
    if (!this.pool) {
      return null;
    }

    return {
      totalCount: this.pool.totalCount,
      idleCount: this.pool.idleCount,
      waitingCount: this.pool.waitingCount
    };
  }

  /**
   * Creates the target database through the maintenance database when the
   * target cannot be opened because it does not exist.
   */
  async ensureDatabaseExists(openRetries: number = 2): Promise<DatabaseEnsureResult> {
    const database = this.databaseName;
    if (!database.trim()) {
      return {
        status: DatabaseEnsureStatus.FAILED,
        database: '<empty>',
        error: new Error('Database configuration must name a database')
      };
    }

    const firstOpen = await this.tryOpen(this.toClientConfig());
    if (!firstOpen) {
      return { status: DatabaseEnsureStatus.ALREADY_EXISTS, database };
    }
    if (sqlStateOf(firstOpen) !== INVALID_CATALOG_NAME) {
      return { status: DatabaseEnsureStatus.FAILED, database, error: firstOpen };
    }

    const maintenance = new Client(this.toClientConfig(MAINTENANCE_DATABASE));
    try {
      await maintenance.connect();
    } catch (error) {
      return { status: DatabaseEnsureStatus.SKIPPED_NO_MAINTENANCE_ACCESS, database, error: toError(error) };
    }

    try {
      const existing = await maintenance.query('SELECT 1 FROM pg_catalog.pg_database WHERE datname = $1', [database]);
      if (existing.rows.length === 0) {
        try {
          await maintenance.query(`CREATE DATABASE ${quoteIdentifier(database)}`);
          this.logger.info('Database created', { database });
        } catch (error) {
          const status = sqlStateOf(error) === INSUFFICIENT_PRIVILEGE
            ? DatabaseEnsureStatus.SKIPPED_NO_CREATE_PERMISSION
            : DatabaseEnsureStatus.FAILED;
          return { status, database, error: toError(error) };
        }
      }
    } catch (error) {
      return { status: DatabaseEnsureStatus.FAILED, database, error: toError(error) };
    } finally {
      await maintenance.end();
    }

    let lastError: Error | undefined;
    for (let attempt = 0; attempt < Math.max(1, openRetries); attempt++) {
      lastError = await this.tryOpen(this.toClientConfig());
      if (!lastError) {
        return { status: DatabaseEnsureStatus.CREATED, database };
      }
    }

    return {
      status: DatabaseEnsureStatus.FAILED,
      database,
      error: new Error(`Database '${database}' was created but cannot be opened: ${lastError?.message ?? 'unknown error'}`)
    };
  }

  async close(): Promise<void> {
    if (this.pool) {
      const pool = this.pool;
      this.pool = null;
      await pool.end();
    }
  }

  private async readBackendPid(client: PoolClient): Promise<number | null> {
    try {
      const result = await client.query<{ pid: unknown }>('SELECT pg_backend_pid() AS pid');
      const pid = result.rows[0]?.pid;
      return typeof pid === 'number' ? pid : null;
    } catch (error) {
      client.release(true);
      throw error;
    }
  }

  /**
   * Opens and closes a connection. Returns the error when it could not connect.
   */
  private async tryOpen(config: ClientConfig): Promise<Error | undefined> {
    const client = new Client(config);
    try {
      await client.connect();
      await client.end();
      return undefined;
    } catch (error) {
      return toError(error);
    }
  }

  private toClientConfig(databaseOverride?: string): ClientConfig {
    const ssl = this.config.ssl ? { rejectUnauthorized: false } : false;

    if (this.config.connectionString) {
      const url = new URL(this.config.connectionString);
      if (databaseOverride) {
        url.pathname = `/${encodeURIComponent(databaseOverride)}`;
      }
      return {
        connectionString: url.toString(),
        ssl,
        connectionTimeoutMillis: this.config.connectionTimeoutMillis
      };
    }

    return {
      host: this.config.host,
      port: this.config.port,
      database: databaseOverride ?? this.config.database,
      user: this.config.user,
      password: this.config.password,
      ssl,
      connectionTimeoutMillis: this.config.connectionTimeoutMillis
    };
  }

  private toPoolConfig(): PoolConfig {
    return {
      ...this.toClientConfig(),
      max: this.config.max || 5,
      idleTimeoutMillis: this.config.idleTimeoutMillis || 30000
    };
  }
}
