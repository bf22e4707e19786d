/**
 * Migration Lock Provider
 *
 * Serializes migration runs across processes with a session-level
 * PostgreSQL advisory lock keyed by a hash of the scope name. The database
 * drops the lock when the owning session ends.
 */

import { getConfig } from '../lib/environment-config';
import { getLogger, LockAcquisitionError, toError } from '../lib/error-handler';
import { MigrationSession } from './migration-session';

export const LOCK_GRANTED = 0;
export const LOCK_TIMEOUT = -1;
export const LOCK_FAILED = -999;

const LOCK_NOT_AVAILABLE_SQLSTATE = '55P03';

export interface MigrationLock {
  readonly scope: string;
  readonly isHeld: boolean;
  release(): Promise<void>;
}

function sqlStateOf(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

class AdvisoryLock implements MigrationLock {
  private held = true;

  constructor(private readonly session: MigrationSession, readonly scope: string) {}

  get isHeld(): boolean {
    return this.held;
  }

  async release(): Promise<void> {
    if (!this.held) {
      return;
    }
    this.held = false;
    await this.session.query('SELECT pg_advisory_unlock(hashtextextended($1, 0))', [this.scope]);
  }
}

export class MigrationLockProvider {
  private logger = getLogger();

  /**
   * @param timeoutMs how long to wait for the lock; 0 waits indefinitely
   */
  constructor(
    private readonly session: MigrationSession,
    private readonly timeoutMs: number = getConfig().migration.lockTimeoutMs
  ) {}

  async acquire(scope: string): Promise<MigrationLock> {
    const { resultCode, cause } = await this.requestLock(scope);

    if (resultCode < 0) {
      throw new LockAcquisitionError(scope, resultCode, this.timeoutMs, cause);
    }

    this.logger.debug('Migration lock acquired', { scope });
    return new AdvisoryLock(this.session, scope);
  }

  private async requestLock(scope: string): Promise<{ resultCode: number; cause?: Error }> {
    try {
      await this.session.query(`SELECT set_config('lock_timeout', $1, false)`, [`${this.timeoutMs}ms`]);
      await this.session.query('SELECT pg_advisory_lock(hashtextextended($1, 0))', [scope]);
      await this.resetLockTimeout();
      return { resultCode: LOCK_GRANTED };
    } catch (error) {
      const resultCode = sqlStateOf(error) === LOCK_NOT_AVAILABLE_SQLSTATE ? LOCK_TIMEOUT : LOCK_FAILED;
      if (resultCode === LOCK_TIMEOUT) {
        await this.resetLockTimeout();
      }
      return { resultCode, cause: toError(error) };
    }
  }

  /**
   * The lock timeout must not leak into the DDL that runs under the lock.
   */
  private async resetLockTimeout(): Promise<void> {
    try {
      await this.session.query(`SELECT set_config('lock_timeout', '0', false)`);
    } catch (error) {
      this.logger.warn('Could not reset lock_timeout', { error_message: toError(error).message });
      this.session.discardOnDispose('lock_timeout could not be reset');
    }
  }
}
