/**
 * Unit Tests: MigrationLockProvider
 * Advisory lock acquisition, timeout codes and release
 */

import { LockAcquisitionError } from '../../../src/lib/error-handler';
import { MigrationLockProvider } from '../../../src/services/migration-lock-provider';
import { MigrationSession } from '../../../src/services/migration-session';
import { FakeSqlClient } from '../../helpers/fake-sql-client';

function pgError(code: string, message: string): Error {
  return Object.assign(new Error(message), { code });
}

describe('MigrationLockProvider', () => {
  let client: FakeSqlClient;
  let provider: MigrationLockProvider;

  beforeEach(() => {
    client = new FakeSqlClient();
    provider = new MigrationLockProvider(new MigrationSession(client), 250);
  });

  test('acquires the lock with a bounded wait and resets the timeout', async () => {
    const lock = await provider.acquire('billing');

    expect(lock.scope).toBe('billing');
    expect(lock.isHeld).toBe(true);
    expect(client.queries).toEqual([
      { text: "SELECT set_config('lock_timeout', $1, false)", values: ['250ms'] },
      { text: 'SELECT pg_advisory_lock(hashtextextended($1, 0))', values: ['billing'] },
      { text: "SELECT set_config('lock_timeout', '0', false)" },
    ]);
  });

  test('releases the lock once', async () => {
    const lock = await provider.acquire('billing');

    await lock.release();
    await lock.release();

    expect(lock.isHeld).toBe(false);
    expect(client.queries.slice(3)).toEqual([
      { text: 'SELECT pg_advisory_unlock(hashtextextended($1, 0))', values: ['billing'] },
    ]);
  });

  test('discards the connection when the lock timeout cannot be reset', async () => {
    const session = new MigrationSession(client);
    client.failOn("'0', false", new Error('connection reset'));

    await new MigrationLockProvider(session, 250).acquire('billing');
    await session.dispose();

    expect(client.release).toHaveBeenCalledWith(true);
  });

  test('reports a timeout as result code -1', async () => {
    client.failOn('pg_advisory_lock(', pgError('55P03', 'canceling statement due to lock timeout'));

    await expect(provider.acquire('billing')).rejects.toBeInstanceOf(LockAcquisitionError);
    await expect(provider.acquire('billing')).rejects.toMatchObject({
      context: { scope: 'billing', resultCode: -1, timeoutMs: 250 },
    });
    expect(client.texts[client.texts.length - 1]).toBe("SELECT set_config('lock_timeout', '0', false)");
  });

  test('reports other failures as result code -999', async () => {
    client.failOn('pg_advisory_lock(', pgError('42501', 'permission denied'));

    await expect(provider.acquire('billing')).rejects.toMatchObject({
      message: "Could not acquire migration lock 'billing' (code=-999, timeout=250ms): permission denied",
      context: { resultCode: -999 },
    });
    expect(client.texts).toHaveLength(2);
  });
});
