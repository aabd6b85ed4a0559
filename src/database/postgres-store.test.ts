import { describe, it, expect, beforeEach } from 'vitest';
import { mockDeep, type DeepMockProxy } from 'vitest-mock-extended';
import { PostgresStore, sqlState } from './postgres-store.js';
import type { DbClient } from './connection.js';
import { RegistrationError } from '@shared/errors/domain-errors.js';
import { ErrorCodes } from '@shared/errors/error-codes.js';

function pgError(code: string): Error & { code: string } {
  return Object.assign(new Error(`pg error ${code}`), { code });
}

describe('PostgresStore', () => {
  describe('sqlState', () => {
    it('should read the code of a driver error', () => {
      expect(sqlState(pgError('23505'))).toBe('23505');
    });

    it('should look through wrapping errors', () => {
      const wrapped = new Error('query failed', { cause: pgError('40001') });

      expect(sqlState(wrapped)).toBe('40001');
    });

    it('should return undefined for values without a code', () => {
      expect(sqlState(new Error('plain'))).toBeUndefined();
      expect(sqlState('oops')).toBeUndefined();
      expect(sqlState(null)).toBeUndefined();
    });
  });

  describe('withEventTransaction', () => {
    let client: DeepMockProxy<DbClient>;
    let store: PostgresStore;

    beforeEach(() => {
      client = mockDeep<DbClient>();
      store = new PostgresStore(client, { lockTimeoutMs: 100, maxTransactionAttempts: 3 });
    });

    it('should retry a serialization failure', async () => {
      client.db.transaction
        .mockRejectedValueOnce(pgError('40001'))
        .mockResolvedValueOnce('done');

      const result = await store.withEventTransaction('event-1', async () => 'done');

      expect(result).toBe('done');
      expect(client.db.transaction).toHaveBeenCalledTimes(2);
    });

    it('should give up after the configured attempts', async () => {
      const deadlock = pgError('40P01');
      client.db.transaction.mockRejectedValue(deadlock);

      await expect(store.withEventTransaction('event-1', async () => 'done')).rejects.toBe(
        deadlock
      );
      expect(client.db.transaction).toHaveBeenCalledTimes(3);
    });

    it('should map a lock timeout to RegistrationError', async () => {
      client.db.transaction.mockRejectedValue(pgError('55P03'));

      const error = await store
        .withEventTransaction('event-1', async () => 'done')
        .catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(RegistrationError);
      expect(error).toMatchObject({
        message: 'Timed out waiting for a lock on event event-1',
        code: ErrorCodes.LOCK_TIMEOUT,
      });
      expect(client.db.transaction).toHaveBeenCalledTimes(1);
    });

    it('should rethrow other failures without retrying', async () => {
      const failure = new Error('connection refused');
      client.db.transaction.mockRejectedValue(failure);

      await expect(store.withEventTransaction('event-1', async () => 'done')).rejects.toBe(
        failure
      );
      expect(client.db.transaction).toHaveBeenCalledTimes(1);
    });
  });

  describe('ping', () => {
    it('should report false when the database is unreachable', async () => {
      const client = mockDeep<DbClient>();
      client.db.execute.mockRejectedValue(new Error('connection refused'));
      const store = new PostgresStore(client, { lockTimeoutMs: 100, maxTransactionAttempts: 1 });

      expect(await store.ping()).toBe(false);
    });
  });
});
