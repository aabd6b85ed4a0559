import { config } from '@config/app.config.js';
import { createDbClient } from './connection.js';
import { InMemoryStore } from './memory-store.js';
import { PostgresStore } from './postgres-store.js';
import type { RegistrationStore } from './store.js';

function createStore(): RegistrationStore {
  const { driver, url, poolSize } = config.database;
  const { lockTimeoutMs, maxTransactionAttempts } = config.registration;

  if (driver === 'postgres' && url !== undefined) {
    return new PostgresStore(createDbClient(url, poolSize), {
      lockTimeoutMs,
      maxTransactionAttempts,
    });
  }

  return new InMemoryStore({ lockTimeoutMs });
}

export const store: RegistrationStore = createStore();
