import { beforeEach, vi } from 'vitest';
import { InMemoryStore } from '@/database/memory-store.js';

/**
 * In-process store standing in for the configured one.
 * Every record is dropped before each test.
 *
 * @example
 * await storeMock.users.save(createTestUser({ id: 'user-1' }));
 */
export const storeMock = new InMemoryStore({ lockTimeoutMs: 1000 });

// Mock the database client module
vi.mock('@/database/client.js', () => ({
  store: storeMock,
}));

beforeEach(() => {
  storeMock.clear();
});
