import { beforeEach, vi } from 'vitest';
import { mockDeep, mockReset } from 'vitest-mock-extended';
import type { RegistrationStore, Repositories } from '@/database/store.js';

/**
 * Deep mock of the store for failure paths the in-memory store cannot produce.
 * Atomic units run their work against `txMock`.
 *
 * @example
 * txMock.users.findById.mockRejectedValue(new Error('connection reset'));
 */
export const storeDeepMock = mockDeep<RegistrationStore>();
export const txMock = mockDeep<Repositories>();

// Mock the database client module
vi.mock('@/database/client.js', () => ({
  store: storeDeepMock,
}));

// Reset all mocks before each test
beforeEach(() => {
  mockReset(storeDeepMock);
  mockReset(txMock);
  storeDeepMock.withEventTransaction.mockImplementation((_eventId, work) => work(txMock));
});
