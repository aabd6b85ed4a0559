import { describe, it, expect } from 'vitest';
import { storeDeepMock, txMock } from '../../../tests/mocks/store-deep.js';
import { createTestEvent, createTestUser } from '../../../tests/helpers/factories.js';
import { registerUser, unregisterUser } from './registrations.service.js';
import { RegistrationError } from '@shared/errors/domain-errors.js';
import { ErrorCodes } from '@shared/errors/error-codes.js';

describe('Registrations Service failure propagation', () => {
  it('should surface a storage failure unchanged', async () => {
    const failure = new Error('connection reset');
    txMock.users.findById.mockRejectedValue(failure);

    await expect(registerUser('alice', 'event-1')).rejects.toBe(failure);
    expect(txMock.registrations.save).not.toHaveBeenCalled();
  });

  it('should surface a failed write after the capacity check', async () => {
    const failure = new Error('disk full');
    txMock.users.findById.mockResolvedValue(createTestUser({ id: 'alice' }));
    txMock.events.findById.mockResolvedValue(createTestEvent({ id: 'event-1', capacity: 1 }));
    txMock.registrations.findByUserAndEvent.mockResolvedValue(null);
    txMock.waitlist.findByUserAndEvent.mockResolvedValue(null);
    txMock.registrations.countActiveByEvent.mockResolvedValue(0);
    txMock.registrations.save.mockRejectedValue(failure);

    await expect(registerUser('alice', 'event-1')).rejects.toBe(failure);
    expect(storeDeepMock.withEventTransaction).toHaveBeenCalledWith('event-1', expect.any(Function));
  });

  it('should surface a lock timeout from the atomic unit', async () => {
    storeDeepMock.withEventTransaction.mockRejectedValue(
      new RegistrationError(
        'Timed out waiting for a lock on event event-1',
        { eventId: 'event-1' },
        ErrorCodes.LOCK_TIMEOUT
      )
    );

    await expect(unregisterUser('alice', 'event-1')).rejects.toMatchObject({
      statusCode: 400,
      code: ErrorCodes.LOCK_TIMEOUT,
    });
    expect(txMock.registrations.delete).not.toHaveBeenCalled();
  });
});
