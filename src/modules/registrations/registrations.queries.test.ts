import { describe, it, expect, beforeEach } from 'vitest';
import { storeMock } from '../../../tests/mocks/store.js';
import { createTestEvent, createTestUser } from '../../../tests/helpers/factories.js';
import { registerUser } from './registrations.service.js';
import {
  getAvailableCapacity,
  getEventCapacity,
  getRegisteredEvents,
  getWaitlist,
  isRegistered,
  isWaitlisted,
} from './registrations.queries.js';
import { NotFoundError } from '@shared/errors/domain-errors.js';

describe('Registration Queries', () => {
  beforeEach(async () => {
    await storeMock.users.save(createTestUser({ id: 'alice' }));
    await storeMock.users.save(createTestUser({ id: 'bob' }));
    await storeMock.users.save(createTestUser({ id: 'carol' }));
    await storeMock.events.save(createTestEvent({ id: 'small', capacity: 1, hasWaitlist: true }));
    await storeMock.events.save(createTestEvent({ id: 'large', capacity: 10 }));
  });

  describe('getAvailableCapacity', () => {
    it('should return full capacity for an empty event', async () => {
      expect(await getAvailableCapacity('large')).toBe(10);
    });

    it('should subtract active registrations only', async () => {
      await registerUser('alice', 'small');
      await registerUser('bob', 'small');

      expect(await getAvailableCapacity('small')).toBe(0);
    });

    it('should throw NotFoundError for an unknown event', async () => {
      await expect(getAvailableCapacity('missing')).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('getEventCapacity', () => {
    it('should report total and available capacity', async () => {
      await registerUser('alice', 'large');

      expect(await getEventCapacity('large')).toEqual({
        eventId: 'large',
        totalCapacity: 10,
        availableCapacity: 9,
      });
    });
  });

  describe('getRegisteredEvents', () => {
    it('should list events with an active registration in registration order', async () => {
      await registerUser('alice', 'large');
      await registerUser('alice', 'small');

      const events = await getRegisteredEvents('alice');

      expect(events.map((event) => event.id)).toEqual(['large', 'small']);
    });

    it('should leave out waitlisted events', async () => {
      await registerUser('alice', 'small');
      await registerUser('bob', 'small');
      await registerUser('bob', 'large');

      const events = await getRegisteredEvents('bob');

      expect(events.map((event) => event.id)).toEqual(['large']);
    });

    it('should return an empty list without registrations', async () => {
      expect(await getRegisteredEvents('carol')).toEqual([]);
    });

    it('should throw NotFoundError for an unknown user', async () => {
      await expect(getRegisteredEvents('ghost')).rejects.toThrow('User ghost not found');
    });
  });

  describe('isRegistered / isWaitlisted', () => {
    it('should tell active and waitlisted users apart', async () => {
      await registerUser('alice', 'small');
      await registerUser('bob', 'small');

      expect(await isRegistered('alice', 'small')).toBe(true);
      expect(await isWaitlisted('alice', 'small')).toBe(false);
      expect(await isRegistered('bob', 'small')).toBe(false);
      expect(await isWaitlisted('bob', 'small')).toBe(true);
    });

    it('should return false for unknown identifiers', async () => {
      expect(await isRegistered('ghost', 'missing')).toBe(false);
      expect(await isWaitlisted('ghost', 'missing')).toBe(false);
    });
  });

  describe('getWaitlist', () => {
    it('should return entries in promotion order with a dense rank', async () => {
      await registerUser('alice', 'small');
      await registerUser('bob', 'small');
      await registerUser('carol', 'small');

      const waitlist = await getWaitlist('small');

      expect(waitlist.map((entry) => [entry.userId, entry.position, entry.rank])).toEqual([
        ['bob', 1, 1],
        ['carol', 2, 2],
      ]);
    });

    it('should return an empty list for an event without waiting users', async () => {
      expect(await getWaitlist('large')).toEqual([]);
    });

    it('should throw NotFoundError for an unknown event', async () => {
      await expect(getWaitlist('missing')).rejects.toThrow('Event missing not found');
    });
  });
});
