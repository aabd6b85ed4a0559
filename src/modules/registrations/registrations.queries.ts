import { store } from '@/database/client.js';
import { getEvent } from '@events';
import { getUser } from '@users';
import { RegistrationStatus, type EventRecord, type WaitlistEntry } from '@shared/models/index.js';

export interface EventCapacity {
  eventId: string;
  totalCapacity: number;
  availableCapacity: number;
}

export type RankedWaitlistEntry = WaitlistEntry & {
  /** 1-based place in the promotion queue. */
  rank: number;
};

/**
 * Free slots of an event: capacity minus active registrations.
 */
export async function getAvailableCapacity(eventId: string): Promise<number> {
  const { availableCapacity } = await getEventCapacity(eventId);
  return availableCapacity;
}

export async function getEventCapacity(eventId: string): Promise<EventCapacity> {
  const event = await getEvent(eventId);
  const activeCount = await store.registrations.countActiveByEvent(eventId);

  return {
    eventId: event.id,
    totalCapacity: event.capacity,
    availableCapacity: event.capacity - activeCount,
  };
}

/**
 * Events the user holds an active registration for, oldest registration
 * first. Waitlisted events are never included.
 */
export async function getRegisteredEvents(userId: string): Promise<EventRecord[]> {
  await getUser(userId);

  const registrations = await store.registrations.findActiveByUser(userId);
  const events = await Promise.all(
    registrations.map((registration) => store.events.findById(registration.eventId))
  );

  return events.filter((event): event is EventRecord => event !== null);
}

export async function isRegistered(userId: string, eventId: string): Promise<boolean> {
  const registration = await store.registrations.findByUserAndEvent(userId, eventId);
  return registration?.status === RegistrationStatus.ACTIVE;
}

export async function isWaitlisted(userId: string, eventId: string): Promise<boolean> {
  const entry = await store.waitlist.findByUserAndEvent(userId, eventId);
  return entry !== null;
}

/**
 * Waitlist of an event in promotion order.
 */
export async function getWaitlist(eventId: string): Promise<RankedWaitlistEntry[]> {
  await getEvent(eventId);

  const entries = await store.waitlist.findByEvent(eventId);
  return entries.map((entry, index) => ({ ...entry, rank: index + 1 }));
}
