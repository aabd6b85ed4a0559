import { store } from '@/database/client.js';
import { DuplicateError, NotFoundError } from '@shared/errors/domain-errors.js';
import { createEventRecord, type EventRecord } from '@shared/models/index.js';
import { logger } from '@shared/utils/logger.js';
import type { CreateEventInput } from './events.schema.js';

/**
 * Create a new event. A missing eventId is generated.
 */
export async function createEvent(input: CreateEventInput): Promise<EventRecord> {
  const event = createEventRecord({
    id: input.eventId,
    name: input.name,
    capacity: input.capacity,
    hasWaitlist: input.hasWaitlist,
  });

  if (await store.events.exists(event.id)) {
    throw new DuplicateError(`Event with ID ${event.id} already exists`);
  }

  const saved = await store.events.save(event);
  logger.info(
    { eventId: saved.id, capacity: saved.capacity, hasWaitlist: saved.hasWaitlist },
    'Event created'
  );
  return saved;
}

/**
 * Get event by ID.
 */
export async function getEvent(eventId: string): Promise<EventRecord> {
  const event = await store.events.findById(eventId);
  if (!event) {
    throw new NotFoundError(`Event ${eventId} not found`);
  }
  return event;
}

/**
 * Helper function to check if event exists (for validation in other modules).
 */
export async function eventExists(eventId: string): Promise<boolean> {
  return store.events.exists(eventId);
}
