import { store } from '@/database/client.js';
import type { Repositories } from '@/database/store.js';
import { CapacityError, DuplicateError, NotFoundError } from '@shared/errors/domain-errors.js';
import {
  RegistrationStatus,
  createRegistrationRecord,
  createWaitlistEntryRecord,
  type Registration,
  type WaitlistEntry,
} from '@shared/models/index.js';
import { logger } from '@shared/utils/logger.js';

// ============================================================================
// Types
// ============================================================================

export type ActiveRegistration = {
  status: typeof RegistrationStatus.ACTIVE;
  registration: Registration;
};

export type WaitlistRegistration = {
  status: typeof RegistrationStatus.WAITLISTED;
  waitlistEntry: WaitlistEntry;
};

export type RegistrationDenied = {
  status: 'DENIED';
  eventId: string;
  reason: string;
};

/**
 * Every expected result of a registration attempt. Precondition failures
 * (unknown user/event, duplicates) are thrown instead.
 */
export type RegistrationOutcome = ActiveRegistration | WaitlistRegistration | RegistrationDenied;

export interface UnregistrationResult {
  unregistered: Registration;
  /** Registration created for the first waitlisted user, if any. */
  promoted: Registration | null;
}

// ============================================================================
// Engine
// ============================================================================

/**
 * Register a user for an event.
 *
 * Takes a free slot when one exists, otherwise queues on the waitlist when the
 * event has one, otherwise is denied. The capacity check and the write run in
 * one atomic unit for the event, so concurrent callers racing for the last
 * slot see each other's writes in arrival order.
 */
export async function registerUser(userId: string, eventId: string): Promise<RegistrationOutcome> {
  return store.withEventTransaction(eventId, async (tx) => {
    const user = await tx.users.findById(userId);
    if (!user) {
      throw new NotFoundError(`User ${userId} not found`);
    }

    const event = await tx.events.findById(eventId);
    if (!event) {
      throw new NotFoundError(`Event ${eventId} not found`);
    }

    const existingRegistration = await tx.registrations.findByUserAndEvent(userId, eventId);
    if (existingRegistration) {
      throw new DuplicateError(`User ${userId} is already registered for event ${eventId}`);
    }

    const existingEntry = await tx.waitlist.findByUserAndEvent(userId, eventId);
    if (existingEntry) {
      throw new DuplicateError(`User ${userId} is already on the waitlist for event ${eventId}`);
    }

    const activeCount = await tx.registrations.countActiveByEvent(eventId);

    if (activeCount < event.capacity) {
      const registration = await tx.registrations.save(
        createRegistrationRecord({ userId, eventId, status: RegistrationStatus.ACTIVE })
      );
      logger.info({ userId, eventId, registrationId: registration.id }, 'User registered for event');
      return { status: RegistrationStatus.ACTIVE, registration };
    }

    if (!event.hasWaitlist) {
      logger.info({ userId, eventId, capacity: event.capacity }, 'Registration denied, event is full');
      return {
        status: 'DENIED',
        eventId,
        reason: `Event ${eventId} is full and has no waitlist`,
      };
    }

    const position = await tx.waitlist.nextPosition(eventId);
    const waitlistEntry = await tx.waitlist.add(
      createWaitlistEntryRecord({ userId, eventId, position })
    );
    logger.info({ userId, eventId, position }, 'User added to waitlist');
    return { status: RegistrationStatus.WAITLISTED, waitlistEntry };
  });
}

/**
 * Unregister a user from an event and promote the first waitlisted user into
 * the freed slot. Both happen in one atomic unit.
 */
export async function unregisterUser(
  userId: string,
  eventId: string
): Promise<UnregistrationResult> {
  return store.withEventTransaction(eventId, async (tx) => {
    const registration = await tx.registrations.findByUserAndEvent(userId, eventId);
    if (!registration || registration.status !== RegistrationStatus.ACTIVE) {
      throw new NotFoundError(`User ${userId} is not registered for event ${eventId}`);
    }

    await tx.registrations.delete(userId, eventId);
    logger.info({ userId, eventId }, 'User unregistered from event');

    const promoted = await promoteFirstWaitlisted(tx, eventId);
    return { unregistered: registration, promoted };
  });
}

/**
 * Turn the waitlist entry with the lowest remaining position into an active
 * registration. Remaining entries keep their positions.
 */
async function promoteFirstWaitlisted(
  tx: Repositories,
  eventId: string
): Promise<Registration | null> {
  const next = await tx.waitlist.findFirstByEvent(eventId);
  if (!next) return null;

  await tx.waitlist.remove(next.userId, eventId);
  const promoted = await tx.registrations.save(
    createRegistrationRecord({ userId: next.userId, eventId, status: RegistrationStatus.ACTIVE })
  );

  logger.info(
    { userId: next.userId, eventId, fromPosition: next.position, registrationId: promoted.id },
    'Promoted waitlisted user to active registration'
  );
  return promoted;
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Narrow an outcome to the accepted variants, throwing CapacityError for a
 * denied one. For callers that treat a full event as a failure.
 */
export function assertNotDenied(
  outcome: RegistrationOutcome
): Exclude<RegistrationOutcome, RegistrationDenied> {
  if (outcome.status === 'DENIED') {
    throw new CapacityError(outcome.reason, { eventId: outcome.eventId });
  }
  return outcome;
}
