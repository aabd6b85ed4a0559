import { and, asc, count, eq, max, sql } from 'drizzle-orm';
import type { PgDatabase } from 'drizzle-orm/pg-core';
import type { PostgresJsQueryResultHKT } from 'drizzle-orm/postgres-js';
import {
  DuplicateError,
  NotFoundError,
  RegistrationError,
} from '@shared/errors/domain-errors.js';
import { ErrorCodes } from '@shared/errors/error-codes.js';
import { logger } from '@shared/utils/logger.js';
import {
  RegistrationStatus,
  createEventRecord,
  createRegistrationRecord,
  createUserRecord,
  createWaitlistEntryRecord,
  type EventRecord,
  type Registration,
  type User,
  type WaitlistEntry,
} from '@shared/models/index.js';
import * as schema from './schema.js';
import { users, events, registrations, waitlistEntries } from './schema.js';
import type { DbClient } from './connection.js';
import type {
  EventRepository,
  EventTransactionWork,
  RegistrationRepository,
  RegistrationStore,
  Repositories,
  UserRepository,
  WaitlistRepository,
} from './store.js';

/** Either the root database or an open transaction. */
type Executor = PgDatabase<PostgresJsQueryResultHKT, typeof schema>;

const PgErrorCodes = {
  UNIQUE_VIOLATION: '23505',
  FOREIGN_KEY_VIOLATION: '23503',
  SERIALIZATION_FAILURE: '40001',
  DEADLOCK_DETECTED: '40P01',
  LOCK_NOT_AVAILABLE: '55P03',
} as const;

const RETRYABLE_CODES: ReadonlySet<string> = new Set([
  PgErrorCodes.SERIALIZATION_FAILURE,
  PgErrorCodes.DEADLOCK_DETECTED,
]);

// ============================================================================
// Error Translation
// ============================================================================

/**
 * SQLSTATE of a driver error, looking through wrapping errors.
 */
export function sqlState(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  if ('code' in error && typeof error.code === 'string') return error.code;
  if ('cause' in error) return sqlState(error.cause);
  return undefined;
}

/**
 * Map constraint violations to domain errors; anything else is rethrown as is.
 */
function translateWriteError(error: unknown, onDuplicate: () => DuplicateError): unknown {
  switch (sqlState(error)) {
    case PgErrorCodes.UNIQUE_VIOLATION:
      return onDuplicate();
    case PgErrorCodes.FOREIGN_KEY_VIOLATION:
      return new NotFoundError('Referenced user or event not found');
    default:
      return error;
  }
}

// ============================================================================
// Row Mapping
// ============================================================================

function toUser(row: typeof users.$inferSelect): User {
  return createUserRecord({ id: row.id, name: row.name, createdAt: row.created_at });
}

function toEvent(row: typeof events.$inferSelect): EventRecord {
  return createEventRecord({
    id: row.id,
    name: row.name,
    capacity: row.capacity,
    hasWaitlist: row.has_waitlist,
    createdAt: row.created_at,
  });
}

function toRegistration(row: typeof registrations.$inferSelect): Registration {
  return createRegistrationRecord({
    id: row.id,
    userId: row.user_id,
    eventId: row.event_id,
    status: row.status,
    createdAt: row.created_at,
  });
}

function toWaitlistEntry(row: typeof waitlistEntries.$inferSelect): WaitlistEntry {
  return createWaitlistEntryRecord({
    id: row.id,
    userId: row.user_id,
    eventId: row.event_id,
    position: row.position,
    createdAt: row.created_at,
  });
}

// ============================================================================
// Repositories
// ============================================================================

class PgUserRepository implements UserRepository {
  constructor(private readonly db: Executor) {}

  async save(user: User): Promise<User> {
    try {
      await this.db
        .insert(users)
        .values({ id: user.id, name: user.name, created_at: user.createdAt });
    } catch (error) {
      throw translateWriteError(
        error,
        () => new DuplicateError(`User with ID ${user.id} already exists`)
      );
    }
    return user;
  }

  async findById(id: string): Promise<User | null> {
    const rows = await this.db.select().from(users).where(eq(users.id, id)).limit(1);
    const [row] = rows;
    return row ? toUser(row) : null;
  }

  async exists(id: string): Promise<boolean> {
    const rows = await this.db.select({ id: users.id }).from(users).where(eq(users.id, id)).limit(1);
    return rows.length > 0;
  }
}

class PgEventRepository implements EventRepository {
  constructor(private readonly db: Executor) {}

  async save(event: EventRecord): Promise<EventRecord> {
    try {
      await this.db.insert(events).values({
        id: event.id,
        name: event.name,
        capacity: event.capacity,
        has_waitlist: event.hasWaitlist,
        created_at: event.createdAt,
      });
    } catch (error) {
      throw translateWriteError(
        error,
        () => new DuplicateError(`Event with ID ${event.id} already exists`)
      );
    }
    return event;
  }

  async findById(id: string): Promise<EventRecord | null> {
    const rows = await this.db.select().from(events).where(eq(events.id, id)).limit(1);
    const [row] = rows;
    return row ? toEvent(row) : null;
  }

  async exists(id: string): Promise<boolean> {
    const rows = await this.db
      .select({ id: events.id })
      .from(events)
      .where(eq(events.id, id))
      .limit(1);
    return rows.length > 0;
  }
}

class PgRegistrationRepository implements RegistrationRepository {
  constructor(private readonly db: Executor) {}

  async save(registration: Registration): Promise<Registration> {
    try {
      await this.db.insert(registrations).values({
        id: registration.id,
        user_id: registration.userId,
        event_id: registration.eventId,
        status: registration.status,
        created_at: registration.createdAt,
      });
    } catch (error) {
      throw translateWriteError(
        error,
        () =>
          new DuplicateError(
            `User ${registration.userId} is already registered for event ${registration.eventId}`
          )
      );
    }
    return registration;
  }

  async delete(userId: string, eventId: string): Promise<boolean> {
    const deleted = await this.db
      .delete(registrations)
      .where(and(eq(registrations.user_id, userId), eq(registrations.event_id, eventId)))
      .returning({ id: registrations.id });
    return deleted.length > 0;
  }

  async findByUserAndEvent(userId: string, eventId: string): Promise<Registration | null> {
    const rows = await this.db
      .select()
      .from(registrations)
      .where(and(eq(registrations.user_id, userId), eq(registrations.event_id, eventId)))
      .limit(1);
    const [row] = rows;
    return row ? toRegistration(row) : null;
  }

  async findActiveByUser(userId: string): Promise<Registration[]> {
    const rows = await this.db
      .select()
      .from(registrations)
      .where(
        and(
          eq(registrations.user_id, userId),
          eq(registrations.status, RegistrationStatus.ACTIVE)
        )
      )
      .orderBy(asc(registrations.created_at), asc(registrations.id));
    return rows.map(toRegistration);
  }

  async countActiveByEvent(eventId: string): Promise<number> {
    const rows = await this.db
      .select({ value: count() })
      .from(registrations)
      .where(
        and(
          eq(registrations.event_id, eventId),
          eq(registrations.status, RegistrationStatus.ACTIVE)
        )
      );
    const [row] = rows;
    return row ? row.value : 0;
  }

  async findByEvent(eventId: string): Promise<Registration[]> {
    const rows = await this.db
      .select()
      .from(registrations)
      .where(eq(registrations.event_id, eventId))
      .orderBy(asc(registrations.created_at), asc(registrations.id));
    return rows.map(toRegistration);
  }
}

class PgWaitlistRepository implements WaitlistRepository {
  constructor(private readonly db: Executor) {}

  async add(entry: WaitlistEntry): Promise<WaitlistEntry> {
    try {
      await this.db.insert(waitlistEntries).values({
        id: entry.id,
        user_id: entry.userId,
        event_id: entry.eventId,
        position: entry.position,
        created_at: entry.createdAt,
      });
    } catch (error) {
      throw translateWriteError(
        error,
        () =>
          new DuplicateError(
            `User ${entry.userId} is already on the waitlist for event ${entry.eventId}`
          )
      );
    }
    return entry;
  }

  async remove(userId: string, eventId: string): Promise<boolean> {
    const deleted = await this.db
      .delete(waitlistEntries)
      .where(and(eq(waitlistEntries.user_id, userId), eq(waitlistEntries.event_id, eventId)))
      .returning({ id: waitlistEntries.id });
    return deleted.length > 0;
  }

  async findByUserAndEvent(userId: string, eventId: string): Promise<WaitlistEntry | null> {
    const rows = await this.db
      .select()
      .from(waitlistEntries)
      .where(and(eq(waitlistEntries.user_id, userId), eq(waitlistEntries.event_id, eventId)))
      .limit(1);
    const [row] = rows;
    return row ? toWaitlistEntry(row) : null;
  }

  async findFirstByEvent(eventId: string): Promise<WaitlistEntry | null> {
    const rows = await this.db
      .select()
      .from(waitlistEntries)
      .where(eq(waitlistEntries.event_id, eventId))
      .orderBy(asc(waitlistEntries.position))
      .limit(1);
    const [row] = rows;
    return row ? toWaitlistEntry(row) : null;
  }

  async nextPosition(eventId: string): Promise<number> {
    const rows = await this.db
      .select({ value: max(waitlistEntries.position) })
      .from(waitlistEntries)
      .where(eq(waitlistEntries.event_id, eventId));
    const [row] = rows;
    return (row?.value ?? 0) + 1;
  }

  async findByEvent(eventId: string): Promise<WaitlistEntry[]> {
    const rows = await this.db
      .select()
      .from(waitlistEntries)
      .where(eq(waitlistEntries.event_id, eventId))
      .orderBy(asc(waitlistEntries.position));
    return rows.map(toWaitlistEntry);
  }
}

function createRepositories(db: Executor): Repositories {
  return {
    users: new PgUserRepository(db),
    events: new PgEventRepository(db),
    registrations: new PgRegistrationRepository(db),
    waitlist: new PgWaitlistRepository(db),
  };
}

// ============================================================================
// Store
// ============================================================================

export interface PostgresStoreOptions {
  lockTimeoutMs: number;
  maxTransactionAttempts: number;
}

/**
 * PostgreSQL store. An atomic unit is a transaction that first locks the
 * event row, so units on the same event run one after another.
 */
export class PostgresStore implements RegistrationStore {
  readonly users: UserRepository;
  readonly events: EventRepository;
  readonly registrations: RegistrationRepository;
  readonly waitlist: WaitlistRepository;

  constructor(
    private readonly client: DbClient,
    private readonly options: PostgresStoreOptions
  ) {
    const repositories = createRepositories(client.db);
    this.users = repositories.users;
    this.events = repositories.events;
    this.registrations = repositories.registrations;
    this.waitlist = repositories.waitlist;
  }

  async withEventTransaction<T>(eventId: string, work: EventTransactionWork<T>): Promise<T> {
    const lockTimeoutMs = Math.trunc(this.options.lockTimeoutMs);
    let attempt = 1;

    while (true) {
      try {
        return await this.client.db.transaction(async (tx) => {
          await tx.execute(sql.raw(`SET LOCAL lock_timeout = ${lockTimeoutMs}`));
          await tx
            .select({ id: events.id })
            .from(events)
            .where(eq(events.id, eventId))
            .for('update');
          return work(createRepositories(tx));
        });
      } catch (error) {
        const state = sqlState(error);

        if (state !== undefined && RETRYABLE_CODES.has(state) && attempt < this.options.maxTransactionAttempts) {
          logger.warn({ eventId, attempt, sqlState: state }, 'Retrying event transaction');
          attempt += 1;
          continue;
        }

        if (state === PgErrorCodes.LOCK_NOT_AVAILABLE) {
          throw new RegistrationError(
            `Timed out waiting for a lock on event ${eventId}`,
            { eventId },
            ErrorCodes.LOCK_TIMEOUT
          );
        }

        throw error;
      }
    }
  }

  async ping(): Promise<boolean> {
    try {
      await this.client.db.execute(sql`select 1`);
      return true;
    } catch (error) {
      logger.warn({ err: error }, 'Database ping failed');
      return false;
    }
  }

  async close(): Promise<void> {
    await this.client.sql.end({ timeout: 5 });
  }
}
