import { KeyedMutex } from '@shared/utils/keyed-mutex.js';
import { DuplicateError, NotFoundError, RegistrationError } from '@shared/errors/domain-errors.js';
import { ErrorCodes } from '@shared/errors/error-codes.js';
import { RegistrationStatus } from '@shared/models/index.js';
import type { User, EventRecord, Registration, WaitlistEntry } from '@shared/models/index.js';
import type {
  EventRepository,
  EventTransactionWork,
  RegistrationRepository,
  RegistrationStore,
  Repositories,
  UserRepository,
  WaitlistRepository,
} from './store.js';

// ============================================================================
// Tables & Undo Journal
// ============================================================================

interface Row<T> {
  seq: number;
  record: T;
}

class MemoryTables {
  readonly users = new Map<string, User>();
  readonly events = new Map<string, EventRecord>();
  readonly registrations = new Map<string, Row<Registration>>();
  readonly waitlist = new Map<string, Row<WaitlistEntry>>();
  private seq = 0;

  nextSeq(): number {
    this.seq += 1;
    return this.seq;
  }

  clear(): void {
    this.users.clear();
    this.events.clear();
    this.registrations.clear();
    this.waitlist.clear();
    this.seq = 0;
  }
}

/**
 * Records the inverse of every write made inside an atomic unit.
 */
class UndoJournal {
  private readonly undos: Array<() => void> = [];

  record(undo: () => void): void {
    this.undos.push(undo);
  }

  rollback(): void {
    while (this.undos.length > 0) {
      const undo = this.undos.pop();
      undo?.();
    }
  }
}

function rowsFor<T extends { userId: string; eventId: string }>(
  table: Map<string, Row<T>>,
  predicate: (record: T) => boolean
): T[] {
  return [...table.values()]
    .filter((row) => predicate(row.record))
    .sort((a, b) => a.seq - b.seq)
    .map((row) => row.record);
}

function findPair<T extends { userId: string; eventId: string }>(
  table: Map<string, Row<T>>,
  userId: string,
  eventId: string
): Row<T> | undefined {
  for (const row of table.values()) {
    if (row.record.userId === userId && row.record.eventId === eventId) return row;
  }
  return undefined;
}

function assertReferences(tables: MemoryTables, userId: string, eventId: string): void {
  if (!tables.users.has(userId)) {
    throw new NotFoundError(`User ${userId} not found`);
  }
  if (!tables.events.has(eventId)) {
    throw new NotFoundError(`Event ${eventId} not found`);
  }
}

// ============================================================================
// Repositories
// ============================================================================

class MemoryUserRepository implements UserRepository {
  constructor(
    private readonly tables: MemoryTables,
    private readonly journal?: UndoJournal
  ) {}

  async save(user: User): Promise<User> {
    if (this.tables.users.has(user.id)) {
      throw new DuplicateError(`User with ID ${user.id} already exists`);
    }
    this.tables.users.set(user.id, user);
    this.journal?.record(() => this.tables.users.delete(user.id));
    return user;
  }

  async findById(id: string): Promise<User | null> {
    return this.tables.users.get(id) ?? null;
  }

  async exists(id: string): Promise<boolean> {
    return this.tables.users.has(id);
  }
}

class MemoryEventRepository implements EventRepository {
  constructor(
    private readonly tables: MemoryTables,
    private readonly journal?: UndoJournal
  ) {}

  async save(event: EventRecord): Promise<EventRecord> {
    if (this.tables.events.has(event.id)) {
      throw new DuplicateError(`Event with ID ${event.id} already exists`);
    }
    this.tables.events.set(event.id, event);
    this.journal?.record(() => this.tables.events.delete(event.id));
    return event;
  }

  async findById(id: string): Promise<EventRecord | null> {
    return this.tables.events.get(id) ?? null;
  }

  async exists(id: string): Promise<boolean> {
    return this.tables.events.has(id);
  }
}

class MemoryRegistrationRepository implements RegistrationRepository {
  constructor(
    private readonly tables: MemoryTables,
    private readonly journal?: UndoJournal
  ) {}

  async save(registration: Registration): Promise<Registration> {
    assertReferences(this.tables, registration.userId, registration.eventId);
    if (findPair(this.tables.registrations, registration.userId, registration.eventId)) {
      throw new DuplicateError(
        `User ${registration.userId} is already registered for event ${registration.eventId}`
      );
    }

    const row = { seq: this.tables.nextSeq(), record: registration };
    this.tables.registrations.set(registration.id, row);
    this.journal?.record(() => this.tables.registrations.delete(registration.id));
    return registration;
  }

  async delete(userId: string, eventId: string): Promise<boolean> {
    const row = findPair(this.tables.registrations, userId, eventId);
    if (!row) return false;

    this.tables.registrations.delete(row.record.id);
    this.journal?.record(() => this.tables.registrations.set(row.record.id, row));
    return true;
  }

  async findByUserAndEvent(userId: string, eventId: string): Promise<Registration | null> {
    return findPair(this.tables.registrations, userId, eventId)?.record ?? null;
  }

  async findActiveByUser(userId: string): Promise<Registration[]> {
    return rowsFor(
      this.tables.registrations,
      (record) => record.userId === userId && record.status === RegistrationStatus.ACTIVE
    );
  }

  async countActiveByEvent(eventId: string): Promise<number> {
    return rowsFor(
      this.tables.registrations,
      (record) => record.eventId === eventId && record.status === RegistrationStatus.ACTIVE
    ).length;
  }

  async findByEvent(eventId: string): Promise<Registration[]> {
    return rowsFor(this.tables.registrations, (record) => record.eventId === eventId);
  }
}

class MemoryWaitlistRepository implements WaitlistRepository {
  constructor(
    private readonly tables: MemoryTables,
    private readonly journal?: UndoJournal
  ) {}

  async add(entry: WaitlistEntry): Promise<WaitlistEntry> {
    assertReferences(this.tables, entry.userId, entry.eventId);
    if (findPair(this.tables.waitlist, entry.userId, entry.eventId)) {
      throw new DuplicateError(
        `User ${entry.userId} is already on the waitlist for event ${entry.eventId}`
      );
    }
    const taken = [...this.tables.waitlist.values()].some(
      (row) => row.record.eventId === entry.eventId && row.record.position === entry.position
    );
    if (taken) {
      throw new DuplicateError(
        `Waitlist position ${entry.position} is already taken for event ${entry.eventId}`
      );
    }

    const row = { seq: this.tables.nextSeq(), record: entry };
    this.tables.waitlist.set(entry.id, row);
    this.journal?.record(() => this.tables.waitlist.delete(entry.id));
    return entry;
  }

  async remove(userId: string, eventId: string): Promise<boolean> {
    const row = findPair(this.tables.waitlist, userId, eventId);
    if (!row) return false;

    this.tables.waitlist.delete(row.record.id);
    this.journal?.record(() => this.tables.waitlist.set(row.record.id, row));
    return true;
  }

  async findByUserAndEvent(userId: string, eventId: string): Promise<WaitlistEntry | null> {
    return findPair(this.tables.waitlist, userId, eventId)?.record ?? null;
  }

  async findFirstByEvent(eventId: string): Promise<WaitlistEntry | null> {
    const [first] = await this.findByEvent(eventId);
    return first ?? null;
  }

  async nextPosition(eventId: string): Promise<number> {
    const entries = await this.findByEvent(eventId);
    const last = entries[entries.length - 1];
    return last ? last.position + 1 : 1;
  }

  async findByEvent(eventId: string): Promise<WaitlistEntry[]> {
    return rowsFor(this.tables.waitlist, (record) => record.eventId === eventId).sort(
      (a, b) => a.position - b.position
    );
  }
}

// ============================================================================
// Store
// ============================================================================

export interface InMemoryStoreOptions {
  /** Max wait for an event lock before the unit fails. Unbounded when omitted. */
  lockTimeoutMs?: number;
}

/**
 * Process-local store. Atomic units hold a per-event mutex and roll back
 * through an undo journal when they throw.
 */
export class InMemoryStore implements RegistrationStore {
  private readonly tables = new MemoryTables();
  private readonly locks = new KeyedMutex();

  readonly users: UserRepository;
  readonly events: EventRepository;
  readonly registrations: RegistrationRepository;
  readonly waitlist: WaitlistRepository;

  constructor(private readonly options: InMemoryStoreOptions = {}) {
    const repositories = this.createRepositories();
    this.users = repositories.users;
    this.events = repositories.events;
    this.registrations = repositories.registrations;
    this.waitlist = repositories.waitlist;
  }

  async withEventTransaction<T>(eventId: string, work: EventTransactionWork<T>): Promise<T> {
    return this.locks.runExclusive(
      eventId,
      async () => {
        const journal = new UndoJournal();
        try {
          return await work(this.createRepositories(journal));
        } catch (error) {
          journal.rollback();
          throw error;
        }
      },
      {
        timeoutMs: this.options.lockTimeoutMs,
        onTimeout: () =>
          new RegistrationError(
            `Timed out waiting for a lock on event ${eventId}`,
            { eventId },
            ErrorCodes.LOCK_TIMEOUT
          ),
      }
    );
  }

  async ping(): Promise<boolean> {
    return true;
  }

  async close(): Promise<void> {
    this.tables.clear();
  }

  /**
   * Drop every record. Test helper.
   */
  clear(): void {
    this.tables.clear();
  }

  private createRepositories(journal?: UndoJournal): Repositories {
    return {
      users: new MemoryUserRepository(this.tables, journal),
      events: new MemoryEventRepository(this.tables, journal),
      registrations: new MemoryRegistrationRepository(this.tables, journal),
      waitlist: new MemoryWaitlistRepository(this.tables, journal),
    };
  }
}
