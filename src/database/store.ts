import type { User, EventRecord, Registration, WaitlistEntry } from '@shared/models/index.js';

// ============================================================================
// Persistence Port
// ============================================================================

export interface UserRepository {
  /** Insert a user. Throws DuplicateError when the id is taken. */
  save(user: User): Promise<User>;
  findById(id: string): Promise<User | null>;
  exists(id: string): Promise<boolean>;
}

export interface EventRepository {
  /** Insert an event. Throws DuplicateError when the id is taken. */
  save(event: EventRecord): Promise<EventRecord>;
  findById(id: string): Promise<EventRecord | null>;
  exists(id: string): Promise<boolean>;
}

export interface RegistrationRepository {
  save(registration: Registration): Promise<Registration>;
  /** Returns false when no registration existed for the pair. */
  delete(userId: string, eventId: string): Promise<boolean>;
  findByUserAndEvent(userId: string, eventId: string): Promise<Registration | null>;
  /** Active registrations of a user, oldest first. */
  findActiveByUser(userId: string): Promise<Registration[]>;
  countActiveByEvent(eventId: string): Promise<number>;
  findByEvent(eventId: string): Promise<Registration[]>;
}

export interface WaitlistRepository {
  add(entry: WaitlistEntry): Promise<WaitlistEntry>;
  /** Returns false when no entry existed for the pair. */
  remove(userId: string, eventId: string): Promise<boolean>;
  findByUserAndEvent(userId: string, eventId: string): Promise<WaitlistEntry | null>;
  /** Entry with the minimum remaining position. */
  findFirstByEvent(eventId: string): Promise<WaitlistEntry | null>;
  /** Highest position ever held by a remaining entry, plus one. 1 when empty. */
  nextPosition(eventId: string): Promise<number>;
  /** All entries, ascending by position. */
  findByEvent(eventId: string): Promise<WaitlistEntry[]>;
}

export interface Repositories {
  users: UserRepository;
  events: EventRepository;
  registrations: RegistrationRepository;
  waitlist: WaitlistRepository;
}

export type EventTransactionWork<T> = (tx: Repositories) => Promise<T>;

export interface RegistrationStore extends Repositories {
  /**
   * Run `work` as one atomic unit scoped to an event. Units on the same event
   * never interleave, and every write of a unit that throws is rolled back.
   */
  withEventTransaction<T>(eventId: string, work: EventTransactionWork<T>): Promise<T>;

  /** Connectivity check for the health endpoint. */
  ping(): Promise<boolean>;

  close(): Promise<void>;
}
