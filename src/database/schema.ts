import { sql } from 'drizzle-orm';
import {
  pgTable,
  pgEnum,
  uuid,
  varchar,
  integer,
  boolean,
  timestamp,
  index,
  uniqueIndex,
  check,
} from 'drizzle-orm/pg-core';

export const registrationStatus = pgEnum('registration_status', ['ACTIVE', 'WAITLISTED']);

export const users = pgTable('users', {
  id: varchar('id', { length: 100 }).primaryKey(),
  name: varchar('name', { length: 200 }).notNull(),
  created_at: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
});

/**
 * Registration configuration of an event. Rows are write-once; the row is also
 * the lock target that serializes registration changes for the event.
 */
export const events = pgTable(
  'events',
  {
    id: varchar('id', { length: 100 }).primaryKey(),
    name: varchar('name', { length: 200 }).notNull(),
    capacity: integer('capacity').notNull(),
    has_waitlist: boolean('has_waitlist').notNull().default(false),
    created_at: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [check('chk_events_capacity_positive', sql`${table.capacity} > 0`)]
);

export const registrations = pgTable(
  'registrations',
  {
    id: uuid('id').primaryKey(),
    user_id: varchar('user_id', { length: 100 })
      .notNull()
      .references(() => users.id),
    event_id: varchar('event_id', { length: 100 })
      .notNull()
      .references(() => events.id),
    status: registrationStatus('status').notNull(),
    created_at: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    uniqueIndex('uq_registrations_user_event').on(table.user_id, table.event_id),
    index('idx_registrations_event_status').on(table.event_id, table.status),
    index('idx_registrations_user_id').on(table.user_id),
  ]
);

/**
 * Waitlist positions are a per-event monotonic counter; promotion consumes the
 * lowest remaining position.
 */
export const waitlistEntries = pgTable(
  'waitlist_entries',
  {
    id: uuid('id').primaryKey(),
    user_id: varchar('user_id', { length: 100 })
      .notNull()
      .references(() => users.id),
    event_id: varchar('event_id', { length: 100 })
      .notNull()
      .references(() => events.id),
    position: integer('position').notNull(),
    created_at: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    uniqueIndex('uq_waitlist_user_event').on(table.user_id, table.event_id),
    uniqueIndex('uq_waitlist_event_position').on(table.event_id, table.position),
  ]
);
