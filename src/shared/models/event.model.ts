import { z } from 'zod';
import { randomUUID } from 'crypto';
import { buildRecord } from './record.js';

export const EVENT_MAX_CAPACITY = 100_000;

const EventRecordSchema = z.object({
  id: z.string().trim().min(1, 'cannot be empty').max(100, 'must be at most 100 characters'),
  name: z.string().trim().min(1, 'cannot be empty').max(200, 'must be at most 200 characters'),
  capacity: z
    .number()
    .int('must be an integer')
    .positive('must be a positive integer')
    .max(EVENT_MAX_CAPACITY, `must be at most ${EVENT_MAX_CAPACITY}`),
  hasWaitlist: z.boolean(),
  createdAt: z.date(),
});

/**
 * Immutable registration configuration of an event.
 */
export type EventRecord = Readonly<z.output<typeof EventRecordSchema>>;

export interface EventProps {
  id?: string | null;
  name: string;
  capacity: number;
  hasWaitlist?: boolean;
  createdAt?: Date;
}

export function createEventRecord(props: EventProps): EventRecord {
  return buildRecord('event', EventRecordSchema, {
    id: props.id ?? randomUUID(),
    name: props.name,
    capacity: props.capacity,
    hasWaitlist: props.hasWaitlist ?? false,
    createdAt: props.createdAt ?? new Date(),
  });
}
