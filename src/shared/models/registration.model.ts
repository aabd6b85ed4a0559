import { z } from 'zod';
import { randomUUID } from 'crypto';
import { buildRecord } from './record.js';

export const RegistrationStatus = {
  ACTIVE: 'ACTIVE',
  WAITLISTED: 'WAITLISTED',
} as const;

export type RegistrationStatus = (typeof RegistrationStatus)[keyof typeof RegistrationStatus];

const RegistrationRecordSchema = z.object({
  id: z.string().min(1),
  userId: z.string().min(1, 'cannot be empty'),
  eventId: z.string().min(1, 'cannot be empty'),
  status: z.enum([RegistrationStatus.ACTIVE, RegistrationStatus.WAITLISTED]),
  createdAt: z.date(),
});

const WaitlistEntryRecordSchema = z.object({
  id: z.string().min(1),
  userId: z.string().min(1, 'cannot be empty'),
  eventId: z.string().min(1, 'cannot be empty'),
  position: z.number().int('must be an integer').positive('must be a positive integer'),
  createdAt: z.date(),
});

export type Registration = Readonly<z.output<typeof RegistrationRecordSchema>>;
export type WaitlistEntry = Readonly<z.output<typeof WaitlistEntryRecordSchema>>;

export interface RegistrationProps {
  id?: string;
  userId: string;
  eventId: string;
  status?: RegistrationStatus;
  createdAt?: Date;
}

export interface WaitlistEntryProps {
  id?: string;
  userId: string;
  eventId: string;
  position: number;
  createdAt?: Date;
}

export function createRegistrationRecord(props: RegistrationProps): Registration {
  return buildRecord('registration', RegistrationRecordSchema, {
    id: props.id ?? randomUUID(),
    userId: props.userId,
    eventId: props.eventId,
    status: props.status ?? RegistrationStatus.ACTIVE,
    createdAt: props.createdAt ?? new Date(),
  });
}

export function createWaitlistEntryRecord(props: WaitlistEntryProps): WaitlistEntry {
  return buildRecord('waitlist entry', WaitlistEntryRecordSchema, {
    id: props.id ?? randomUUID(),
    userId: props.userId,
    eventId: props.eventId,
    position: props.position,
    createdAt: props.createdAt ?? new Date(),
  });
}
