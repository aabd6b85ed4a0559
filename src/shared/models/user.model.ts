import { z } from 'zod';
import { buildRecord } from './record.js';

export const USER_ID_MAX_LENGTH = 100;
export const USER_NAME_MAX_LENGTH = 200;

const UserRecordSchema = z.object({
  id: z
    .string()
    .trim()
    .min(1, 'cannot be empty')
    .max(USER_ID_MAX_LENGTH, `must be at most ${USER_ID_MAX_LENGTH} characters`),
  name: z
    .string()
    .trim()
    .min(1, 'cannot be empty')
    .max(USER_NAME_MAX_LENGTH, `must be at most ${USER_NAME_MAX_LENGTH} characters`),
  createdAt: z.date(),
});

export type User = Readonly<z.output<typeof UserRecordSchema>>;

export interface UserProps {
  id: string;
  name: string;
  createdAt?: Date;
}

export function createUserRecord(props: UserProps): User {
  return buildRecord('user', UserRecordSchema, {
    ...props,
    createdAt: props.createdAt ?? new Date(),
  });
}
