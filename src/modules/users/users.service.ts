import { store } from '@/database/client.js';
import { DuplicateError, NotFoundError } from '@shared/errors/domain-errors.js';
import { createUserRecord, type User } from '@shared/models/index.js';
import { logger } from '@shared/utils/logger.js';
import type { CreateUserInput } from './users.schema.js';

/**
 * Create a new user. Identifier and name are trimmed.
 */
export async function createUser(input: CreateUserInput): Promise<User> {
  const user = createUserRecord({ id: input.userId, name: input.name });

  if (await store.users.exists(user.id)) {
    throw new DuplicateError(`User with ID ${user.id} already exists`);
  }

  const saved = await store.users.save(user);
  logger.info({ userId: saved.id }, 'User created');
  return saved;
}

/**
 * Get user by ID.
 */
export async function getUser(userId: string): Promise<User> {
  const user = await store.users.findById(userId);
  if (!user) {
    throw new NotFoundError(`User ${userId} not found`);
  }
  return user;
}

/**
 * Helper function to check if user exists (for validation in other modules).
 */
export async function userExists(userId: string): Promise<boolean> {
  return store.users.exists(userId);
}
