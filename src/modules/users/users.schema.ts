import { z } from 'zod';
import { USER_ID_MAX_LENGTH, USER_NAME_MAX_LENGTH } from '@shared/models/index.js';

// ============================================================================
// Request Schemas
// ============================================================================

export const CreateUserSchema = z
  .object({
    userId: z.string().min(1).max(USER_ID_MAX_LENGTH),
    name: z.string().min(1).max(USER_NAME_MAX_LENGTH),
  })
  .strict();

export const UserIdParamSchema = z
  .object({
    userId: z.string().min(1),
  })
  .strict();

// ============================================================================
// Types
// ============================================================================

export type CreateUserInput = z.infer<typeof CreateUserSchema>;
export type UserIdParam = z.infer<typeof UserIdParamSchema>;
