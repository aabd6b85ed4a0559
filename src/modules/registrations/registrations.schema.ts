import { z } from 'zod';

// ============================================================================
// Request Schemas
// ============================================================================

export const RegisterSchema = z
  .object({
    userId: z.string().min(1),
    eventId: z.string().min(1),
  })
  .strict();

export const RegistrationPairQuerySchema = z
  .object({
    userId: z.string().min(1),
    eventId: z.string().min(1),
  })
  .strict();

export const EventIdParamSchema = z
  .object({
    eventId: z.string().min(1),
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

export type RegisterInput = z.infer<typeof RegisterSchema>;
export type RegistrationPairQuery = z.infer<typeof RegistrationPairQuerySchema>;
