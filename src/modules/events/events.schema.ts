import { z } from 'zod';
import { EVENT_MAX_CAPACITY } from '@shared/models/index.js';

// ============================================================================
// Request Schemas
// ============================================================================

export const CreateEventSchema = z
  .object({
    eventId: z.string().min(1).max(100).optional().nullable(),
    name: z.string().min(1).max(200),
    capacity: z.number().int().positive().max(EVENT_MAX_CAPACITY),
    hasWaitlist: z.boolean().default(false),
  })
  .strict();

export const EventIdParamSchema = z
  .object({
    eventId: z.string().min(1),
  })
  .strict();

// ============================================================================
// Types
// ============================================================================

export type CreateEventInput = z.input<typeof CreateEventSchema>;
export type EventIdParam = z.infer<typeof EventIdParamSchema>;
