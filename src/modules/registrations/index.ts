// ============================================================================
// Registrations Module - Barrel Export
// ============================================================================

// Engine
export { registerUser, unregisterUser, assertNotDenied } from './registrations.service.js';

export type {
  ActiveRegistration,
  WaitlistRegistration,
  RegistrationDenied,
  RegistrationOutcome,
  UnregistrationResult,
} from './registrations.service.js';

// Queries
export {
  getAvailableCapacity,
  getEventCapacity,
  getRegisteredEvents,
  isRegistered,
  isWaitlisted,
  getWaitlist,
} from './registrations.queries.js';

export type { EventCapacity, RankedWaitlistEntry } from './registrations.queries.js';

// Schemas
export {
  RegisterSchema,
  RegistrationPairQuerySchema,
  EventIdParamSchema,
  UserIdParamSchema,
} from './registrations.schema.js';

// Types
export type { RegisterInput, RegistrationPairQuery } from './registrations.schema.js';

// Routes
export { registrationsRoutes } from './registrations.routes.js';
