export { createUserRecord, USER_ID_MAX_LENGTH, USER_NAME_MAX_LENGTH, type User, type UserProps } from './user.model.js';
export { createEventRecord, EVENT_MAX_CAPACITY, type EventRecord, type EventProps } from './event.model.js';
export {
  RegistrationStatus,
  createRegistrationRecord,
  createWaitlistEntryRecord,
  type Registration,
  type WaitlistEntry,
  type RegistrationProps,
  type WaitlistEntryProps,
} from './registration.model.js';
