// Services
export { createEvent, getEvent, eventExists } from './events.service.js';

// Schemas & Types
export {
  CreateEventSchema,
  EventIdParamSchema,
  type CreateEventInput,
  type EventIdParam,
} from './events.schema.js';

// Routes
export { eventsRoutes } from './events.routes.js';
