import { createEvent, getEvent } from './events.service.js';
import {
  CreateEventSchema,
  EventIdParamSchema,
  type CreateEventInput,
  type EventIdParam,
} from './events.schema.js';
import type { AppInstance } from '@shared/types/fastify.js';

export async function eventsRoutes(app: AppInstance): Promise<void> {
  // POST /api/events - Create event
  app.post<{ Body: CreateEventInput }>(
    '/',
    {
      schema: { body: CreateEventSchema },
    },
    async (request, reply) => {
      const event = await createEvent(request.body);
      return reply.status(201).send(event);
    }
  );

  // GET /api/events/:eventId - Get event
  app.get<{ Params: EventIdParam }>(
    '/:eventId',
    {
      schema: { params: EventIdParamSchema },
    },
    async (request, reply) => {
      const event = await getEvent(request.params.eventId);
      return reply.send(event);
    }
  );
}
