import { registerUser, unregisterUser, assertNotDenied } from './registrations.service.js';
import {
  getEventCapacity,
  getRegisteredEvents,
  getWaitlist,
  isRegistered,
  isWaitlisted,
} from './registrations.queries.js';
import {
  RegisterSchema,
  RegistrationPairQuerySchema,
  EventIdParamSchema,
  UserIdParamSchema,
  type RegisterInput,
  type RegistrationPairQuery,
} from './registrations.schema.js';
import type { AppInstance } from '@shared/types/fastify.js';

export async function registrationsRoutes(app: AppInstance): Promise<void> {
  // POST /api/registrations - Register a user for an event
  app.post<{ Body: RegisterInput }>(
    '/registrations',
    {
      schema: { body: RegisterSchema },
    },
    async (request, reply) => {
      const { userId, eventId } = request.body;
      const outcome = assertNotDenied(await registerUser(userId, eventId));

      if (outcome.status === 'ACTIVE') {
        return reply.status(201).send({
          success: true,
          status: outcome.status,
          message: 'Successfully registered for event',
          registration: outcome.registration,
          waitlistEntry: null,
        });
      }

      return reply.status(201).send({
        success: true,
        status: outcome.status,
        message: `Event is full. Added to waitlist at position ${outcome.waitlistEntry.position}`,
        registration: null,
        waitlistEntry: outcome.waitlistEntry,
      });
    }
  );

  // DELETE /api/registrations?userId=&eventId= - Unregister, promoting the waitlist head
  app.delete<{ Querystring: RegistrationPairQuery }>(
    '/registrations',
    {
      schema: { querystring: RegistrationPairQuerySchema },
    },
    async (request, reply) => {
      const { userId, eventId } = request.query;
      const { promoted } = await unregisterUser(userId, eventId);

      return reply.send({
        success: true,
        message: 'Successfully unregistered from event',
        promoted,
      });
    }
  );

  // GET /api/registrations/status?userId=&eventId= - Membership checks
  app.get<{ Querystring: RegistrationPairQuery }>(
    '/registrations/status',
    {
      schema: { querystring: RegistrationPairQuerySchema },
    },
    async (request, reply) => {
      const { userId, eventId } = request.query;
      const [registered, waitlisted] = await Promise.all([
        isRegistered(userId, eventId),
        isWaitlisted(userId, eventId),
      ]);

      return reply.send({ userId, eventId, registered, waitlisted });
    }
  );

  // GET /api/events/:eventId/capacity - Total and available capacity
  app.get<{ Params: { eventId: string } }>(
    '/events/:eventId/capacity',
    {
      schema: { params: EventIdParamSchema },
    },
    async (request, reply) => {
      const capacity = await getEventCapacity(request.params.eventId);
      return reply.send(capacity);
    }
  );

  // GET /api/events/:eventId/waitlist - Waitlist in promotion order
  app.get<{ Params: { eventId: string } }>(
    '/events/:eventId/waitlist',
    {
      schema: { params: EventIdParamSchema },
    },
    async (request, reply) => {
      const waitlist = await getWaitlist(request.params.eventId);
      return reply.send(waitlist);
    }
  );

  // GET /api/users/:userId/events - Events with an active registration
  app.get<{ Params: { userId: string } }>(
    '/users/:userId/events',
    {
      schema: { params: UserIdParamSchema },
    },
    async (request, reply) => {
      const events = await getRegisteredEvents(request.params.userId);
      return reply.send(events);
    }
  );
}
