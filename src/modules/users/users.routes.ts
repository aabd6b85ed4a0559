import { createUser, getUser } from './users.service.js';
import {
  CreateUserSchema,
  UserIdParamSchema,
  type CreateUserInput,
  type UserIdParam,
} from './users.schema.js';
import type { AppInstance } from '@shared/types/fastify.js';

export async function usersRoutes(app: AppInstance): Promise<void> {
  // POST /api/users - Create user
  app.post<{ Body: CreateUserInput }>(
    '/',
    {
      schema: { body: CreateUserSchema },
    },
    async (request, reply) => {
      const user = await createUser(request.body);
      return reply.status(201).send(user);
    }
  );

  // GET /api/users/:userId - Get user
  app.get<{ Params: UserIdParam }>(
    '/:userId',
    {
      schema: { params: UserIdParamSchema },
    },
    async (request, reply) => {
      const user = await getUser(request.params.userId);
      return reply.send(user);
    }
  );
}
