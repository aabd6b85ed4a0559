// Services
export { createUser, getUser, userExists } from './users.service.js';

// Schemas & Types
export {
  CreateUserSchema,
  UserIdParamSchema,
  type CreateUserInput,
  type UserIdParam,
} from './users.schema.js';

// Routes
export { usersRoutes } from './users.routes.js';
