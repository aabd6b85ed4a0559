import Fastify from 'fastify';
import {
  serializerCompiler,
  validatorCompiler,
  type ZodTypeProvider,
} from 'fastify-type-provider-zod';
import { registerPlugins } from './plugins.js';
import { registerHooks } from './hooks.js';
import { errorHandler } from '@shared/middleware/error.middleware.js';
import { store } from '@/database/client.js';
import { logger } from '@shared/utils/logger.js';
import { usersRoutes } from '@users';
import { eventsRoutes } from '@events';
import { registrationsRoutes } from '@registrations';
import type { AppInstance } from '@shared/types/fastify.js';

export async function buildServer(): Promise<AppInstance> {
  const app = Fastify({
    loggerInstance: logger,
  }).withTypeProvider<ZodTypeProvider>();

  app.setValidatorCompiler(validatorCompiler);
  app.setSerializerCompiler(serializerCompiler);

  // Global error handler, set before any plugin so every context inherits it
  app.setErrorHandler(errorHandler);

  // Register plugins (CORS, Helmet)
  await registerPlugins(app);

  // Register lifecycle hooks
  registerHooks(app);

  // Health check with storage connectivity
  app.get('/health', async (_request, reply) => {
    const healthy = await store.ping();

    return reply.status(healthy ? 200 : 503).send({
      status: healthy ? 'ok' : 'degraded',
      timestamp: new Date().toISOString(),
      checks: {
        store: healthy ? 'connected' : 'disconnected',
      },
    });
  });

  // Register module routes
  await app.register(usersRoutes, { prefix: '/api/users' });
  await app.register(eventsRoutes, { prefix: '/api/events' });
  await app.register(registrationsRoutes, { prefix: '/api' });

  return app;
}
