import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import { config } from '@config/app.config.js';
import type { AppInstance } from '@shared/types/fastify.js';

export async function registerPlugins(app: AppInstance) {
  await app.register(cors, {
    origin: config.CORS_ORIGIN,
    methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
  });

  await app.register(helmet, {
    contentSecurityPolicy: config.isProduction,
  });
}
