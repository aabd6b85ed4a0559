import type { AppInstance } from '@shared/types/fastify.js';
import { store } from '@/database/client.js';
import { logger } from '@shared/utils/logger.js';

export function gracefulShutdown(server: AppInstance) {
  const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

  signals.forEach((signal) => {
    process.once(signal, () => {
      logger.info(`Received ${signal}, shutting down gracefully...`);

      void (async () => {
        try {
          await server.close();
          await store.close();
          logger.info('Server closed');
          process.exit(0);
        } catch (err) {
          logger.error({ err }, 'Error during shutdown');
          process.exit(1);
        }
      })();
    });
  });
}
