import Fastify from 'fastify';
import type { Config } from '../config.js';
import { registerErrorHandler } from './middleware/error-handler.js';
import { registerQueryRoutes } from './routes/queries.js';

export function buildServer(config: Config) {
  const app = Fastify({ logger: { level: config.logLevel } });

  registerErrorHandler(app);

  app.get('/health', async () => ({ status: 'ok' }));

  const prefix = '/api/v1';

  app.register(async (instance) => {
    await registerQueryRoutes(instance, config);
  }, { prefix });

  return app;
}
