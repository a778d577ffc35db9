import Fastify, { type FastifyInstance, type FastifyServerOptions } from 'fastify';

import type { AppConfig } from '../config.ts';
import { userRoutesPlugin } from './accounts/routes.ts';
import { registerErrorHandlers } from './errors.ts';
import { HealthCheckRegistry, StoreHealthChecker } from './health.ts';
import { recipeRoutesPlugin } from './recipe/routes.ts';
import type { Store } from './store/types.ts';

export type RecipeApiOptions = {
  config: AppConfig;
  store: Store;
  /** Enables the pino request logger at `config.logLevel`. Off in tests. */
  logger?: boolean;
};

/** Never written to the log. */
const REDACTED_PATHS = ['req.headers.authorization', 'req.headers.cookie', 'password', 'body.password'];

function loggerOptions(options: RecipeApiOptions): FastifyServerOptions['logger'] {
  if (!options.logger) return false;
  return {
    level: options.config.logLevel,
    redact: { paths: REDACTED_PATHS, censor: '[redacted]' },
  };
}

export function buildServer(options: RecipeApiOptions): FastifyInstance {
  const { config, store } = options;
  const app = Fastify({
    logger: loggerOptions(options),
    // Every route answers with and without its trailing slash
    ignoreTrailingSlash: true,
  });

  app.decorateRequest('user', null);
  registerErrorHandlers(app);

  // Health check endpoints (Kubernetes-compatible)
  const healthRegistry = new HealthCheckRegistry();
  healthRegistry.register(new StoreHealthChecker(store, app.log));

  // Liveness check - instant, no I/O, always 200
  app.get('/health', async () => ({ status: 'ok' }));

  // Readiness check - storage must answer
  app.get('/health/ready', async (_req, reply) => {
    const ready = await healthRegistry.isReady();
    if (ready) {
      return { status: 'ok' };
    }
    return reply.code(503).send({ status: 'unavailable' });
  });

  // Detailed health status for monitoring
  app.get('/health/status', async (_req, reply) => {
    const health = await healthRegistry.checkAll();
    const statusCode = health.status === 'unhealthy' ? 503 : 200;
    return reply.code(statusCode).send(health);
  });

  app.register(userRoutesPlugin, { users: store.users, auth: config.auth });
  app.register(recipeRoutesPlugin, { store, auth: config.auth });

  // Cleanup on server close
  app.addHook('onClose', async () => {
    await store.close();
  });

  return app;
}
