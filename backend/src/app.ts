import Fastify, { type FastifyInstance } from 'fastify';
import type { Authenticator } from './auth/authenticator.js';
import type { PrometheusAuthMetrics } from './metrics/prometheus.js';
import { buildAuthHook } from './middleware/auth.js';
import { registerAuthRoutes } from './routes/auth.js';
import { registerHealthRoute } from './routes/health.js';
import { registerPrometheusMetricsRoute } from './routes/metricsExporter.js';
import type { ClaimsCache } from './storage/claimsCache.js';
import { authErrorHandler } from './utils/errors.js';

export interface BuildServerOptions {
  authenticator: Authenticator;
  /** Exposed on `/metrics` when given. */
  metrics?: PrometheusAuthMetrics;
  /** Closed together with the server. */
  cache?: ClaimsCache;
  logger?: boolean;
}

export async function buildServer(options: BuildServerOptions): Promise<FastifyInstance> {
  const app = Fastify({ logger: options.logger ?? false });

  app.setErrorHandler(authErrorHandler);
  app.addHook('onRequest', buildAuthHook(options.authenticator));

  await registerHealthRoute(app);
  await registerAuthRoutes(app);
  if (options.metrics) {
    await registerPrometheusMetricsRoute(app, { metrics: options.metrics });
  }

  const { cache } = options;
  if (cache) {
    app.addHook('onClose', async () => {
      await cache.close();
    });
  }

  return app;
}
