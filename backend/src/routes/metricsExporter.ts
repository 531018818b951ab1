import type { FastifyInstance } from 'fastify';
import type { PrometheusAuthMetrics } from '../metrics/prometheus.js';

export async function registerPrometheusMetricsRoute(app: FastifyInstance, options: { metrics: PrometheusAuthMetrics }) {
  app.get('/metrics', async (request, reply) => {
    const body = options.metrics.render();
    reply.header('Content-Type', 'text/plain; version=0.0.4');
    return reply.send(body);
  });
}
