import type { ServiceMetrics } from '@wxgate/observability';
import type { FastifyInstance } from 'fastify';

/** Records duration, count and error status for every response. */
export function registerServiceMetrics(app: FastifyInstance, metrics: ServiceMetrics): ServiceMetrics {
  const started = new WeakMap<object, number>();

  app.addHook('onRequest', async (request) => {
    started.set(request.raw, Date.now());
  });

  app.addHook('onResponse', async (request, reply) => {
    const duration = Math.max(Date.now() - (started.get(request.raw) ?? Date.now()), 0);
    const route = request.routeOptions.url ?? request.url;
    const status = String(reply.statusCode);

    metrics.requestDurationMs.labels(request.method, route, status).observe(duration);
    metrics.requestCount.labels(request.method, route, status).inc();

    if (reply.statusCode >= 400) {
      metrics.errorCount.labels(status).inc();
    }
  });

  return metrics;
}
