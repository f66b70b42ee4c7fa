import fp from 'fastify-plugin';
import { collectDefaultMetrics, Registry } from 'prom-client';
import { createWorkerMetrics, type WorkerMetrics } from '../metrics';

declare module 'fastify' {
  interface FastifyInstance {
    metrics: {
      registry: Registry;
      worker: WorkerMetrics;
      enabled: boolean;
    };
  }
}

type MetricsPluginOptions = {
  enabled: boolean;
};

export const metricsPlugin = fp<MetricsPluginOptions>(async (app, options) => {
  const registry = new Registry();
  const enabled = options.enabled;

  if (enabled) {
    collectDefaultMetrics({ register: registry, prefix: 'worker_http_' });
  }

  app.decorate('metrics', {
    registry,
    worker: createWorkerMetrics({ registry }),
    enabled
  });

  app.get('/metrics', async (request, reply) => {
    if (!enabled) {
      reply.code(503).type('text/plain').send('metrics disabled');
      return;
    }

    reply.type('text/plain; version=0.0.4');
    return app.metrics.registry.metrics();
  });

  app.post('/metrics/reset', async (request) => {
    app.metrics.worker.reset();
    request.log.info('worker metrics reset');
    return { reset: true };
  });
});
