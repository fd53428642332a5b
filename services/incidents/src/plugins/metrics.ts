import fp from 'fastify-plugin';
import { collectDefaultMetrics, Counter, Histogram, Registry } from 'prom-client';
import type { AggregationKind } from '../query/types';

export type IncidentMetrics = {
  registry: Registry;
  httpRequestsTotal: Counter<string>;
  httpRequestDurationSeconds: Histogram<string>;
  pipelineDurationSeconds: Histogram<string>;
  enabled: boolean;
  observePipeline: (kind: AggregationKind, durationSeconds: number) => void;
};

declare module 'fastify' {
  interface FastifyInstance {
    metrics: IncidentMetrics;
  }

  interface FastifyRequest {
    metricsStart?: bigint;
  }
}

type MetricsPluginOptions = {
  enabled: boolean;
};

export const metricsPlugin = fp<MetricsPluginOptions>(async (app, options) => {
  const registry = new Registry();
  const enabled = options.enabled;

  if (enabled) {
    collectDefaultMetrics({ register: registry, prefix: 'aerolens_' });
  }

  const httpRequestsTotal = new Counter({
    name: 'aerolens_http_requests_total',
    help: 'Total number of HTTP requests received',
    labelNames: ['method', 'route', 'status'],
    registers: [registry]
  });

  const httpRequestDurationSeconds = new Histogram({
    name: 'aerolens_http_request_duration_seconds',
    help: 'Duration of HTTP requests in seconds',
    labelNames: ['method', 'route', 'status'],
    buckets: [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2, 5],
    registers: [registry]
  });

  const pipelineDurationSeconds = new Histogram({
    name: 'aerolens_pipeline_duration_seconds',
    help: 'Database time spent per aggregation pipeline',
    labelNames: ['kind'],
    buckets: [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2, 5, 15],
    registers: [registry]
  });

  app.decorate('metrics', {
    registry,
    httpRequestsTotal,
    httpRequestDurationSeconds,
    pipelineDurationSeconds,
    enabled,
    observePipeline: (kind: AggregationKind, durationSeconds: number) => {
      if (enabled) {
        pipelineDurationSeconds.labels(kind).observe(durationSeconds);
      }
    }
  });

  app.addHook('onRequest', async (request) => {
    if (!enabled) {
      return;
    }
    request.metricsStart = process.hrtime.bigint();
  });

  app.addHook('onResponse', async (request, reply) => {
    if (!enabled) {
      return;
    }
    const start = request.metricsStart;
    const method = request.method;
    const route = request.routeOptions?.url ?? 'unmatched';
    const status = String(reply.statusCode);

    httpRequestsTotal.labels(method, route, status).inc();

    if (start) {
      const durationNs = Number(process.hrtime.bigint() - start);
      httpRequestDurationSeconds.labels(method, route, status).observe(durationNs / 1_000_000_000);
    }
  });

  app.get('/metrics', async (request, reply) => {
    if (!enabled) {
      reply.code(503).type('text/plain').send('metrics disabled');
      return;
    }
    reply.type('text/plain; version=0.0.4');
    return registry.metrics();
  });
});
