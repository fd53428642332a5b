import Fastify from 'fastify';
import cors from '@fastify/cors';
import { loadServiceConfig, type ServiceConfig } from './config/serviceConfig';
import { authPlugin } from './auth/plugin';
import { metricsPlugin } from './plugins/metrics';
import { closePool, pingDatabase } from './db/client';
import { createHttpErrorHandler } from './errors/errorHandler';
import { openApiPlugin } from './openapi/plugin';
import { registerSystemRoutes, type ReadinessProbe } from './routes/system';
import { registerRecordRoutes } from './routes/records';
import { registerAggregateRoutes } from './routes/aggregates';
import { registerAirportRoutes } from './routes/airports';
import { registerEvaluationRoutes } from './routes/evaluations';
import { createIncidentService, type IncidentServiceDependencies } from './services/incidentService';

export type BuildAppOptions = {
  config?: ServiceConfig;
  serviceDependencies?: Omit<IncidentServiceDependencies, 'observePipeline'>;
  checkDatabase?: ReadinessProbe;
};

export async function buildApp(options?: BuildAppOptions) {
  const config = options?.config ?? loadServiceConfig();

  const app = Fastify({
    logger: {
      level: config.logLevel
    }
  });

  await app.register(cors, {
    origin: true,
    credentials: true
  });

  await app.register(openApiPlugin, { publicUrl: config.publicUrl });
  await app.register(authPlugin, { config });
  await app.register(metricsPlugin, { enabled: config.metricsEnabled });

  app.setErrorHandler(createHttpErrorHandler());

  const service = createIncidentService({
    ...options?.serviceDependencies,
    observePipeline: app.metrics.observePipeline
  });

  await registerSystemRoutes(app, options?.checkDatabase ?? pingDatabase);
  await registerRecordRoutes(app, service);
  await registerAggregateRoutes(app, service);
  await registerAirportRoutes(app, service);
  await registerEvaluationRoutes(app, service);

  app.addHook('onClose', async () => {
    await closePool();
  });

  return { app, config };
}
