import type { FastifyInstance } from 'fastify';
import type { IncidentService } from '../services/incidentService';
import { buildOperationContext, ensureScope, queryParameters } from './helpers';
import {
  serializeGeolocations,
  serializeHeatmap,
  serializeHierarchy,
  serializeOverTime,
  serializeStatistics,
  serializeTopN
} from './serializers';

export async function registerAggregateRoutes(app: FastifyInstance, service: IncidentService): Promise<void> {
  app.get('/aggregates/over-time', async (request, reply) => {
    if (!ensureScope(request, reply, 'incidents:read')) {
      return;
    }
    const rows = await service.getOverTime(queryParameters(request), buildOperationContext(request));
    return serializeOverTime(rows);
  });

  app.get('/aggregates/top-n', async (request, reply) => {
    if (!ensureScope(request, reply, 'incidents:read')) {
      return;
    }
    const rows = await service.getTopN(queryParameters(request), buildOperationContext(request));
    return serializeTopN(rows);
  });

  app.get('/aggregates/heatmap', async (request, reply) => {
    if (!ensureScope(request, reply, 'incidents:read')) {
      return;
    }
    const cells = await service.getHeatmap(queryParameters(request), buildOperationContext(request));
    return serializeHeatmap(cells);
  });

  app.get('/aggregates/hierarchy', async (request, reply) => {
    if (!ensureScope(request, reply, 'incidents:read')) {
      return;
    }
    const rows = await service.getHierarchy(queryParameters(request), buildOperationContext(request));
    return serializeHierarchy(rows);
  });

  app.get('/aggregates/statistics', async (request, reply) => {
    if (!ensureScope(request, reply, 'incidents:read')) {
      return;
    }
    const result = await service.getStatistics(queryParameters(request), buildOperationContext(request));
    return serializeStatistics(result);
  });

  app.get('/aggregates/geolocations', async (request, reply) => {
    if (!ensureScope(request, reply, 'incidents:read')) {
      return;
    }
    const incidents = await service.getGeolocations(queryParameters(request), buildOperationContext(request));
    return serializeGeolocations(incidents);
  });

  app.get('/aggregates/seasonal-distribution', async (request, reply) => {
    if (!ensureScope(request, reply, 'incidents:read')) {
      return;
    }
    return service.getSeasonalDistribution(queryParameters(request), buildOperationContext(request));
  });

  app.get('/reports/incident-ids', async (request, reply) => {
    if (!ensureScope(request, reply, 'incidents:read')) {
      return;
    }
    const rows = await service.listIncidentIds(queryParameters(request), buildOperationContext(request));
    return rows.map((row) => row.uid);
  });
}
