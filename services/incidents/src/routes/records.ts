import type { FastifyInstance } from 'fastify';
import { parseBulkIdentifiers } from '../schemas/requests';
import type { IncidentService } from '../services/incidentService';
import { buildOperationContext, ensureScope, queryParameters } from './helpers';
import {
  serializeBulkResult,
  serializeClassificationResult,
  serializeMergedRecord,
  serializeSourceRecord
} from './serializers';

export async function registerRecordRoutes(app: FastifyInstance, service: IncidentService): Promise<void> {
  app.get<{ Params: { uid: string } }>('/records/:uid', async (request, reply) => {
    if (!ensureScope(request, reply, 'incidents:read')) {
      return;
    }
    const record = await service.resolveAndFetchRecord(request.params.uid);
    return serializeSourceRecord(record);
  });

  app.get('/classification-results', async (request, reply) => {
    if (!ensureScope(request, reply, 'incidents:read')) {
      return;
    }
    const results = await service.listClassificationResults(queryParameters(request));
    return results.map(serializeClassificationResult);
  });

  app.get<{ Params: { uid: string } }>('/classification-results/:uid/full', async (request, reply) => {
    if (!ensureScope(request, reply, 'incidents:read')) {
      return;
    }
    const record = await service.fetchFullClassificationResult(request.params.uid);
    return serializeMergedRecord(record);
  });

  app.post('/classification-results/bulk', async (request, reply) => {
    if (!ensureScope(request, reply, 'incidents:read')) {
      return;
    }
    const identifiers = parseBulkIdentifiers(request.body);
    const result = await service.bulkRetrieve(identifiers, buildOperationContext(request));
    return serializeBulkResult(result);
  });
}
