import type { FastifyInstance } from 'fastify';
import { parseAirportCodes } from '../schemas/requests';
import type { IncidentService } from '../services/incidentService';
import { ensureScope, queryParameters } from './helpers';
import { serializeAirport, serializeAirports } from './serializers';

export async function registerAirportRoutes(app: FastifyInstance, service: IncidentService): Promise<void> {
  app.get('/airports', async (request, reply) => {
    if (!ensureScope(request, reply, 'incidents:read')) {
      return;
    }
    const codes = parseAirportCodes(queryParameters(request));
    const airports = await service.lookupAirports(codes);
    return serializeAirports(airports);
  });

  app.get<{ Params: { code: string } }>('/airports/:code', async (request, reply) => {
    if (!ensureScope(request, reply, 'incidents:read')) {
      return;
    }
    const airport = await service.getAirport(request.params.code);
    return serializeAirport(airport);
  });
}
