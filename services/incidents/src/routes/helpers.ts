import type { FastifyReply, FastifyRequest } from 'fastify';
import type { TokenScope } from '../config/serviceConfig';
import { hasScope } from '../auth/identity';
import type { RawParameters } from '../filters/filterSpecification';
import type { OperationContext } from '../services/incidentService';

export function ensureScope(request: FastifyRequest, reply: FastifyReply, scope: TokenScope): boolean {
  if (hasScope(request.identity, scope)) {
    return true;
  }
  reply.code(403).send({
    statusCode: 403,
    error: 'Forbidden',
    message: `Missing required scope: ${scope}`
  });
  return false;
}

export function buildOperationContext(request: FastifyRequest): OperationContext {
  const { subject, kind } = request.identity;
  return { logger: request.log, actor: { subject, kind } };
}

function isRawParameters(value: unknown): value is RawParameters {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Query strings arrive as a plain object; anything else is treated as empty. */
export function queryParameters(request: FastifyRequest): RawParameters {
  return isRawParameters(request.query) ? request.query : {};
}
