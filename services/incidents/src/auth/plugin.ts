import type { FastifyReply, FastifyRequest } from 'fastify';
import fp from 'fastify-plugin';
import type { ServiceConfig } from '../config/serviceConfig';
import { createDisabledIdentity, createIdentityFromToken, type AuthIdentity } from './identity';

declare module 'fastify' {
  interface FastifyRequest {
    identity: AuthIdentity;
  }
}

type AuthPluginOptions = {
  config: ServiceConfig;
};

const PUBLIC_PATHS = new Set(['/healthz', '/readyz', '/metrics', '/openapi.json']);
const PUBLIC_PREFIXES = ['/docs'];

function extractBearerToken(request: FastifyRequest): string | null {
  const header = request.headers.authorization;
  if (!header) {
    return null;
  }
  const [scheme, value] = header.split(' ');
  if (!scheme || !value || scheme.toLowerCase() !== 'bearer') {
    return null;
  }
  const token = value.trim();
  return token.length > 0 ? token : null;
}

function requestPath(request: FastifyRequest): string {
  const rawUrl = request.raw.url ?? '';
  const queryIndex = rawUrl.indexOf('?');
  return queryIndex >= 0 ? rawUrl.slice(0, queryIndex) : rawUrl;
}

function isPublicRequest(request: FastifyRequest): boolean {
  const path = requestPath(request);
  return PUBLIC_PATHS.has(path) || PUBLIC_PREFIXES.some((prefix) => path === prefix || path.startsWith(`${prefix}/`));
}

function buildTokenIndex(config: ServiceConfig): Map<string, AuthIdentity> {
  const index = new Map<string, AuthIdentity>();
  for (const definition of config.tokens) {
    index.set(definition.token, createIdentityFromToken(definition));
  }
  return index;
}

function unauthorized(reply: FastifyReply, message: string): void {
  reply.code(401).send({
    statusCode: 401,
    error: 'Unauthorized',
    message
  });
}

export const authPlugin = fp<AuthPluginOptions>(async (app, options) => {
  const { config } = options;
  const tokenIndex = buildTokenIndex(config);

  app.decorateRequest<AuthIdentity | null>('identity', null);

  app.addHook('onRequest', async (request, reply) => {
    if (config.authDisabled || isPublicRequest(request)) {
      request.identity = createDisabledIdentity();
      return;
    }

    const token = extractBearerToken(request);
    if (!token) {
      unauthorized(reply, 'Missing bearer token');
      return reply;
    }

    const identity = tokenIndex.get(token);
    if (!identity) {
      unauthorized(reply, 'Invalid bearer token');
      return reply;
    }

    request.identity = identity;
  });
});
