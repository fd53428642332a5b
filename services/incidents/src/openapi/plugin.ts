import swagger from '@fastify/swagger';
import swaggerUI from '@fastify/swagger-ui';
import fp from 'fastify-plugin';
import type { OpenAPIV3 } from 'openapi-types';
import { openApiDocument } from './document';

type OpenApiPluginOptions = {
  /** Externally reachable base URL; the bundled local server entry is kept when null. */
  publicUrl: string | null;
};

export function documentForDeployment(publicUrl: string | null): OpenAPIV3.Document {
  if (!publicUrl) {
    return openApiDocument;
  }
  return {
    ...openApiDocument,
    servers: [{ url: publicUrl.replace(/\/+$/, ''), description: 'Configured public endpoint' }]
  };
}

export const openApiPlugin = fp<OpenApiPluginOptions>(async (app, options) => {
  const document = documentForDeployment(options.publicUrl);

  await app.register(swagger, {
    mode: 'static',
    specification: { document }
  });

  // Served under /docs, which the auth plugin leaves public.
  await app.register(swaggerUI, {
    routePrefix: '/docs',
    staticCSP: true,
    uiConfig: { docExpansion: 'list', deepLinking: true }
  });

  app.get('/openapi.json', { schema: { hide: true } }, async () => document);
});
