import type { FastifyInstance } from 'fastify';
import { DatabaseUnavailableError } from '../errors/domain';

export type ReadinessProbe = () => Promise<void>;

export async function registerSystemRoutes(app: FastifyInstance, checkDatabase: ReadinessProbe): Promise<void> {
  app.get('/healthz', async () => ({ status: 'ok' }));

  app.get('/readyz', async (request, reply) => {
    try {
      await checkDatabase();
    } catch (err) {
      if (!(err instanceof DatabaseUnavailableError)) {
        throw err;
      }
      request.log.warn({ err }, 'readiness check failed');
      reply.status(503);
      return { status: 'unavailable', reason: err.message };
    }
    return { status: 'ok' };
  });
}
