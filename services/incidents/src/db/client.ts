import type { PoolClient } from 'pg';
import { createPostgresPool, type PostgresHelpers } from '@aerolens/shared';
import { loadServiceConfig } from '../config/serviceConfig';
import { toDatabaseError } from './errors';

let helpers: PostgresHelpers | null = null;

function getHelpers(): PostgresHelpers {
  if (!helpers) {
    const { database } = loadServiceConfig();
    helpers = createPostgresPool({
      connectionString: database.url,
      max: database.maxConnections,
      idleTimeoutMillis: database.idleTimeoutMs,
      connectionTimeoutMillis: database.connectionTimeoutMs,
      statement_timeout: database.statementTimeoutMs > 0 ? database.statementTimeoutMs : undefined,
      schema: database.schema
    });
  }
  return helpers;
}

async function translateErrors<T>(operation: () => Promise<T>): Promise<T> {
  try {
    return await operation();
  } catch (err) {
    throw toDatabaseError(err);
  }
}

/** Borrows a pooled connection for one logical operation and always returns it. */
export async function withConnection<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
  return translateErrors(() => getHelpers().withConnection(fn));
}

export async function pingDatabase(): Promise<void> {
  await withConnection(async (client) => {
    await client.query('SELECT 1');
  });
}

export async function closePool(): Promise<void> {
  if (!helpers) {
    return;
  }
  const current = helpers;
  helpers = null;
  await current.closePool();
}
