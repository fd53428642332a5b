import pg, { Pool, type PoolClient, type PoolConfig } from 'pg';

let int8Configured = false;

// COUNT(*) comes back as int8; incident counts stay well inside the safe integer range.
function configureGlobalParsers(): void {
  if (int8Configured) {
    return;
  }
  pg.types.setTypeParser(pg.types.builtins.INT8, (value: string) => Number.parseInt(value, 10));
  int8Configured = true;
}

export function quoteIdentifier(input: string): string {
  return `"${input.replace(/"/g, '""')}"`;
}

export interface PostgresPoolOptions extends PoolConfig {
  schema?: string;
}

export interface PostgresHelpers {
  withConnection<T>(fn: (client: PoolClient) => Promise<T>): Promise<T>;
  closePool(): Promise<void>;
}

export function createPostgresPool(options: PostgresPoolOptions = {}): PostgresHelpers {
  configureGlobalParsers();
  const { schema, ...poolConfig } = options;
  const pool = new Pool(poolConfig);

  pool.on('error', (err: Error) => {
    console.error('[postgres] unexpected error on idle client', err);
  });

  async function getClient(): Promise<PoolClient> {
    const client = await pool.connect();
    if (!schema) {
      return client;
    }
    try {
      await client.query(`SET search_path TO ${quoteIdentifier(schema)}, public`);
    } catch (err) {
      client.release();
      throw err;
    }
    return client;
  }

  async function withConnection<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
    const client = await getClient();
    try {
      return await fn(client);
    } finally {
      client.release();
    }
  }

  async function closePool(): Promise<void> {
    await pool.end();
  }

  return {
    withConnection,
    closePool
  };
}
