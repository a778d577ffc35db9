import { Pool, type PoolConfig } from 'pg';
import { existsSync } from 'fs';

function defaultHost(): string {
  // When running inside the docker-compose network, Postgres is reachable
  // via the service name. Keep localhost for non-container local dev.
  return existsSync('/.dockerenv') ? 'postgres' : 'localhost';
}

/**
 * Creates a pg Pool. A connection string wins over the discrete PG* variables.
 */
export function createPool(databaseUrl?: string, config?: PoolConfig): Pool {
  if (databaseUrl) {
    return new Pool({ connectionString: databaseUrl, ...config });
  }
  return new Pool({
    host: process.env.PGHOST || defaultHost(),
    port: parseInt(process.env.PGPORT || '5432', 10),
    user: process.env.PGUSER || 'recipe',
    password: process.env.PGPASSWORD || 'recipe',
    database: process.env.PGDATABASE || 'recipe',
    ...config,
  });
}
