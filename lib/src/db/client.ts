/**
 * Database Client
 *
 * Process-wide PostgreSQL connection pool for the interaction store.
 */

import pg from 'pg';

import { loadDatabaseConfig, type DatabaseConfig } from './config.js';

const { Pool } = pg;
type PoolType = InstanceType<typeof Pool>;

/**
 * The subset of a pool the store and the migration runner query through.
 */
export interface SqlExecutor {
  query<R extends pg.QueryResultRow = pg.QueryResultRow>(
    text: string,
    values?: unknown[]
  ): Promise<pg.QueryResult<R>>;
}

/** Singleton pool instance */
let poolInstance: PoolType | null = null;

/**
 * Creates a new database pool with the provided configuration.
 */
export function createDatabasePool(config: DatabaseConfig): PoolType {
  return new Pool({
    host: config.host,
    port: config.port,
    user: config.user,
    password: config.password,
    database: config.database,
    max: config.maxConnections,
    connectionTimeoutMillis: config.connectionTimeout,
    idleTimeoutMillis: config.idleTimeout,
  });
}

/**
 * Gets or creates a singleton database pool instance.
 */
export function getDatabasePool(): PoolType {
  if (poolInstance) {
    return poolInstance;
  }

  const config = loadDatabaseConfig();
  poolInstance = createDatabasePool(config);
  return poolInstance;
}

/**
 * Closes the database pool gracefully.
 */
export async function closeDatabasePool(): Promise<void> {
  if (poolInstance) {
    await poolInstance.end();
    poolInstance = null;
  }
}
