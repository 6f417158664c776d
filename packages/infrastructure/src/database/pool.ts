import pg from 'pg';
import type { Pool } from 'pg';

export interface PoolConfig {
  /** PostgreSQL connection string */
  connectionString: string;
  /** Maximum connections in the pool (default: 10) */
  maxConnections?: number;
}

export function createPool(config: PoolConfig): Pool {
  return new pg.Pool({
    connectionString: config.connectionString,
    max: config.maxConnections ?? 10,
  });
}
