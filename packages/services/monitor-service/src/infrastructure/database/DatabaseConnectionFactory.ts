/**
 * Database Connection Factory
 */

import { Pool } from 'pg';
import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import { getLogger } from '@beacon/platform-core';
import * as schema from '../../schema/monitor-schema';

const logger = getLogger('monitor-service-database');

export type MonitorDatabase = NodePgDatabase<typeof schema>;

export interface DatabaseConnection {
  db: MonitorDatabase;
  pool: Pool;
  close(): Promise<void>;
}

function getSslConfig(connectionString: string): false | { rejectUnauthorized: boolean } {
  if (process.env.DATABASE_SSL === 'false') return false;
  try {
    const url = new URL(connectionString);
    if (url.hostname === 'localhost' || url.hostname === '127.0.0.1') return false;
    if (url.searchParams.get('sslmode') === 'disable') return false;
  } catch {
    return false;
  }
  return { rejectUnauthorized: false };
}

export function createDatabaseConnection(connectionString: string, maxConnections = 10): DatabaseConnection {
  const pool = new Pool({
    connectionString,
    max: maxConnections,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 10000,
    ssl: getSslConfig(connectionString),
  });

  pool.on('error', err => {
    logger.error('Idle database client error', { error: err.message });
  });

  const db = drizzle(pool, { schema });
  logger.info('Database pool created', { maxConnections });

  return {
    db,
    pool,
    close: async () => {
      await pool.end();
      logger.info('Database pool closed');
    },
  };
}
