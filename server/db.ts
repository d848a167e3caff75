import pg from 'pg';
import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import { logger } from '../lib/logger';

const log = logger.child('db');

export type Database = NodePgDatabase;

export function createDatabase(connectionString: string): Database {
  const pool = new pg.Pool({
    connectionString,
    max: 10,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 10000,
  });

  pool.on('error', (err) => {
    log.error('Unexpected idle client error', err);
  });

  return drizzle(pool);
}
