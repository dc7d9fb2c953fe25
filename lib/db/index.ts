import { drizzle, type NodePgDatabase, type NodePgQueryResultHKT } from 'drizzle-orm/node-postgres';
import type { PgDatabase } from 'drizzle-orm/pg-core';
import { Pool } from 'pg';

import { getSyncConfig } from '@/lib/config/env';
import * as schema from './schema';

export type Database = NodePgDatabase<typeof schema>;

/**
 * Anything queries can run against: the root database or an open transaction.
 */
export type DbExecutor = PgDatabase<NodePgQueryResultHKT, typeof schema>;

let pool: Pool | null = null;
let database: Database | null = null;

/**
 * Lazily connect so importing the schema never needs DATABASE_URL.
 */
export function getDb(): Database {
  if (!database) {
    const { databaseUrl } = getSyncConfig();
    if (!databaseUrl) {
      throw new Error('DATABASE_URL environment variable is not set');
    }
    pool = new Pool({ connectionString: databaseUrl });
    database = drizzle(pool, { schema });
  }
  return database;
}

export async function closeDb(): Promise<void> {
  if (pool) {
    await pool.end();
  }
  pool = null;
  database = null;
}

export * from './schema';
export { schema };
