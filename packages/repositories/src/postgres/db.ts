import { drizzle } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import * as schema from './schema/index.js';

export type DatabaseConfig = {
  connectionString: string;
  maxConnections?: number;
};

/**
 * Create a database connection and Drizzle instance.
 *
 * The identity-bearing store and the processing store are separate
 * databases; call this once per store.
 *
 * Usage:
 * ```ts
 * const { db, client } = createDatabase({
 *   connectionString: process.env.PROCESSING_DATABASE_URL
 * });
 * ```
 */
export function createDatabase(config: DatabaseConfig) {
  const client = postgres(config.connectionString, {
    max: config.maxConnections ?? 10,
  });

  const db = drizzle(client, { schema });

  return { db, client };
}

export type Database = ReturnType<typeof createDatabase>['db'];
